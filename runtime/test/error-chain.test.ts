import assert from "node:assert/strict";
import test from "node:test";

import {
  ActionError,
  I2CError,
  PMBusError,
  findError,
  getErrors,
  getMessages
} from "../src/index.ts";

function buildChain(): { inner: Error; i2cError: I2CError; actionError: ActionError } {
  const inner = new Error("bus timeout");
  const i2cError = new I2CError({ message: "Failed to read byte", bus: 1, address: 0x70, cause: inner });
  const actionError = new ActionError(
    { kind: "i2c_compare_bit", register: 0xa0, position: 3, value: 0 },
    { cause: i2cError }
  );
  return { inner, i2cError, actionError };
}

test("getErrors returns the chain innermost first", () => {
  const { inner, i2cError, actionError } = buildChain();

  const errors = getErrors(actionError);

  assert.equal(errors.length, 3);
  assert.equal(errors[0], inner);
  assert.equal(errors[1], i2cError);
  assert.equal(errors[2], actionError);
});

test("getMessages flattens the chain innermost first", () => {
  const { actionError } = buildChain();

  assert.deepEqual(getMessages(actionError), [
    "bus timeout",
    "I2CError: Failed to read byte: bus 1, addr 0x70",
    "ActionError: i2c_compare_bit: { register: 0xA0, position: 3, value: 0 }"
  ]);
});

test("getMessages stringifies non-error causes", () => {
  const error = new Error("Unable to configure vdd_reg", { cause: "device busy" });

  assert.deepEqual(getMessages(error), ["device busy", "Unable to configure vdd_reg"]);
  assert.deepEqual(getMessages("plain text"), ["plain text"]);
});

test("getErrors stops at a cause that loops back", () => {
  const first = new Error("first");
  const second = new Error("second", { cause: first });
  first.cause = second;

  assert.deepEqual(getMessages(second), ["first", "second"]);
});

test("findError locates an error class anywhere in the chain", () => {
  const { i2cError, actionError } = buildChain();

  assert.equal(findError(actionError, I2CError), i2cError);
  assert.equal(findError(actionError, ActionError), actionError);
  assert.equal(findError(actionError, PMBusError), undefined);
});
