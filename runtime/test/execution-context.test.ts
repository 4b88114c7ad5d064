import assert from "node:assert/strict";
import test from "node:test";

import { ExecutionContext, MAX_RULE_DEPTH, RuleDepthError, createIdMap } from "../src/index.ts";

import { RecordingServices } from "./helpers/recording-services.ts";
import { makeDevice } from "./helpers/topology-builders.ts";

function createContext(): ExecutionContext {
  const idMap = createIdMap(
    [{ id: "set_page", actions: [{ kind: "i2c_write_byte", register: 0x00, value: 0x01 }] }],
    [{ number: 1, devices: [makeDevice("vdd_reg"), makeDevice("vio_reg")] }]
  );
  return new ExecutionContext(idMap, "vdd_reg", new RecordingServices());
}

test("ExecutionContext resolves the current device and can switch it", () => {
  const context = createContext();

  assert.equal(context.getDeviceId(), "vdd_reg");
  assert.equal(context.getDevice().id, "vdd_reg");

  context.setDeviceId("vio_reg");
  assert.equal(context.getDevice().id, "vio_reg");

  context.setDeviceId("missing_reg");
  assert.throws(() => context.getDevice(), { message: 'Unable to find device with ID "missing_reg"' });
});

test("ExecutionContext looks up rules by id", () => {
  const context = createContext();

  assert.equal(context.getRule("set_page").id, "set_page");
  assert.throws(() => context.getRule("set_voltage"), { message: 'Unable to find rule with ID "set_voltage"' });
});

test("ExecutionContext allows rule depth up to the maximum", () => {
  const context = createContext();
  assert.equal(MAX_RULE_DEPTH, 30);

  for (let depth = 1; depth <= MAX_RULE_DEPTH; depth += 1) {
    context.incrementRuleDepth("set_page");
  }
  assert.equal(context.getRuleDepth(), 30);

  assert.throws(() => context.incrementRuleDepth("set_page"), (error) => {
    assert.ok(error instanceof RuleDepthError);
    assert.equal(error.message, "Maximum rule depth exceeded by rule set_page.");
    return true;
  });
  assert.equal(context.getRuleDepth(), 31);

  context.decrementRuleDepth();
  assert.equal(context.getRuleDepth(), 30);
});

test("ExecutionContext never decrements rule depth below zero", () => {
  const context = createContext();

  context.decrementRuleDepth();
  assert.equal(context.getRuleDepth(), 0);

  context.incrementRuleDepth("set_page");
  context.decrementRuleDepth();
  context.decrementRuleDepth();
  assert.equal(context.getRuleDepth(), 0);
});

test("ExecutionContext records each phase fault type once", () => {
  const context = createContext();

  context.addPhaseFault("n");
  context.addPhaseFault("n");
  context.addPhaseFault("n+1");

  assert.deepEqual(Array.from(context.getPhaseFaults()), ["n", "n+1"]);
});

test("ExecutionContext keeps the last additional error data value per key", () => {
  const context = createContext();

  context.addAdditionalErrorData("READ_VALUE", "0x01");
  context.addAdditionalErrorData("READ_VALUE", "0x02");
  context.addAdditionalErrorData("STATUS_WORD", "0x0800");

  assert.deepEqual(Object.fromEntries(context.getAdditionalErrorData()), {
    READ_VALUE: "0x02",
    STATUS_WORD: "0x0800"
  });
});

test("ExecutionContext starts without a volts value", () => {
  const context = createContext();
  assert.equal(context.getVolts(), undefined);

  context.setVolts(1.3);
  assert.equal(context.getVolts(), 1.3);
});
