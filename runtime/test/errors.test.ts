import assert from "node:assert/strict";
import test from "node:test";

import {
  ActionError,
  ConfigFileParserError,
  IdNotFoundError,
  PMBusError,
  RuleDepthError,
  WriteVerificationError,
  describeAction,
  type Action
} from "../src/index.ts";

test("describeAction formats byte actions with an optional mask", () => {
  assert.equal(
    describeAction({ kind: "i2c_write_byte", register: 0x7c, value: 0x0a, mask: 0xf7 }),
    "i2c_write_byte: { register: 0x7C, value: 0x0A, mask: 0xF7 }"
  );
  assert.equal(
    describeAction({ kind: "i2c_compare_byte", register: 0x7c, value: 0x0a }),
    "i2c_compare_byte: { register: 0x7C, value: 0x0A }"
  );
});

test("describeAction formats bit and block actions", () => {
  assert.equal(
    describeAction({ kind: "i2c_write_bit", register: 0xa0, position: 3, value: 0 }),
    "i2c_write_bit: { register: 0xA0, position: 3, value: 0 }"
  );
  assert.equal(
    describeAction({ kind: "i2c_write_bytes", register: 0xa0, values: [0x0a, 0xcc], masks: [] }),
    "i2c_write_bytes: { register: 0xA0, values: [ 0x0A, 0xCC ], masks: [ ] }"
  );
  assert.equal(
    describeAction({ kind: "i2c_compare_bytes", register: 0x02, values: [0x01], masks: [0x7f] }),
    "i2c_compare_bytes: { register: 0x02, values: [ 0x01 ], masks: [ 0x7F ] }"
  );
});

test("describeAction omits unset PMBus fields", () => {
  assert.equal(
    describeAction({
      kind: "pmbus_write_vout_command",
      volts: 1.3,
      format: "linear",
      exponent: -8,
      isVerified: true
    }),
    "pmbus_write_vout_command: { volts: 1.3, format: linear, exponent: -8, is_verified: true }"
  );
  assert.equal(
    describeAction({ kind: "pmbus_write_vout_command", format: "linear", isVerified: false }),
    "pmbus_write_vout_command: { format: linear, is_verified: false }"
  );
  assert.equal(
    describeAction({ kind: "pmbus_read_sensor", type: "vout", command: 0x8b, format: "linear_16", exponent: -8 }),
    "pmbus_read_sensor: { type: vout, command: 0x8B, format: linear_16, exponent: -8 }"
  );
});

test("describeAction nests logical actions", () => {
  const condition: Action = {
    kind: "compare_vpd",
    fru: "/system/chassis/disk_backplane",
    keyword: "CCIN",
    value: "2D35"
  };
  const action: Action = {
    kind: "if",
    condition,
    thenActions: [{ kind: "run_rule", ruleId: "configure_2d35" }],
    elseActions: [{ kind: "set_device", deviceId: "vio_reg" }]
  };

  assert.equal(
    describeAction(action),
    "if: { condition: { compare_vpd: { fru: /system/chassis/disk_backplane, keyword: CCIN, value: 2D35 } }, " +
      "then: [ run_rule: configure_2d35 ], else: [ set_device: vio_reg ] }"
  );
  assert.equal(
    describeAction({
      kind: "and",
      actions: [
        { kind: "log_phase_fault", type: "n+1" },
        { kind: "not", action: { kind: "compare_presence", fru: "/system/fan0", value: true } }
      ]
    }),
    "and: [ log_phase_fault: { type: n+1 }, not: { compare_presence: { fru: /system/fan0, value: true } } ]"
  );
});

test("ActionError describes its action and keeps the cause", () => {
  const cause = new Error("bus timeout");
  const error = new ActionError({ kind: "run_rule", ruleId: "set_voltage_rule" }, { cause });

  assert.equal(error.name, "ActionError");
  assert.equal(error.message, "ActionError: run_rule: set_voltage_rule");
  assert.equal(error.cause, cause);

  const detailed = new ActionError(
    { kind: "pmbus_write_vout_command", format: "linear", isVerified: false },
    { detail: "No volts value defined" }
  );
  assert.equal(
    detailed.message,
    "ActionError: pmbus_write_vout_command: { format: linear, is_verified: false }: No volts value defined"
  );
});

test("error classes carry their identifying fields", () => {
  const notFound = new IdNotFoundError("rule", "set_voltage_rule");
  assert.equal(notFound.message, 'Unable to find rule with ID "set_voltage_rule"');
  assert.equal(notFound.category, "rule");

  assert.equal(new RuleDepthError("loop").message, "Maximum rule depth exceeded by rule loop.");

  const pmbusError = new PMBusError("VOUT_MODE contains unsupported data format", "vdd_reg", "/system/vdd_reg");
  assert.equal(pmbusError.message, "PMBusError: VOUT_MODE contains unsupported data format");
  assert.equal(pmbusError.deviceId, "vdd_reg");
  assert.equal(pmbusError.inventoryPath, "/system/vdd_reg");

  const verification = new WriteVerificationError("value_written: 0x014D, value_read: 0x0000", "vdd_reg", "/system/vdd_reg");
  assert.equal(verification.message, "WriteVerificationError: value_written: 0x014D, value_read: 0x0000");

  const parserError = new ConfigFileParserError("/etc/regulators/config.json", new Error("Element is not an object"));
  assert.equal(parserError.message, "ConfigFileParserError: /etc/regulators/config.json: Element is not an object");
  assert.equal(parserError.path, "/etc/regulators/config.json");
});
