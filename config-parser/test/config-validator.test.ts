import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import test from "node:test";

import { ConfigFileParserError } from "vreg-runtime";

import { parseConfigFile, validateConfigDocument, validateConfigFile } from "../src/index.ts";

function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(fixturePath(name), "utf8"));
}

test("validateConfigFile accepts a complete configuration", () => {
  const result = validateConfigFile(fixturePath("valid-config.json"));

  assert.deepEqual(result, { valid: true, issues: [] });
});

test("a valid configuration also parses", () => {
  const { rules, chassis } = parseConfigFile(fixturePath("valid-config.json"));

  assert.deepEqual(
    rules.map((rule) => rule.id),
    ["set_page0", "set_voltage_rule", "read_sensors_rule", "detect_phase_faults_rule"]
  );
  assert.equal(chassis[0]?.devices[0]?.rails[0]?.configuration?.volts, 1.03);
});

test("validateConfigDocument reports schema violations", () => {
  assert.deepEqual(validateConfigDocument({ rules: [] }), {
    valid: false,
    issues: [{ instancePath: "", keyword: "required", message: "must have required property 'chassis'" }]
  });
  assert.deepEqual(validateConfigDocument({ chassis: [{ number: 0 }] }), {
    valid: false,
    issues: [{ instancePath: "/chassis/0/number", keyword: "minimum", message: "must be >= 1" }]
  });
});

test("validateConfigDocument requires exactly one action type per action", () => {
  const result = validateConfigDocument({
    rules: [{ id: "set_page", actions: [{ run_rule: "other", set_device: "vdd_regulator" }] }],
    chassis: []
  });

  assert.equal(result.valid, false);
  assert.equal(
    result.issues.some((issue) => issue.keyword === "oneOf" && issue.instancePath === "/rules/0/actions/0"),
    true
  );
});

test("validateConfigDocument reports duplicate ids, undefined references and rule cycles", () => {
  const result = validateConfigDocument(loadFixture("semantic-errors.json"));

  assert.deepEqual(result, {
    valid: false,
    issues: [
      { instancePath: "/rules/2/id", keyword: "duplicateId", message: 'Duplicate rule ID "rule_a"' },
      {
        instancePath: "/chassis/0/devices/0/rails/1/id",
        keyword: "duplicateId",
        message: 'Duplicate rail ID "vdd"'
      },
      {
        instancePath: "/chassis/0/devices/1/id",
        keyword: "duplicateId",
        message: 'Duplicate device ID "vdd_regulator"'
      },
      {
        instancePath: "/rules/1/actions/0/if/then/0/set_device",
        keyword: "undefinedDevice",
        message: 'Undefined device ID "vio_regulator"'
      },
      {
        instancePath: "/rules/2/actions/0/run_rule",
        keyword: "undefinedRule",
        message: 'Undefined rule ID "missing_rule"'
      },
      {
        instancePath: "/chassis/0/devices/0/phase_fault_detection/device_id",
        keyword: "undefinedDevice",
        message: 'Undefined device ID "vdd_regulator_page1"'
      },
      {
        instancePath: "/rules/0",
        keyword: "ruleCycle",
        message: "Rule call cycle detected: rule_a -> rule_b -> rule_a"
      }
    ]
  });
});

test("validateConfigDocument rejects chassis numbers past the safe integer range", () => {
  const document: unknown = JSON.parse('{ "chassis": [{ "number": 18446744073709551617 }] }');

  assert.deepEqual(validateConfigDocument(document), {
    valid: false,
    issues: [{ instancePath: "/chassis/0/number", keyword: "maximum", message: "must be <= 9007199254740991" }]
  });
});

test("validateConfigDocument reports masks that do not match values, including nested actions", () => {
  const result = validateConfigDocument({
    rules: [
      {
        id: "write_pages",
        actions: [
          { i2c_write_bytes: { register: "0xA0", values: ["0x01", "0x02"], masks: ["0xFF"] } },
          {
            if: {
              condition: {
                not: { i2c_compare_bytes: { register: "0x0A", values: ["0x10"], masks: ["0x0F", "0xF0"] } }
              },
              then: [{ i2c_write_bytes: { register: "0xB0", values: ["0x03"], masks: ["0x7F"] } }]
            }
          }
        ]
      }
    ],
    chassis: []
  });

  assert.deepEqual(result, {
    valid: false,
    issues: [
      {
        instancePath: "/rules/0/actions/0/i2c_write_bytes/masks",
        keyword: "maskCount",
        message: "Invalid number of elements in masks"
      },
      {
        instancePath: "/rules/0/actions/1/if/condition/not/i2c_compare_bytes/masks",
        keyword: "maskCount",
        message: "Invalid number of elements in masks"
      }
    ]
  });
});

test("validateConfigDocument reports a rule that runs itself", () => {
  const result = validateConfigDocument({
    rules: [{ id: "loop", actions: [{ not: { run_rule: "loop" } }] }],
    chassis: []
  });

  assert.deepEqual(result.issues, [
    { instancePath: "/rules/0", keyword: "ruleCycle", message: "Rule call cycle detected: loop -> loop" }
  ]);
});

test("validateConfigFile fails on unreadable files", () => {
  assert.throws(() => validateConfigFile("/nonexistent/vreg/config.json"), (error) => {
    assert.ok(error instanceof ConfigFileParserError);
    assert.equal(error.path, "/nonexistent/vreg/config.json");
    return true;
  });
});
