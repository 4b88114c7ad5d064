import { readFileSync } from "node:fs";
import { createRequire } from "node:module";

import type { ErrorObject, ValidateFunction } from "ajv/dist/2020.js";
import { ConfigFileParserError } from "vreg-runtime";

import { isJsonObject } from "./value-parsers.ts";

export interface ConfigValidationIssue {
  instancePath: string;
  keyword: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  issues: ConfigValidationIssue[];
}

type Ajv2020Class = new (options: { allErrors: boolean }) => {
  compile(schema: object): ValidateFunction;
};

// Under require, the 2020-12 build's class is the module itself or one of its
// `default` and `Ajv2020` exports.
type Ajv2020Module = Ajv2020Class | { default?: Ajv2020Class; Ajv2020?: Ajv2020Class };

let configValidator: ValidateFunction | null = null;

function loadSchema(): object {
  const fileContents = readFileSync(new URL("../schema/config-schema.json", import.meta.url), "utf8");
  const schema: unknown = JSON.parse(fileContents);
  if (!isJsonObject(schema)) {
    throw new Error("Configuration schema must be a JSON object");
  }

  return schema;
}

function getConfigValidator(): ValidateFunction {
  if (configValidator) {
    return configValidator;
  }

  const ajvModule: Ajv2020Module = createRequire(import.meta.url)("ajv/dist/2020.js");
  const Ajv2020 = typeof ajvModule === "function" ? ajvModule : (ajvModule.default ?? ajvModule.Ajv2020);
  if (typeof Ajv2020 !== "function") {
    throw new Error("Unable to load the JSON schema 2020-12 validator from ajv");
  }

  configValidator = new Ajv2020({ allErrors: true }).compile(loadSchema());
  return configValidator;
}

function mapAjvIssues(errors: ErrorObject[] | null | undefined): ConfigValidationIssue[] {
  return (errors ?? []).map((error) => ({
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? "validation failed"
  }));
}

interface Reference {
  category: "rule" | "device";
  id: string;
  instancePath: string;
}

class DocumentIndex {
  readonly issues: ConfigValidationIssue[] = [];
  readonly references: Reference[] = [];
  readonly ruleIds = new Set<string>();
  readonly deviceIds = new Set<string>();
  readonly railIds = new Set<string>();
  // Rule id to the ids of the rules it runs, in document order.
  readonly ruleCalls = new Map<string, string[]>();
  readonly rulePaths = new Map<string, string>();

  registerId(category: "rule" | "device" | "rail", id: unknown, instancePath: string): void {
    if (typeof id !== "string") {
      return;
    }

    const ids = category === "rule" ? this.ruleIds : category === "device" ? this.deviceIds : this.railIds;
    if (ids.has(id)) {
      this.issues.push({
        instancePath,
        keyword: "duplicateId",
        message: `Duplicate ${category} ID "${id}"`
      });
      return;
    }

    ids.add(id);
  }

  addReference(category: "rule" | "device", id: unknown, instancePath: string, callerRuleId?: string): void {
    if (typeof id !== "string") {
      return;
    }

    this.references.push({ category, id, instancePath });
    if (category === "rule" && callerRuleId !== undefined) {
      const calls = this.ruleCalls.get(callerRuleId) ?? [];
      calls.push(id);
      this.ruleCalls.set(callerRuleId, calls);
    }
  }
}

function indexActions(actions: unknown, path: string, index: DocumentIndex, callerRuleId?: string): void {
  if (!Array.isArray(actions)) {
    return;
  }

  actions.forEach((action: unknown, position: number) => {
    indexAction(action, `${path}/${position}`, index, callerRuleId);
  });
}

function indexAction(action: unknown, path: string, index: DocumentIndex, callerRuleId?: string): void {
  if (!isJsonObject(action)) {
    return;
  }

  if (Object.hasOwn(action, "run_rule")) {
    index.addReference("rule", action.run_rule, `${path}/run_rule`, callerRuleId);
  }
  if (Object.hasOwn(action, "set_device")) {
    index.addReference("device", action.set_device, `${path}/set_device`);
  }
  if (Object.hasOwn(action, "and")) {
    indexActions(action.and, `${path}/and`, index, callerRuleId);
  }
  if (Object.hasOwn(action, "or")) {
    indexActions(action.or, `${path}/or`, index, callerRuleId);
  }
  if (Object.hasOwn(action, "not")) {
    indexAction(action.not, `${path}/not`, index, callerRuleId);
  }

  for (const kind of ["i2c_compare_bytes", "i2c_write_bytes"]) {
    const bytesElement = action[kind];
    if (
      isJsonObject(bytesElement) &&
      Array.isArray(bytesElement.values) &&
      Array.isArray(bytesElement.masks) &&
      bytesElement.masks.length !== bytesElement.values.length
    ) {
      index.issues.push({
        instancePath: `${path}/${kind}/masks`,
        keyword: "maskCount",
        message: "Invalid number of elements in masks"
      });
    }
  }

  const ifElement = action.if;
  if (isJsonObject(ifElement)) {
    indexAction(ifElement.condition, `${path}/if/condition`, index, callerRuleId);
    indexActions(ifElement.then, `${path}/if/then`, index, callerRuleId);
    indexActions(ifElement.else, `${path}/if/else`, index, callerRuleId);
  }
}

function indexRuleIdOrActions(container: unknown, path: string, index: DocumentIndex): void {
  if (!isJsonObject(container)) {
    return;
  }

  if (Object.hasOwn(container, "rule_id")) {
    index.addReference("rule", container.rule_id, `${path}/rule_id`);
  }
  indexActions(container.actions, `${path}/actions`, index);
}

function indexDocument(document: Record<string, unknown>): DocumentIndex {
  const index = new DocumentIndex();

  const rules: unknown[] = Array.isArray(document.rules) ? document.rules : [];
  rules.forEach((rule, ruleIndex) => {
    if (!isJsonObject(rule)) {
      return;
    }

    const path = `/rules/${ruleIndex}`;
    index.registerId("rule", rule.id, `${path}/id`);
    if (typeof rule.id === "string" && !index.rulePaths.has(rule.id)) {
      index.rulePaths.set(rule.id, path);
    }
    indexActions(rule.actions, `${path}/actions`, index, typeof rule.id === "string" ? rule.id : undefined);
  });

  const chassisList: unknown[] = Array.isArray(document.chassis) ? document.chassis : [];
  chassisList.forEach((chassis, chassisIndex) => {
    if (!isJsonObject(chassis)) {
      return;
    }

    const devices: unknown[] = Array.isArray(chassis.devices) ? chassis.devices : [];
    devices.forEach((device, deviceIndex) => {
      if (!isJsonObject(device)) {
        return;
      }

      const devicePath = `/chassis/${chassisIndex}/devices/${deviceIndex}`;
      index.registerId("device", device.id, `${devicePath}/id`);
      indexRuleIdOrActions(device.presence_detection, `${devicePath}/presence_detection`, index);
      indexRuleIdOrActions(device.configuration, `${devicePath}/configuration`, index);

      const detection = device.phase_fault_detection;
      if (isJsonObject(detection) && Object.hasOwn(detection, "device_id")) {
        index.addReference("device", detection.device_id, `${devicePath}/phase_fault_detection/device_id`);
      }
      indexRuleIdOrActions(detection, `${devicePath}/phase_fault_detection`, index);

      const rails: unknown[] = Array.isArray(device.rails) ? device.rails : [];
      rails.forEach((rail, railIndex) => {
        if (!isJsonObject(rail)) {
          return;
        }

        const railPath = `${devicePath}/rails/${railIndex}`;
        index.registerId("rail", rail.id, `${railPath}/id`);
        indexRuleIdOrActions(rail.configuration, `${railPath}/configuration`, index);
        indexRuleIdOrActions(rail.sensor_monitoring, `${railPath}/sensor_monitoring`, index);
      });
    });
  });

  return index;
}

function checkReferences(index: DocumentIndex): ConfigValidationIssue[] {
  return index.references.flatMap((reference): ConfigValidationIssue[] => {
    if (reference.category === "rule" && !index.ruleIds.has(reference.id)) {
      return [
        {
          instancePath: reference.instancePath,
          keyword: "undefinedRule",
          message: `Undefined rule ID "${reference.id}"`
        }
      ];
    }
    if (reference.category === "device" && !index.deviceIds.has(reference.id)) {
      return [
        {
          instancePath: reference.instancePath,
          keyword: "undefinedDevice",
          message: `Undefined device ID "${reference.id}"`
        }
      ];
    }

    return [];
  });
}

// Depth-first search over run_rule calls. Each back edge is one cycle.
function checkRuleCycles(index: DocumentIndex): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];
  const finished = new Set<string>();
  const stack: string[] = [];

  const visit = (ruleId: string): void => {
    stack.push(ruleId);
    for (const calledId of index.ruleCalls.get(ruleId) ?? []) {
      if (!index.ruleIds.has(calledId) || finished.has(calledId)) {
        continue;
      }

      const cycleStart = stack.indexOf(calledId);
      if (cycleStart >= 0) {
        const cycle = [...stack.slice(cycleStart), calledId];
        issues.push({
          instancePath: index.rulePaths.get(calledId) ?? "",
          keyword: "ruleCycle",
          message: `Rule call cycle detected: ${cycle.join(" -> ")}`
        });
        continue;
      }

      visit(calledId);
    }
    stack.pop();
    finished.add(ruleId);
  };

  for (const ruleId of index.rulePaths.keys()) {
    if (!finished.has(ruleId)) {
      visit(ruleId);
    }
  }

  return issues;
}

// Schema validation runs first. Semantic checks assume a well-formed
// document, so they only run once the schema passes.
export function validateConfigDocument(document: unknown): ConfigValidationResult {
  const validator = getConfigValidator();
  const validationResult = validator(document);
  if (typeof validationResult !== "boolean") {
    return {
      valid: false,
      issues: [
        {
          instancePath: "",
          keyword: "$async",
          message: "async schema validators are not supported"
        }
      ]
    };
  }

  if (!validationResult || !isJsonObject(document)) {
    return { valid: false, issues: mapAjvIssues(validator.errors) };
  }

  const index = indexDocument(document);
  const issues = [...index.issues, ...checkReferences(index), ...checkRuleCycles(index)];
  return { valid: issues.length === 0, issues };
}

export function validateConfigFile(path: string): ConfigValidationResult {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigFileParserError(path, error);
  }

  return validateConfigDocument(document);
}
