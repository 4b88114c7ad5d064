import { readFileSync } from "node:fs";

import {
  ACTION_KINDS,
  ConfigFileParserError,
  I2CInterface,
  InvalidConfigurationError,
  expandRuleIdOrActions,
  isPhaseFaultType,
  isSensorDataFormat,
  isSensorType,
  type Action,
  type ActionKind,
  type AndAction,
  type Chassis,
  type ComparePresenceAction,
  type CompareVpdAction,
  type Configuration,
  type Device,
  type I2CCompareBitAction,
  type I2CCompareByteAction,
  type I2CCompareBytesAction,
  type I2CWriteBitAction,
  type I2CWriteByteAction,
  type I2CWriteBytesAction,
  type IfAction,
  type LogPhaseFaultAction,
  type NotAction,
  type OrAction,
  type PhaseFaultDetection,
  type PMBusReadSensorAction,
  type PMBusWriteVoutCommandAction,
  type PresenceDetection,
  type Rail,
  type Rule,
  type RunRuleAction,
  type SensorMonitoring,
  type SetDeviceAction
} from "vreg-runtime";

import {
  getRequiredProperty,
  parseBitPosition,
  parseBitValue,
  parseBoolean,
  parseDouble,
  parseHexByte,
  parseHexByteArray,
  parseInt8,
  parseString,
  parseUint8,
  parseUnsignedInteger,
  verifyIsArray,
  verifyIsObject,
  verifyPropertyCount,
  type JsonObject
} from "./value-parsers.ts";

export interface ConfigFileContents {
  rules: Rule[];
  chassis: Chassis[];
}

function fail(message: string): never {
  throw new InvalidConfigurationError(message);
}

function hasProperty(element: JsonObject, name: string): boolean {
  return Object.hasOwn(element, name);
}

// Counts the optional comments property, which is never validated.
function countComments(element: JsonObject): number {
  return hasProperty(element, "comments") ? 1 : 0;
}

export function parseConfigFile(path: string): ConfigFileContents {
  try {
    const text = readFileSync(path, "utf8");
    const document: unknown = JSON.parse(text);
    return parseRoot(document);
  } catch (error) {
    throw new ConfigFileParserError(path, error);
  }
}

export function parseRoot(element: unknown): ConfigFileContents {
  const root = verifyIsObject(element);
  let propertyCount = countComments(root);

  let rules: Rule[] = [];
  if (hasProperty(root, "rules")) {
    rules = parseRuleArray(root.rules);
    propertyCount += 1;
  }

  const chassis = parseChassisArray(getRequiredProperty(root, "chassis"));
  propertyCount += 1;

  verifyPropertyCount(root, propertyCount);
  return { rules, chassis };
}

export function parseRuleArray(element: unknown): Rule[] {
  return verifyIsArray(element).map((entry) => parseRule(entry));
}

export function parseRule(element: unknown): Rule {
  const rule = verifyIsObject(element);
  let propertyCount = countComments(rule);

  const id = parseString(getRequiredProperty(rule, "id"));
  propertyCount += 1;

  const actions = parseActionArray(getRequiredProperty(rule, "actions"));
  if (actions.length === 0) {
    fail("Array must contain at least one action");
  }
  propertyCount += 1;

  verifyPropertyCount(rule, propertyCount);
  return { id, actions };
}

export function parseChassisArray(element: unknown): Chassis[] {
  return verifyIsArray(element).map((entry) => parseChassis(entry));
}

export function parseChassis(element: unknown): Chassis {
  const chassis = verifyIsObject(element);
  let propertyCount = countComments(chassis);

  const number = parseUnsignedInteger(getRequiredProperty(chassis, "number"));
  if (number < 1) {
    fail("Invalid chassis number: Must be > 0");
  }
  propertyCount += 1;

  let devices: Device[] = [];
  if (hasProperty(chassis, "devices")) {
    devices = parseDeviceArray(chassis.devices);
    propertyCount += 1;
  }

  verifyPropertyCount(chassis, propertyCount);
  return { number, devices };
}

export function parseDeviceArray(element: unknown): Device[] {
  return verifyIsArray(element).map((entry) => parseDevice(entry));
}

export function parseDevice(element: unknown): Device {
  const device = verifyIsObject(element);
  let propertyCount = countComments(device);

  const id = parseString(getRequiredProperty(device, "id"));
  const isRegulator = parseBoolean(getRequiredProperty(device, "is_regulator"));
  const fru = parseString(getRequiredProperty(device, "fru"));
  const i2cInterface = parseI2CInterface(getRequiredProperty(device, "i2c_interface"));
  propertyCount += 4;

  let presenceDetection: PresenceDetection | undefined;
  if (hasProperty(device, "presence_detection")) {
    presenceDetection = parsePresenceDetection(device.presence_detection);
    propertyCount += 1;
  }

  let configuration: Configuration | undefined;
  if (hasProperty(device, "configuration")) {
    configuration = parseConfiguration(device.configuration);
    propertyCount += 1;
  }

  let phaseFaultDetection: PhaseFaultDetection | undefined;
  if (hasProperty(device, "phase_fault_detection")) {
    phaseFaultDetection = parsePhaseFaultDetection(device.phase_fault_detection);
    propertyCount += 1;
  }

  let rails: Rail[] = [];
  if (hasProperty(device, "rails")) {
    if (!isRegulator && verifyIsArray(device.rails).length > 0) {
      fail("Invalid rails property when is_regulator is false");
    }
    rails = parseRailArray(device.rails);
    propertyCount += 1;
  }

  verifyPropertyCount(device, propertyCount);
  return {
    id,
    isRegulator,
    fru,
    i2cInterface,
    ...(presenceDetection !== undefined ? { presenceDetection } : {}),
    ...(configuration !== undefined ? { configuration } : {}),
    ...(phaseFaultDetection !== undefined ? { phaseFaultDetection } : {}),
    rails
  };
}

export function parseI2CInterface(element: unknown): I2CInterface {
  const i2cInterface = verifyIsObject(element);
  let propertyCount = countComments(i2cInterface);

  const bus = parseUint8(getRequiredProperty(i2cInterface, "bus"));
  const address = parseHexByte(getRequiredProperty(i2cInterface, "address"));
  propertyCount += 2;

  verifyPropertyCount(i2cInterface, propertyCount);
  return new I2CInterface(bus, address);
}

export function parseRailArray(element: unknown): Rail[] {
  return verifyIsArray(element).map((entry) => parseRail(entry));
}

export function parseRail(element: unknown): Rail {
  const rail = verifyIsObject(element);
  let propertyCount = countComments(rail);

  const id = parseString(getRequiredProperty(rail, "id"));
  propertyCount += 1;

  let configuration: Configuration | undefined;
  if (hasProperty(rail, "configuration")) {
    configuration = parseConfiguration(rail.configuration);
    propertyCount += 1;
  }

  let sensorMonitoring: SensorMonitoring | undefined;
  if (hasProperty(rail, "sensor_monitoring")) {
    sensorMonitoring = parseSensorMonitoring(rail.sensor_monitoring);
    propertyCount += 1;
  }

  verifyPropertyCount(rail, propertyCount);
  return {
    id,
    ...(configuration !== undefined ? { configuration } : {}),
    ...(sensorMonitoring !== undefined ? { sensorMonitoring } : {})
  };
}

// Exactly one of rule_id and actions must be present. A rule_id becomes a
// single run_rule action.
export function parseRuleIdOrActionsProperty(element: unknown): Action[] {
  const container = verifyIsObject(element);
  const ruleIdExists = hasProperty(container, "rule_id");
  const actionsExist = hasProperty(container, "actions");
  if (ruleIdExists === actionsExist) {
    fail("Invalid property combination: Must contain either rule_id or actions");
  }

  if (ruleIdExists) {
    return [...expandRuleIdOrActions({ ruleId: parseString(container.rule_id) })];
  }

  return parseActionArray(container.actions);
}

export function parseConfiguration(element: unknown): Configuration {
  const configuration = verifyIsObject(element);
  let propertyCount = countComments(configuration);

  let volts: number | undefined;
  if (hasProperty(configuration, "volts")) {
    volts = parseDouble(configuration.volts);
    propertyCount += 1;
  }

  const actions = parseRuleIdOrActionsProperty(configuration);
  propertyCount += 1;

  verifyPropertyCount(configuration, propertyCount);
  return volts === undefined ? { actions } : { volts, actions };
}

export function parseSensorMonitoring(element: unknown): SensorMonitoring {
  const sensorMonitoring = verifyIsObject(element);
  let propertyCount = countComments(sensorMonitoring);

  const actions = parseRuleIdOrActionsProperty(sensorMonitoring);
  propertyCount += 1;

  verifyPropertyCount(sensorMonitoring, propertyCount);
  return { actions };
}

export function parsePresenceDetection(element: unknown): PresenceDetection {
  const presenceDetection = verifyIsObject(element);
  let propertyCount = countComments(presenceDetection);

  const actions = parseRuleIdOrActionsProperty(presenceDetection);
  propertyCount += 1;

  verifyPropertyCount(presenceDetection, propertyCount);
  return { actions };
}

export function parsePhaseFaultDetection(element: unknown): PhaseFaultDetection {
  const phaseFaultDetection = verifyIsObject(element);
  let propertyCount = countComments(phaseFaultDetection);

  let deviceId: string | undefined;
  if (hasProperty(phaseFaultDetection, "device_id")) {
    deviceId = parseString(phaseFaultDetection.device_id);
    propertyCount += 1;
  }

  const actions = parseRuleIdOrActionsProperty(phaseFaultDetection);
  propertyCount += 1;

  verifyPropertyCount(phaseFaultDetection, propertyCount);
  return deviceId === undefined ? { actions } : { deviceId, actions };
}

export function parseActionArray(element: unknown): Action[] {
  return verifyIsArray(element).map((entry) => parseAction(entry));
}

type ActionTypeParser = (element: unknown) => Action;

const ACTION_TYPE_PARSERS: Record<ActionKind, ActionTypeParser> = {
  and: (element) => parseAnd(element),
  compare_presence: (element) => parseComparePresence(element),
  compare_vpd: (element) => parseCompareVpd(element),
  i2c_compare_bit: (element) => parseI2CCompareBit(element),
  i2c_compare_byte: (element) => parseI2CCompareByte(element),
  i2c_compare_bytes: (element) => parseI2CCompareBytes(element),
  i2c_write_bit: (element) => parseI2CWriteBit(element),
  i2c_write_byte: (element) => parseI2CWriteByte(element),
  i2c_write_bytes: (element) => parseI2CWriteBytes(element),
  if: (element) => parseIf(element),
  log_phase_fault: (element) => parseLogPhaseFault(element),
  not: (element) => parseNot(element),
  or: (element) => parseOr(element),
  pmbus_read_sensor: (element) => parsePMBusReadSensor(element),
  pmbus_write_vout_command: (element) => parsePMBusWriteVoutCommand(element),
  run_rule: (element) => parseRunRule(element),
  set_device: (element) => parseSetDevice(element)
};

// The first action type key found, in ACTION_KINDS order, wins. A second one
// is left uncounted and fails the property count check.
export function parseAction(element: unknown): Action {
  const actionElement = verifyIsObject(element);
  let propertyCount = countComments(actionElement);

  const kind = ACTION_KINDS.find((candidate) => hasProperty(actionElement, candidate));
  if (kind === undefined) {
    fail("Required action type property missing");
  }

  const action = ACTION_TYPE_PARSERS[kind](actionElement[kind]);
  propertyCount += 1;

  verifyPropertyCount(actionElement, propertyCount);
  return action;
}

function parseActionList(element: unknown): Action[] {
  const actions = parseActionArray(element);
  if (actions.length < 2) {
    fail("Array must contain two or more actions");
  }

  return actions;
}

export function parseAnd(element: unknown): AndAction {
  return { kind: "and", actions: parseActionList(element) };
}

export function parseOr(element: unknown): OrAction {
  return { kind: "or", actions: parseActionList(element) };
}

export function parseNot(element: unknown): NotAction {
  return { kind: "not", action: parseAction(element) };
}

export function parseIf(element: unknown): IfAction {
  const ifElement = verifyIsObject(element);
  let propertyCount = countComments(ifElement);

  const condition = parseAction(getRequiredProperty(ifElement, "condition"));
  const thenActions = parseActionArray(getRequiredProperty(ifElement, "then"));
  propertyCount += 2;

  let elseActions: Action[] = [];
  if (hasProperty(ifElement, "else")) {
    elseActions = parseActionArray(ifElement.else);
    propertyCount += 1;
  }

  verifyPropertyCount(ifElement, propertyCount);
  return { kind: "if", condition, thenActions, elseActions };
}

export function parseComparePresence(element: unknown): ComparePresenceAction {
  const compareElement = verifyIsObject(element);
  const fru = parseString(getRequiredProperty(compareElement, "fru"));
  const value = parseBoolean(getRequiredProperty(compareElement, "value"));

  verifyPropertyCount(compareElement, 2);
  return { kind: "compare_presence", fru, value };
}

export function parseCompareVpd(element: unknown): CompareVpdAction {
  const compareElement = verifyIsObject(element);
  const fru = parseString(getRequiredProperty(compareElement, "fru"));
  const keyword = parseString(getRequiredProperty(compareElement, "keyword"));
  const value = parseString(getRequiredProperty(compareElement, "value"), true);

  verifyPropertyCount(compareElement, 3);
  return { kind: "compare_vpd", fru, keyword, value };
}

function parseBitFields(element: unknown): { register: number; position: number; value: number } {
  const bitElement = verifyIsObject(element);
  const register = parseHexByte(getRequiredProperty(bitElement, "register"));
  const position = parseBitPosition(getRequiredProperty(bitElement, "position"));
  const value = parseBitValue(getRequiredProperty(bitElement, "value"));

  verifyPropertyCount(bitElement, 3);
  return { register, position, value };
}

function parseByteFields(element: unknown): { register: number; value: number; mask?: number } {
  const byteElement = verifyIsObject(element);
  let propertyCount = 0;

  const register = parseHexByte(getRequiredProperty(byteElement, "register"));
  const value = parseHexByte(getRequiredProperty(byteElement, "value"));
  propertyCount += 2;

  let mask: number | undefined;
  if (hasProperty(byteElement, "mask")) {
    mask = parseHexByte(byteElement.mask);
    propertyCount += 1;
  }

  verifyPropertyCount(byteElement, propertyCount);
  return mask === undefined ? { register, value } : { register, value, mask };
}

function parseBytesFields(element: unknown): { register: number; values: number[]; masks: number[] } {
  const bytesElement = verifyIsObject(element);
  let propertyCount = 0;

  const register = parseHexByte(getRequiredProperty(bytesElement, "register"));
  const values = parseHexByteArray(getRequiredProperty(bytesElement, "values"));
  propertyCount += 2;

  let masks: number[] = [];
  if (hasProperty(bytesElement, "masks")) {
    masks = parseHexByteArray(bytesElement.masks);
    if (masks.length !== values.length) {
      fail("Invalid number of elements in masks");
    }
    propertyCount += 1;
  }

  verifyPropertyCount(bytesElement, propertyCount);
  return { register, values, masks };
}

export function parseI2CCompareBit(element: unknown): I2CCompareBitAction {
  return { kind: "i2c_compare_bit", ...parseBitFields(element) };
}

export function parseI2CCompareByte(element: unknown): I2CCompareByteAction {
  return { kind: "i2c_compare_byte", ...parseByteFields(element) };
}

export function parseI2CCompareBytes(element: unknown): I2CCompareBytesAction {
  return { kind: "i2c_compare_bytes", ...parseBytesFields(element) };
}

export function parseI2CWriteBit(element: unknown): I2CWriteBitAction {
  return { kind: "i2c_write_bit", ...parseBitFields(element) };
}

export function parseI2CWriteByte(element: unknown): I2CWriteByteAction {
  return { kind: "i2c_write_byte", ...parseByteFields(element) };
}

export function parseI2CWriteBytes(element: unknown): I2CWriteBytesAction {
  return { kind: "i2c_write_bytes", ...parseBytesFields(element) };
}

export function parseLogPhaseFault(element: unknown): LogPhaseFaultAction {
  const logElement = verifyIsObject(element);
  const type = parseString(getRequiredProperty(logElement, "type"));
  if (!isPhaseFaultType(type)) {
    fail(`Invalid phase fault type: ${type}`);
  }

  verifyPropertyCount(logElement, 1);
  return { kind: "log_phase_fault", type };
}

export function parsePMBusReadSensor(element: unknown): PMBusReadSensorAction {
  const sensorElement = verifyIsObject(element);
  let propertyCount = 0;

  const type = parseString(getRequiredProperty(sensorElement, "type"));
  if (!isSensorType(type)) {
    fail(`Invalid sensor type value: ${type}`);
  }
  const command = parseHexByte(getRequiredProperty(sensorElement, "command"));
  const format = parseString(getRequiredProperty(sensorElement, "format"));
  if (!isSensorDataFormat(format)) {
    fail(`Invalid format value: ${format}`);
  }
  propertyCount += 3;

  let exponent: number | undefined;
  if (hasProperty(sensorElement, "exponent")) {
    exponent = parseInt8(sensorElement.exponent);
    propertyCount += 1;
  }

  verifyPropertyCount(sensorElement, propertyCount);
  return exponent === undefined
    ? { kind: "pmbus_read_sensor", type, command, format }
    : { kind: "pmbus_read_sensor", type, command, format, exponent };
}

export function parsePMBusWriteVoutCommand(element: unknown): PMBusWriteVoutCommandAction {
  const commandElement = verifyIsObject(element);
  let propertyCount = 0;

  let volts: number | undefined;
  if (hasProperty(commandElement, "volts")) {
    volts = parseDouble(commandElement.volts);
    propertyCount += 1;
  }

  const format = parseString(getRequiredProperty(commandElement, "format"));
  if (format !== "linear") {
    fail(`Invalid format value: ${format}`);
  }
  propertyCount += 1;

  let exponent: number | undefined;
  if (hasProperty(commandElement, "exponent")) {
    exponent = parseInt8(commandElement.exponent);
    propertyCount += 1;
  }

  let isVerified = false;
  if (hasProperty(commandElement, "is_verified")) {
    isVerified = parseBoolean(commandElement.is_verified);
    propertyCount += 1;
  }

  verifyPropertyCount(commandElement, propertyCount);
  return {
    kind: "pmbus_write_vout_command",
    ...(volts !== undefined ? { volts } : {}),
    format,
    ...(exponent !== undefined ? { exponent } : {}),
    isVerified
  };
}

export function parseRunRule(element: unknown): RunRuleAction {
  return { kind: "run_rule", ruleId: parseString(element) };
}

export function parseSetDevice(element: unknown): SetDeviceAction {
  return { kind: "set_device", deviceId: parseString(element) };
}
