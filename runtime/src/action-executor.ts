import type {
  Action,
  AndAction,
  ComparePresenceAction,
  CompareVpdAction,
  I2CCompareBitAction,
  I2CCompareByteAction,
  I2CCompareBytesAction,
  I2CWriteBitAction,
  I2CWriteByteAction,
  I2CWriteBytesAction,
  IfAction,
  OrAction,
  PMBusReadSensorAction,
  PMBusWriteVoutCommandAction,
  RunRuleAction
} from "./actions.ts";
import { ActionError, PMBusError, WriteVerificationError } from "./errors.ts";
import type { ExecutionContext } from "./execution-context.ts";
import { formatHexWord } from "./hex.ts";
import type { I2CInterface } from "./i2c-interface.ts";
import {
  VOUT_COMMAND,
  VOUT_MODE,
  convertFromLinear,
  convertFromVoutLinear,
  convertToVoutLinear,
  parseVoutMode
} from "./pmbus-utils.ts";
import type { Device, Rule } from "./topology.ts";

// Runs every action in order; the list's result is that of its last action.
export function executeActions(actions: ReadonlyArray<Action>, context: ExecutionContext): boolean {
  let result = true;
  for (const action of actions) {
    result = executeAction(action, context);
  }

  return result;
}

export function executeRule(rule: Rule, context: ExecutionContext): boolean {
  return executeActions(rule.actions, context);
}

export function executeAction(action: Action, context: ExecutionContext): boolean {
  switch (action.kind) {
    case "run_rule":
      return executeRunRule(action, context);
    case "compare_vpd":
      return withActionError(action, () => executeCompareVpd(action, context));
    case "compare_presence":
      return withActionError(action, () => executeComparePresence(action, context));
    case "i2c_write_bit":
      return withActionError(action, () => executeI2CWriteBit(action, context));
    case "i2c_write_byte":
      return withActionError(action, () => executeI2CWriteByte(action, context));
    case "i2c_write_bytes":
      return withActionError(action, () => executeI2CWriteBytes(action, context));
    case "i2c_compare_bit":
      return withActionError(action, () => executeI2CCompareBit(action, context));
    case "i2c_compare_byte":
      return withActionError(action, () => executeI2CCompareByte(action, context));
    case "i2c_compare_bytes":
      return withActionError(action, () => executeI2CCompareBytes(action, context));
    case "pmbus_write_vout_command":
      return withActionError(action, () => executePMBusWriteVoutCommand(action, context));
    case "pmbus_read_sensor":
      return withActionError(action, () => executePMBusReadSensor(action, context));
    case "set_device":
      context.setDeviceId(action.deviceId);
      return true;
    case "log_phase_fault":
      context.addPhaseFault(action.type);
      return true;
    case "and":
      return executeAnd(action, context);
    case "or":
      return executeOr(action, context);
    case "not":
      return !executeAction(action.action, context);
    case "if":
      return executeIf(action, context);
  }
}

function withActionError<T>(action: Action, operation: () => T): T {
  try {
    return operation();
  } catch (error) {
    if (error instanceof ActionError) {
      throw error;
    }
    throw new ActionError(action, { cause: error });
  }
}

// Rule lookup and depth failures are wrapped in an ActionError for this
// run_rule action. Failures inside the called rule already carry their own
// ActionError and pass through unchanged.
function executeRunRule(action: RunRuleAction, context: ExecutionContext): boolean {
  const rule = withActionError(action, () => context.getRule(action.ruleId));

  try {
    withActionError(action, () => context.incrementRuleDepth(action.ruleId));
    return executeRule(rule, context);
  } finally {
    context.decrementRuleDepth();
  }
}

function executeCompareVpd(action: CompareVpdAction, context: ExecutionContext): boolean {
  const actualValue = context.getServices().getVPD().getValue(action.fru, action.keyword);
  return actualValue === action.value;
}

function executeComparePresence(action: ComparePresenceAction, context: ExecutionContext): boolean {
  const isPresent = context.getServices().getPresenceService().isPresent(action.fru);
  return isPresent === action.value;
}

function getI2CInterface(device: Device, context: ExecutionContext): I2CInterface {
  const i2cInterface = device.i2cInterface;
  if (!i2cInterface.isOpen()) {
    i2cInterface.open(context.getServices().getI2CTransport());
  }

  return i2cInterface;
}

function getCurrentI2CInterface(context: ExecutionContext): I2CInterface {
  return getI2CInterface(context.getDevice(), context);
}

function executeI2CWriteBit(action: I2CWriteBitAction, context: ExecutionContext): boolean {
  const i2cInterface = getCurrentI2CInterface(context);
  const currentValue = i2cInterface.readByte(action.register);
  const bit = 1 << action.position;
  const newValue = action.value === 1 ? currentValue | bit : currentValue & ~bit;
  i2cInterface.writeByte(action.register, newValue);
  return true;
}

function applyMask(currentValue: number, value: number, mask: number): number {
  return ((currentValue & ~mask) | (value & mask)) & 0xff;
}

function executeI2CWriteByte(action: I2CWriteByteAction, context: ExecutionContext): boolean {
  const i2cInterface = getCurrentI2CInterface(context);
  if (action.mask === undefined || action.mask === 0xff) {
    i2cInterface.writeByte(action.register, action.value);
    return true;
  }

  const currentValue = i2cInterface.readByte(action.register);
  i2cInterface.writeByte(action.register, applyMask(currentValue, action.value, action.mask));
  return true;
}

function executeI2CWriteBytes(action: I2CWriteBytesAction, context: ExecutionContext): boolean {
  const i2cInterface = getCurrentI2CInterface(context);
  if (action.masks.length === 0) {
    i2cInterface.writeBytes(action.register, action.values);
    return true;
  }

  const currentValues = i2cInterface.readBytes(action.register, action.values.length);
  const newValues = action.values.map((value, index) =>
    applyMask(currentValues[index] ?? 0, value, action.masks[index] ?? 0xff)
  );
  i2cInterface.writeBytes(action.register, newValues);
  return true;
}

function executeI2CCompareBit(action: I2CCompareBitAction, context: ExecutionContext): boolean {
  const actualValue = getCurrentI2CInterface(context).readByte(action.register);
  return ((actualValue >> action.position) & 0x01) === action.value;
}

function executeI2CCompareByte(action: I2CCompareByteAction, context: ExecutionContext): boolean {
  const mask = action.mask ?? 0xff;
  const actualValue = getCurrentI2CInterface(context).readByte(action.register);
  return (actualValue & mask) === (action.value & mask);
}

function executeI2CCompareBytes(action: I2CCompareBytesAction, context: ExecutionContext): boolean {
  const actualValues = getCurrentI2CInterface(context).readBytes(
    action.register,
    action.values.length
  );

  return action.values.every((value, index) => {
    const mask = action.masks[index] ?? 0xff;
    return ((actualValues[index] ?? 0) & mask) === (value & mask);
  });
}

function readVoutModeExponent(device: Device, i2cInterface: I2CInterface): number {
  const voutMode = parseVoutMode(i2cInterface.readByte(VOUT_MODE));
  if (voutMode.format !== "linear") {
    throw new PMBusError("VOUT_MODE contains unsupported data format", device.id, device.fru);
  }

  return voutMode.parameter;
}

function executePMBusWriteVoutCommand(
  action: PMBusWriteVoutCommandAction,
  context: ExecutionContext
): boolean {
  const volts = action.volts ?? context.getVolts();
  if (volts === undefined) {
    throw new ActionError(action, { detail: "No volts value defined" });
  }

  const device = context.getDevice();
  const i2cInterface = getI2CInterface(device, context);
  const exponent = action.exponent ?? readVoutModeExponent(device, i2cInterface);
  const linearValue = convertToVoutLinear(volts, exponent);
  i2cInterface.writeWord(VOUT_COMMAND, linearValue);

  if (action.isVerified) {
    const readValue = i2cInterface.readWord(VOUT_COMMAND);
    if (readValue !== linearValue) {
      throw new WriteVerificationError(
        `value_written: ${formatHexWord(linearValue)}, value_read: ${formatHexWord(readValue)}`,
        device.id,
        device.fru
      );
    }
  }

  return true;
}

function executePMBusReadSensor(action: PMBusReadSensorAction, context: ExecutionContext): boolean {
  const device = context.getDevice();
  const i2cInterface = getI2CInterface(device, context);
  const rawValue = i2cInterface.readWord(action.command);

  let value: number;
  if (action.format === "linear_11") {
    value = convertFromLinear(rawValue);
  } else {
    const exponent = action.exponent ?? readVoutModeExponent(device, i2cInterface);
    value = convertFromVoutLinear(rawValue, exponent);
  }

  context.getServices().getSensors().setValue(action.type, value);
  return true;
}

// and/or run every sub-action; there is no short circuit.
function executeAnd(action: AndAction, context: ExecutionContext): boolean {
  let result = true;
  for (const subAction of action.actions) {
    if (!executeAction(subAction, context)) {
      result = false;
    }
  }

  return result;
}

function executeOr(action: OrAction, context: ExecutionContext): boolean {
  let result = false;
  for (const subAction of action.actions) {
    if (executeAction(subAction, context)) {
      result = true;
    }
  }

  return result;
}

function executeIf(action: IfAction, context: ExecutionContext): boolean {
  if (executeAction(action.condition, context)) {
    return executeActions(action.thenActions, context);
  }

  if (action.elseActions.length > 0) {
    return executeActions(action.elseActions, context);
  }

  return false;
}
