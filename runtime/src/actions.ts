import { formatHexByte, formatHexByteList } from "./hex.ts";
import type { SensorDataFormat, SensorType, VoutDataFormat } from "./pmbus-utils.ts";

export const PHASE_FAULT_TYPES = ["n", "n+1"] as const;
export type PhaseFaultType = (typeof PHASE_FAULT_TYPES)[number];

export interface RunRuleAction {
  readonly kind: "run_rule";
  readonly ruleId: string;
}

export interface CompareVpdAction {
  readonly kind: "compare_vpd";
  readonly fru: string;
  readonly keyword: string;
  readonly value: string;
}

export interface ComparePresenceAction {
  readonly kind: "compare_presence";
  readonly fru: string;
  readonly value: boolean;
}

export interface I2CWriteBitAction {
  readonly kind: "i2c_write_bit";
  readonly register: number;
  readonly position: number;
  readonly value: number;
}

export interface I2CWriteByteAction {
  readonly kind: "i2c_write_byte";
  readonly register: number;
  readonly value: number;
  readonly mask?: number;
}

export interface I2CWriteBytesAction {
  readonly kind: "i2c_write_bytes";
  readonly register: number;
  readonly values: ReadonlyArray<number>;
  readonly masks: ReadonlyArray<number>;
}

export interface I2CCompareBitAction {
  readonly kind: "i2c_compare_bit";
  readonly register: number;
  readonly position: number;
  readonly value: number;
}

export interface I2CCompareByteAction {
  readonly kind: "i2c_compare_byte";
  readonly register: number;
  readonly value: number;
  readonly mask?: number;
}

export interface I2CCompareBytesAction {
  readonly kind: "i2c_compare_bytes";
  readonly register: number;
  readonly values: ReadonlyArray<number>;
  readonly masks: ReadonlyArray<number>;
}

export interface PMBusWriteVoutCommandAction {
  readonly kind: "pmbus_write_vout_command";
  readonly volts?: number;
  // Only the linear VOUT_MODE format can be written.
  readonly format: Extract<VoutDataFormat, "linear">;
  readonly exponent?: number;
  readonly isVerified: boolean;
}

export interface PMBusReadSensorAction {
  readonly kind: "pmbus_read_sensor";
  readonly type: SensorType;
  readonly command: number;
  readonly format: SensorDataFormat;
  readonly exponent?: number;
}

export interface SetDeviceAction {
  readonly kind: "set_device";
  readonly deviceId: string;
}

export interface LogPhaseFaultAction {
  readonly kind: "log_phase_fault";
  readonly type: PhaseFaultType;
}

export interface AndAction {
  readonly kind: "and";
  readonly actions: ReadonlyArray<Action>;
}

export interface OrAction {
  readonly kind: "or";
  readonly actions: ReadonlyArray<Action>;
}

export interface NotAction {
  readonly kind: "not";
  readonly action: Action;
}

export interface IfAction {
  readonly kind: "if";
  readonly condition: Action;
  readonly thenActions: ReadonlyArray<Action>;
  readonly elseActions: ReadonlyArray<Action>;
}

export type Action =
  | RunRuleAction
  | CompareVpdAction
  | ComparePresenceAction
  | I2CWriteBitAction
  | I2CWriteByteAction
  | I2CWriteBytesAction
  | I2CCompareBitAction
  | I2CCompareByteAction
  | I2CCompareBytesAction
  | PMBusWriteVoutCommandAction
  | PMBusReadSensorAction
  | SetDeviceAction
  | LogPhaseFaultAction
  | AndAction
  | OrAction
  | NotAction
  | IfAction;

export type ActionKind = Action["kind"];

export const ACTION_KINDS: ReadonlyArray<ActionKind> = [
  "and",
  "compare_presence",
  "compare_vpd",
  "i2c_compare_bit",
  "i2c_compare_byte",
  "i2c_compare_bytes",
  "i2c_write_bit",
  "i2c_write_byte",
  "i2c_write_bytes",
  "if",
  "log_phase_fault",
  "not",
  "or",
  "pmbus_read_sensor",
  "pmbus_write_vout_command",
  "run_rule",
  "set_device"
];

export function isPhaseFaultType(value: string): value is PhaseFaultType {
  return (PHASE_FAULT_TYPES as ReadonlyArray<string>).includes(value);
}

function describeMask(mask: number | undefined): string {
  return mask === undefined ? "" : `, mask: ${formatHexByte(mask)}`;
}

function describeActionList(actions: ReadonlyArray<Action>): string {
  return `[ ${actions.map((action) => describeAction(action)).join(", ")} ]`;
}

export function describeAction(action: Action): string {
  switch (action.kind) {
    case "run_rule":
      return `run_rule: ${action.ruleId}`;
    case "compare_vpd":
      return `compare_vpd: { fru: ${action.fru}, keyword: ${action.keyword}, value: ${action.value} }`;
    case "compare_presence":
      return `compare_presence: { fru: ${action.fru}, value: ${String(action.value)} }`;
    case "i2c_write_bit":
    case "i2c_compare_bit":
      return `${action.kind}: { register: ${formatHexByte(action.register)}, position: ${action.position}, value: ${action.value} }`;
    case "i2c_write_byte":
    case "i2c_compare_byte":
      return `${action.kind}: { register: ${formatHexByte(action.register)}, value: ${formatHexByte(action.value)}${describeMask(action.mask)} }`;
    case "i2c_write_bytes":
    case "i2c_compare_bytes":
      return `${action.kind}: { register: ${formatHexByte(action.register)}, values: ${formatHexByteList(action.values)}, masks: ${formatHexByteList(action.masks)} }`;
    case "pmbus_write_vout_command": {
      const parts: string[] = [];
      if (action.volts !== undefined) {
        parts.push(`volts: ${action.volts}`);
      }
      parts.push(`format: ${action.format}`);
      if (action.exponent !== undefined) {
        parts.push(`exponent: ${action.exponent}`);
      }
      parts.push(`is_verified: ${String(action.isVerified)}`);
      return `pmbus_write_vout_command: { ${parts.join(", ")} }`;
    }
    case "pmbus_read_sensor": {
      const exponent = action.exponent === undefined ? "" : `, exponent: ${action.exponent}`;
      return `pmbus_read_sensor: { type: ${action.type}, command: ${formatHexByte(action.command)}, format: ${action.format}${exponent} }`;
    }
    case "set_device":
      return `set_device: ${action.deviceId}`;
    case "log_phase_fault":
      return `log_phase_fault: { type: ${action.type} }`;
    case "and":
    case "or":
      return `${action.kind}: ${describeActionList(action.actions)}`;
    case "not":
      return `not: { ${describeAction(action.action)} }`;
    case "if": {
      const elsePart =
        action.elseActions.length > 0 ? `, else: ${describeActionList(action.elseActions)}` : "";
      return `if: { condition: { ${describeAction(action.condition)} }, then: ${describeActionList(action.thenActions)}${elsePart} }`;
    }
  }
}
