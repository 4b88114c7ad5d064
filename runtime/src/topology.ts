import type { Action } from "./actions.ts";
import type { I2CInterface } from "./i2c-interface.ts";

export interface Rule {
  readonly id: string;
  readonly actions: ReadonlyArray<Action>;
}

export interface Configuration {
  readonly volts?: number;
  readonly actions: ReadonlyArray<Action>;
}

export interface SensorMonitoring {
  readonly actions: ReadonlyArray<Action>;
}

export interface PresenceDetection {
  readonly actions: ReadonlyArray<Action>;
}

export interface PhaseFaultDetection {
  // Device the detection actions run against; defaults to the owning device.
  readonly deviceId?: string;
  readonly actions: ReadonlyArray<Action>;
}

export interface Rail {
  readonly id: string;
  readonly configuration?: Configuration;
  readonly sensorMonitoring?: SensorMonitoring;
}

export interface Device {
  readonly id: string;
  readonly isRegulator: boolean;
  readonly fru: string;
  readonly i2cInterface: I2CInterface;
  readonly presenceDetection?: PresenceDetection;
  readonly configuration?: Configuration;
  readonly phaseFaultDetection?: PhaseFaultDetection;
  readonly rails: ReadonlyArray<Rail>;
}

export interface Chassis {
  readonly number: number;
  readonly devices: ReadonlyArray<Device>;
}

export type RuleIdOrActions = { ruleId: string } | { actions: ReadonlyArray<Action> };

// A rule reference becomes a single run_rule action so every action list is
// executed the same way.
export function expandRuleIdOrActions(source: RuleIdOrActions): ReadonlyArray<Action> {
  if ("ruleId" in source) {
    return [{ kind: "run_rule", ruleId: source.ruleId }];
  }

  return source.actions;
}
