import type { PhaseFaultType } from "./actions.ts";
import { RuleDepthError } from "./errors.ts";
import type { IdMap } from "./id-map.ts";
import type { Services } from "./services.ts";
import type { Device, Rule } from "./topology.ts";

export const MAX_RULE_DEPTH = 30;

// Mutable state for one configure/monitor operation. A context belongs to a
// single call tree and is discarded when that operation ends.
export class ExecutionContext {
  static readonly maxRuleDepth = MAX_RULE_DEPTH;

  private readonly idMap: IdMap;
  private readonly services: Services;
  private deviceId: string;
  private ruleDepth = 0;
  private readonly phaseFaults = new Set<PhaseFaultType>();
  private readonly additionalErrorData = new Map<string, string>();
  private volts: number | undefined;

  constructor(idMap: IdMap, deviceId: string, services: Services) {
    this.idMap = idMap;
    this.deviceId = deviceId;
    this.services = services;
  }

  getIdMap(): IdMap {
    return this.idMap;
  }

  getServices(): Services {
    return this.services;
  }

  getDevice(): Device {
    return this.idMap.getDevice(this.deviceId);
  }

  getDeviceId(): string {
    return this.deviceId;
  }

  setDeviceId(deviceId: string): void {
    this.deviceId = deviceId;
  }

  getRule(id: string): Rule {
    return this.idMap.getRule(id);
  }

  getRuleDepth(): number {
    return this.ruleDepth;
  }

  // The counter stays incremented when this throws; callers release it with
  // decrementRuleDepth in a finally block.
  incrementRuleDepth(ruleId: string): void {
    this.ruleDepth += 1;
    if (this.ruleDepth > ExecutionContext.maxRuleDepth) {
      throw new RuleDepthError(ruleId);
    }
  }

  decrementRuleDepth(): void {
    if (this.ruleDepth > 0) {
      this.ruleDepth -= 1;
    }
  }

  addPhaseFault(type: PhaseFaultType): void {
    this.phaseFaults.add(type);
  }

  getPhaseFaults(): ReadonlySet<PhaseFaultType> {
    return this.phaseFaults;
  }

  addAdditionalErrorData(key: string, value: string): void {
    this.additionalErrorData.set(key, value);
  }

  getAdditionalErrorData(): ReadonlyMap<string, string> {
    return this.additionalErrorData;
  }

  getVolts(): number | undefined {
    return this.volts;
  }

  setVolts(volts: number): void {
    this.volts = volts;
  }
}
