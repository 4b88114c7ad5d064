import { IdNotFoundError, type IdCategory } from "./errors.ts";
import type { Chassis, Device, Rail, Rule } from "./topology.ts";

function lookup<T>(entries: ReadonlyMap<string, T>, category: IdCategory, id: string): T {
  const entry = entries.get(id);
  if (entry === undefined) {
    throw new IdNotFoundError(category, id);
  }

  return entry;
}

// Holds references only; the rule list and chassis tree own the entities.
// Registering an id twice replaces the earlier entry.
export class IdMap {
  private readonly devices = new Map<string, Device>();
  private readonly rules = new Map<string, Rule>();
  private readonly rails = new Map<string, Rail>();

  addDevice(device: Device): void {
    this.devices.set(device.id, device);
  }

  addRule(rule: Rule): void {
    this.rules.set(rule.id, rule);
  }

  addRail(rail: Rail): void {
    this.rails.set(rail.id, rail);
  }

  getDevice(id: string): Device {
    return lookup(this.devices, "device", id);
  }

  getRule(id: string): Rule {
    return lookup(this.rules, "rule", id);
  }

  getRail(id: string): Rail {
    return lookup(this.rails, "rail", id);
  }
}

export function createIdMap(
  rules: ReadonlyArray<Rule>,
  chassis: ReadonlyArray<Chassis>
): IdMap {
  const idMap = new IdMap();
  for (const rule of rules) {
    idMap.addRule(rule);
  }

  for (const entry of chassis) {
    for (const device of entry.devices) {
      idMap.addDevice(device);
      for (const rail of device.rails) {
        idMap.addRail(rail);
      }
    }
  }

  return idMap;
}
