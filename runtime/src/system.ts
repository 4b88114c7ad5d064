import { PHASE_FAULT_TYPES, type PhaseFaultType } from "./actions.ts";
import { executeActions } from "./action-executor.ts";
import { DeglitchCounter } from "./deglitch.ts";
import { ErrorHistory, reportError } from "./error-reporting.ts";
import { ExecutionContext } from "./execution-context.ts";
import { createIdMap, type IdMap } from "./id-map.ts";
import type { Services } from "./services.ts";
import type { Chassis, Configuration, Device, Rail, Rule } from "./topology.ts";

export const PHASE_FAULT_DETECTION_THRESHOLD = 2;

export interface System {
  readonly rules: ReadonlyArray<Rule>;
  readonly chassis: ReadonlyArray<Chassis>;
  readonly idMap: IdMap;
}

export function createSystem(rules: ReadonlyArray<Rule>, chassis: ReadonlyArray<Chassis>): System {
  return {
    rules,
    chassis,
    idMap: createIdMap(rules, chassis)
  };
}

function* listDevices(system: System): Generator<Device> {
  for (const chassis of system.chassis) {
    yield* chassis.devices;
  }
}

// A device without presence detection is always present. A detection that
// fails is reported and the device is treated as present.
export function isDevicePresent(system: System, device: Device, services: Services): boolean {
  if (device.presenceDetection === undefined) {
    return true;
  }

  const context = new ExecutionContext(system.idMap, device.id, services);
  try {
    return executeActions(device.presenceDetection.actions, context);
  } catch (error) {
    services.getJournal().logError(`Unable to determine presence of ${device.id}`);
    reportError(error, services, { severity: "error", context, inventoryPath: device.fru });
    return true;
  }
}

function runConfiguration(
  system: System,
  device: Device,
  targetId: string,
  configuration: Configuration,
  services: Services
): boolean {
  const journal = services.getJournal();
  const context = new ExecutionContext(system.idMap, device.id, services);

  if (configuration.volts === undefined) {
    journal.logInfo(`Configuring ${targetId}`);
  } else {
    context.setVolts(configuration.volts);
    journal.logInfo(`Configuring ${targetId}: volts=${configuration.volts}`);
  }

  try {
    executeActions(configuration.actions, context);
    return true;
  } catch (error) {
    journal.logError(`Unable to configure ${targetId}`);
    reportError(error, services, { severity: "error", context, inventoryPath: device.fru });
    return false;
  }
}

// Returns false when any configuration of the device or its rails failed.
export function configureDevice(system: System, device: Device, services: Services): boolean {
  if (!isDevicePresent(system, device, services)) {
    services.getJournal().logInfo(`Skipping configuration of ${device.id}: device not present`);
    return true;
  }

  let succeeded = true;
  if (device.configuration !== undefined) {
    succeeded = runConfiguration(system, device, device.id, device.configuration, services) && succeeded;
  }

  for (const rail of device.rails) {
    if (rail.configuration !== undefined) {
      succeeded = runConfiguration(system, device, rail.id, rail.configuration, services) && succeeded;
    }
  }

  return succeeded;
}

export function configureSystem(system: System, services: Services): boolean {
  let succeeded = true;
  for (const device of listDevices(system)) {
    succeeded = configureDevice(system, device, services) && succeeded;
  }

  return succeeded;
}

export function closeDevices(system: System): void {
  for (const device of listDevices(system)) {
    device.i2cInterface.close();
  }
}

type PhaseFaultCounters = Record<PhaseFaultType, DeglitchCounter>;

// Keeps error history and phase fault counters between periodic monitoring
// passes so repeated failures are logged only once.
export class SystemMonitor {
  private readonly system: System;
  private readonly services: Services;
  private readonly errorHistories = new Map<string, ErrorHistory>();
  private readonly phaseFaultCounters = new Map<string, PhaseFaultCounters>();

  constructor(system: System, services: Services) {
    this.system = system;
    this.services = services;
  }

  monitorSensors(): void {
    for (const device of listDevices(this.system)) {
      if (!isDevicePresent(this.system, device, this.services)) {
        continue;
      }

      for (const rail of device.rails) {
        this.monitorRail(device, rail);
      }
    }
  }

  detectPhaseFaults(): void {
    for (const device of listDevices(this.system)) {
      if (device.phaseFaultDetection === undefined) {
        continue;
      }
      if (!isDevicePresent(this.system, device, this.services)) {
        continue;
      }

      this.detectDevicePhaseFaults(device);
    }
  }

  clearErrorHistory(): void {
    for (const history of this.errorHistories.values()) {
      history.clear();
    }
    for (const counters of this.phaseFaultCounters.values()) {
      for (const type of PHASE_FAULT_TYPES) {
        counters[type].reset();
      }
    }
  }

  private getErrorHistory(id: string): ErrorHistory {
    let history = this.errorHistories.get(id);
    if (history === undefined) {
      history = new ErrorHistory();
      this.errorHistories.set(id, history);
    }

    return history;
  }

  private getPhaseFaultCounters(deviceId: string): PhaseFaultCounters {
    let counters = this.phaseFaultCounters.get(deviceId);
    if (counters === undefined) {
      counters = {
        n: new DeglitchCounter(PHASE_FAULT_DETECTION_THRESHOLD),
        "n+1": new DeglitchCounter(PHASE_FAULT_DETECTION_THRESHOLD)
      };
      this.phaseFaultCounters.set(deviceId, counters);
    }

    return counters;
  }

  private monitorRail(device: Device, rail: Rail): void {
    if (rail.sensorMonitoring === undefined) {
      return;
    }

    const sensors = this.services.getSensors();
    const context = new ExecutionContext(this.system.idMap, device.id, this.services);
    let errorOccurred = false;

    sensors.startRail(rail.id, device.fru);
    try {
      executeActions(rail.sensorMonitoring.actions, context);
    } catch (error) {
      errorOccurred = true;
      this.services.getJournal().logError(`Unable to monitor sensors for rail ${rail.id}`);
      reportError(error, this.services, {
        severity: "informational",
        context,
        inventoryPath: device.fru,
        history: this.getErrorHistory(`rail:${rail.id}`)
      });
    } finally {
      sensors.endRail(errorOccurred);
    }
  }

  private detectDevicePhaseFaults(device: Device): void {
    const detection = device.phaseFaultDetection;
    if (detection === undefined) {
      return;
    }

    const context = new ExecutionContext(
      this.system.idMap,
      detection.deviceId ?? device.id,
      this.services
    );
    try {
      executeActions(detection.actions, context);
    } catch (error) {
      this.services.getJournal().logError(`Unable to detect phase faults in regulator ${device.id}`);
      reportError(error, this.services, {
        severity: "informational",
        context,
        inventoryPath: device.fru,
        history: this.getErrorHistory(`device:${device.id}`)
      });
      return;
    }

    const counters = this.getPhaseFaultCounters(device.id);
    for (const type of PHASE_FAULT_TYPES) {
      const faulted = counters[type].update(context.getPhaseFaults().has(type));
      if (faulted) {
        this.logPhaseFault(device, type, context);
      }
    }
  }

  private logPhaseFault(
    device: Device,
    type: PhaseFaultType,
    context: ExecutionContext
  ): void {
    // One history flag per phase fault type.
    const historyKey = `phase_fault:${device.id}:${type}`;
    const typeHistory = this.getErrorHistory(historyKey);
    if (typeHistory.wasLogged("phase_fault")) {
      return;
    }
    typeHistory.setWasLogged("phase_fault", true);

    const label = type === "n" ? "N" : "N+1";
    const message = `${label} phase fault detected in regulator ${device.id}`;
    this.services.getJournal().logError(message);
    this.services.getErrorLogging().logError({
      kind: "phase_fault",
      severity: type === "n" ? "warning" : "informational",
      messages: [message],
      additionalData: Object.fromEntries(context.getAdditionalErrorData()),
      phaseFaults: [type],
      deviceId: device.id,
      inventoryPath: device.fru
    });
  }
}
