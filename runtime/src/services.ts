import type { PhaseFaultType } from "./actions.ts";
import type { I2CTransport } from "./i2c-interface.ts";
import type { SensorType } from "./pmbus-utils.ts";

export type JournalPriority = "debug" | "info" | "error";

export interface Journal {
  logDebug(message: string): void;
  logInfo(message: string): void;
  logError(message: string | ReadonlyArray<string>): void;
}

export const ERROR_LOG_KINDS = [
  "config_file",
  "i2c",
  "pmbus",
  "write_verification",
  "phase_fault",
  "internal"
] as const;

export type ErrorLogKind = (typeof ERROR_LOG_KINDS)[number];

export type ErrorLogSeverity = "informational" | "warning" | "error" | "critical";

export interface ErrorLogEntry {
  kind: ErrorLogKind;
  severity: ErrorLogSeverity;
  messages: string[];
  additionalData: Record<string, string>;
  phaseFaults?: PhaseFaultType[];
  deviceId?: string;
  inventoryPath?: string;
}

export interface ErrorLogging {
  logError(entry: ErrorLogEntry): void;
}

export interface VPD {
  getValue(fru: string, keyword: string): string;
}

export interface PresenceService {
  isPresent(fru: string): boolean;
}

export interface Sensors {
  startRail(railId: string, deviceInventoryPath: string): void;
  setValue(type: SensorType, value: number): void;
  endRail(errorOccurred: boolean): void;
}

export interface Services {
  getJournal(): Journal;
  getErrorLogging(): ErrorLogging;
  getVPD(): VPD;
  getPresenceService(): PresenceService;
  getSensors(): Sensors;
  getI2CTransport(): I2CTransport;
}
