import { getErrors, getMessages } from "./error-chain.ts";
import {
  ConfigFileParserError,
  I2CError,
  PMBusError,
  WriteVerificationError
} from "./errors.ts";
import type { ExecutionContext } from "./execution-context.ts";
import type { ErrorLogKind, ErrorLogSeverity, Services } from "./services.ts";

export interface ErrorClassification {
  kind: ErrorLogKind;
  deviceId?: string;
  inventoryPath?: string;
}

// Lower-level hardware errors are more specific than the ActionError that
// wraps them, so the whole chain is searched in this order of precedence.
export function classifyError(error: unknown): ErrorClassification {
  const errors = getErrors(error);

  if (errors.some((entry) => entry instanceof ConfigFileParserError)) {
    return { kind: "config_file" };
  }

  const pmbusError = errors.find((entry): entry is PMBusError => entry instanceof PMBusError);
  if (pmbusError !== undefined) {
    return {
      kind: "pmbus",
      deviceId: pmbusError.deviceId,
      inventoryPath: pmbusError.inventoryPath
    };
  }

  const verificationError = errors.find(
    (entry): entry is WriteVerificationError => entry instanceof WriteVerificationError
  );
  if (verificationError !== undefined) {
    return {
      kind: "write_verification",
      deviceId: verificationError.deviceId,
      inventoryPath: verificationError.inventoryPath
    };
  }

  if (errors.some((entry) => entry instanceof I2CError)) {
    return { kind: "i2c" };
  }

  return { kind: "internal" };
}

export class ErrorHistory {
  private readonly logged = new Set<ErrorLogKind>();

  wasLogged(kind: ErrorLogKind): boolean {
    return this.logged.has(kind);
  }

  setWasLogged(kind: ErrorLogKind, wasLogged: boolean): void {
    if (wasLogged) {
      this.logged.add(kind);
    } else {
      this.logged.delete(kind);
    }
  }

  clear(): void {
    this.logged.clear();
  }
}

export interface ReportErrorOptions {
  severity: ErrorLogSeverity;
  context?: ExecutionContext;
  inventoryPath?: string;
  history?: ErrorHistory;
}

// Writes the full message chain to the journal and emits one hardware error
// log entry. With a history, each kind of error is logged only once.
export function reportError(error: unknown, services: Services, options: ReportErrorOptions): void {
  const messages = getMessages(error);
  services.getJournal().logError(messages);

  const classification = classifyError(error);
  if (options.history !== undefined) {
    if (options.history.wasLogged(classification.kind)) {
      return;
    }
    options.history.setWasLogged(classification.kind, true);
  }

  const context = options.context;
  const phaseFaults = context === undefined ? [] : Array.from(context.getPhaseFaults());
  const inventoryPath = classification.inventoryPath ?? options.inventoryPath;

  services.getErrorLogging().logError({
    kind: classification.kind,
    severity: options.severity,
    messages,
    additionalData:
      context === undefined ? {} : Object.fromEntries(context.getAdditionalErrorData()),
    ...(phaseFaults.length > 0 ? { phaseFaults } : {}),
    ...(classification.deviceId !== undefined ? { deviceId: classification.deviceId } : {}),
    ...(inventoryPath !== undefined ? { inventoryPath } : {})
  });
}
