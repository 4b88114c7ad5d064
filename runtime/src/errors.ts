import { describeAction, type Action } from "./actions.ts";
import { formatHexByte } from "./hex.ts";

export type IdCategory = "device" | "rule" | "rail";

export class IdNotFoundError extends Error {
  readonly category: IdCategory;
  readonly id: string;

  constructor(category: IdCategory, id: string) {
    super(`Unable to find ${category} with ID "${id}"`);
    this.name = "IdNotFoundError";
    this.category = category;
    this.id = id;
  }
}

export class RuleDepthError extends Error {
  readonly ruleId: string;

  constructor(ruleId: string) {
    super(`Maximum rule depth exceeded by rule ${ruleId}.`);
    this.name = "RuleDepthError";
    this.ruleId = ruleId;
  }
}

export class ActionError extends Error {
  readonly action: Action;

  constructor(action: Action, options: { detail?: string; cause?: unknown } = {}) {
    const description = `ActionError: ${describeAction(action)}`;
    super(options.detail === undefined ? description : `${description}: ${options.detail}`, {
      cause: options.cause
    });
    this.name = "ActionError";
    this.action = action;
  }
}

export class I2CError extends Error {
  readonly bus: number;
  readonly address: number;

  constructor(params: { message: string; bus: number; address: number; cause?: unknown }) {
    super(
      `I2CError: ${params.message}: bus ${params.bus}, addr ${formatHexByte(params.address)}`,
      { cause: params.cause }
    );
    this.name = "I2CError";
    this.bus = params.bus;
    this.address = params.address;
  }
}

export class PMBusError extends Error {
  readonly deviceId: string;
  readonly inventoryPath: string;

  constructor(message: string, deviceId: string, inventoryPath: string) {
    super(`PMBusError: ${message}`);
    this.name = "PMBusError";
    this.deviceId = deviceId;
    this.inventoryPath = inventoryPath;
  }
}

export class WriteVerificationError extends Error {
  readonly deviceId: string;
  readonly inventoryPath: string;

  constructor(message: string, deviceId: string, inventoryPath: string) {
    super(`WriteVerificationError: ${message}`);
    this.name = "WriteVerificationError";
    this.deviceId = deviceId;
    this.inventoryPath = inventoryPath;
  }
}

export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

export class ConfigFileParserError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`ConfigFileParserError: ${path}: ${describeCause(cause)}`, { cause });
    this.name = "ConfigFileParserError";
    this.path = path;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }

  return String(cause);
}
