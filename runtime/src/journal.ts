import { appendFileSync } from "node:fs";

import type { ErrorLogEntry, ErrorLogging, Journal, JournalPriority } from "./services.ts";

export const JOURNAL_ENTRY_SCHEMA_VERSION = "0.1.0";

const PRIORITY_RANK: Record<JournalPriority, number> = {
  debug: 0,
  info: 1,
  error: 2
};

export interface JournalEntryV0 {
  schema_version: typeof JOURNAL_ENTRY_SCHEMA_VERSION;
  timestamp: string;
  priority: JournalPriority;
  message: string;
}

export interface ErrorLogRecordV0 extends ErrorLogEntry {
  schema_version: typeof JOURNAL_ENTRY_SCHEMA_VERSION;
  timestamp: string;
}

export interface JsonlJournalOptions {
  outputPath?: string;
  minimumPriority?: JournalPriority;
  now?: () => Date;
}

export interface JsonlErrorLoggingOptions {
  outputPath?: string;
  now?: () => Date;
}

function normalizeOutputPath(outputPath?: string): string | undefined {
  if (typeof outputPath !== "string") {
    return undefined;
  }

  const trimmed = outputPath.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveTimestamp(now: () => Date): string {
  const candidate = now();
  if (candidate instanceof Date && Number.isFinite(candidate.getTime())) {
    return candidate.toISOString();
  }

  return new Date().toISOString();
}

// Appends one JSON object per line when an output path is configured;
// otherwise messages go to standard error as plain text.
export function createJsonlJournal(options: JsonlJournalOptions = {}): Journal {
  const outputPath = normalizeOutputPath(options.outputPath);
  const minimumRank = PRIORITY_RANK[options.minimumPriority ?? "debug"];
  const now = options.now ?? (() => new Date());

  const emit = (priority: JournalPriority, message: string): void => {
    if (PRIORITY_RANK[priority] < minimumRank) {
      return;
    }

    if (outputPath === undefined) {
      process.stderr.write(`${message}\n`);
      return;
    }

    const entry: JournalEntryV0 = {
      schema_version: JOURNAL_ENTRY_SCHEMA_VERSION,
      timestamp: resolveTimestamp(now),
      priority,
      message
    };
    appendFileSync(outputPath, `${JSON.stringify(entry)}\n`, "utf8");
  };

  return {
    logDebug: (message) => emit("debug", message),
    logInfo: (message) => emit("info", message),
    logError: (message) => {
      const messages = typeof message === "string" ? [message] : message;
      for (const entry of messages) {
        emit("error", entry);
      }
    }
  };
}

export function createJsonlErrorLogging(options: JsonlErrorLoggingOptions = {}): ErrorLogging {
  const outputPath = normalizeOutputPath(options.outputPath);
  const now = options.now ?? (() => new Date());

  return {
    logError: (entry) => {
      if (outputPath === undefined) {
        return;
      }

      const record: ErrorLogRecordV0 = {
        schema_version: JOURNAL_ENTRY_SCHEMA_VERSION,
        timestamp: resolveTimestamp(now),
        ...entry
      };
      appendFileSync(outputPath, `${JSON.stringify(record)}\n`, "utf8");
    }
  };
}
