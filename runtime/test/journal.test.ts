import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import {
  JOURNAL_ENTRY_SCHEMA_VERSION,
  createJsonlErrorLogging,
  createJsonlJournal
} from "../src/index.ts";

function readJsonLines(outputPath: string): unknown[] {
  return readFileSync(outputPath, "utf8")
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}

const fixedClock = (): Date => new Date("2026-03-01T12:00:00.000Z");

test("createJsonlJournal appends one entry per message at or above the minimum priority", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "vreg-journal-"));
  const outputPath = join(tmpRoot, "journal.ndjson");

  try {
    const journal = createJsonlJournal({ outputPath, minimumPriority: "info", now: fixedClock });
    journal.logDebug("Reading VOUT_MODE");
    journal.logInfo("Configuring vdd_reg: volts=1.3");
    journal.logError(["bus timeout", "ActionError: run_rule: set_voltage_rule"]);

    assert.deepEqual(readJsonLines(outputPath), [
      {
        schema_version: JOURNAL_ENTRY_SCHEMA_VERSION,
        timestamp: "2026-03-01T12:00:00.000Z",
        priority: "info",
        message: "Configuring vdd_reg: volts=1.3"
      },
      {
        schema_version: JOURNAL_ENTRY_SCHEMA_VERSION,
        timestamp: "2026-03-01T12:00:00.000Z",
        priority: "error",
        message: "bus timeout"
      },
      {
        schema_version: JOURNAL_ENTRY_SCHEMA_VERSION,
        timestamp: "2026-03-01T12:00:00.000Z",
        priority: "error",
        message: "ActionError: run_rule: set_voltage_rule"
      }
    ]);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("createJsonlErrorLogging appends error log records", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "vreg-error-log-"));
  const outputPath = join(tmpRoot, "errors.ndjson");

  try {
    const errorLogging = createJsonlErrorLogging({ outputPath, now: fixedClock });
    errorLogging.logError({
      kind: "phase_fault",
      severity: "warning",
      messages: ["N phase fault detected in regulator vdd_reg"],
      additionalData: {},
      phaseFaults: ["n"],
      deviceId: "vdd_reg",
      inventoryPath: "/system/chassis/motherboard/vdd_reg"
    });

    assert.deepEqual(readJsonLines(outputPath), [
      {
        schema_version: JOURNAL_ENTRY_SCHEMA_VERSION,
        timestamp: "2026-03-01T12:00:00.000Z",
        kind: "phase_fault",
        severity: "warning",
        messages: ["N phase fault detected in regulator vdd_reg"],
        additionalData: {},
        phaseFaults: ["n"],
        deviceId: "vdd_reg",
        inventoryPath: "/system/chassis/motherboard/vdd_reg"
      }
    ]);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("createJsonlErrorLogging writes nothing for a blank output path", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "vreg-error-log-"));
  const outputPath = join(tmpRoot, "errors.ndjson");

  try {
    const errorLogging = createJsonlErrorLogging({ outputPath: "   " });
    errorLogging.logError({ kind: "internal", severity: "error", messages: ["boom"], additionalData: {} });

    assert.equal(existsSync(outputPath), false);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("journal timestamps fall back to the current time for an invalid clock", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "vreg-journal-"));
  const outputPath = join(tmpRoot, "journal.ndjson");

  try {
    const journal = createJsonlJournal({ outputPath, now: () => new Date(Number.NaN) });
    journal.logInfo("Configuring vdd");

    const [entry] = readJsonLines(outputPath);
    assert.ok(typeof entry === "object" && entry !== null && "timestamp" in entry);
    assert.equal(typeof entry.timestamp, "string");
    assert.equal(Number.isNaN(Date.parse(String(entry.timestamp))), false);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});
