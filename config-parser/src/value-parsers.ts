import { InvalidConfigurationError } from "vreg-runtime";

export type JsonObject = Record<string, unknown>;

const HEX_BYTE_PATTERN = /^0x[0-9A-Fa-f]{1,2}$/;

function fail(message: string): never {
  throw new InvalidConfigurationError(message);
}

// Integers past 2^53 lose precision when JSON text is parsed, so they are
// rejected rather than rounded.
function isInteger(element: unknown): element is number {
  return typeof element === "number" && Number.isSafeInteger(element);
}

export function isJsonObject(element: unknown): element is JsonObject {
  return typeof element === "object" && element !== null && !Array.isArray(element);
}

export function verifyIsObject(element: unknown): JsonObject {
  if (!isJsonObject(element)) {
    fail("Element is not an object");
  }

  return element;
}

export function verifyIsArray(element: unknown): unknown[] {
  if (!Array.isArray(element)) {
    fail("Element is not an array");
  }

  return element;
}

// Object parsers count every key they consume, comments included. Any other
// key makes the counts differ.
export function verifyPropertyCount(element: JsonObject, expectedCount: number): void {
  if (Object.keys(element).length !== expectedCount) {
    fail("Element contains an invalid property");
  }
}

export function getRequiredProperty(element: JsonObject, name: string): unknown {
  if (!Object.hasOwn(element, name)) {
    fail(`Required property missing: ${name}`);
  }

  return element[name];
}

export function parseBoolean(element: unknown): boolean {
  if (typeof element !== "boolean") {
    fail("Element is not a boolean");
  }

  return element;
}

export function parseDouble(element: unknown): number {
  if (typeof element !== "number" || !Number.isFinite(element)) {
    fail("Element is not a number");
  }

  return element;
}

export function parseInt8(element: unknown): number {
  if (!isInteger(element)) {
    fail("Element is not an integer");
  }
  if (element < -128 || element > 127) {
    fail("Element is not an 8-bit signed integer");
  }

  return element;
}

export function parseUint8(element: unknown): number {
  if (!isInteger(element)) {
    fail("Element is not an integer");
  }
  if (element < 0 || element > 0xff) {
    fail("Element is not an 8-bit unsigned integer");
  }

  return element;
}

export function parseUnsignedInteger(element: unknown): number {
  if (!isInteger(element) || element < 0) {
    fail("Element is not an unsigned integer");
  }

  return element;
}

export function parseBitPosition(element: unknown): number {
  if (!isInteger(element)) {
    fail("Element is not an integer");
  }
  if (element < 0 || element > 7) {
    fail("Element is not a bit position");
  }

  return element;
}

export function parseBitValue(element: unknown): number {
  if (!isInteger(element)) {
    fail("Element is not an integer");
  }
  if (element !== 0 && element !== 1) {
    fail("Element is not a bit value");
  }

  return element;
}

export function parseHexByte(element: unknown): number {
  if (typeof element !== "string" || !HEX_BYTE_PATTERN.test(element)) {
    fail("Element is not hexadecimal string");
  }

  return Number.parseInt(element.slice(2), 16);
}

export function parseHexByteArray(element: unknown): number[] {
  return verifyIsArray(element).map((value) => parseHexByte(value));
}

export function parseString(element: unknown, allowEmpty = false): string {
  if (typeof element !== "string") {
    fail("Element is not a string");
  }
  if (!allowEmpty && element.length === 0) {
    fail("Element contains an empty string");
  }

  return element;
}
