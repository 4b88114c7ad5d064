// Nested errors are linked through the standard `cause` property. Both
// helpers below walk that link and return results innermost first.

function getNestedCause(error: unknown): unknown {
  if (error instanceof Error && error.cause !== undefined) {
    return error.cause;
  }

  return undefined;
}

export function getErrors(error: unknown): unknown[] {
  const errors: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    errors.unshift(current);
    current = getNestedCause(current);
  }

  return errors;
}

export function getMessages(error: unknown): string[] {
  return getErrors(error).map((entry) => (entry instanceof Error ? entry.message : String(entry)));
}

export function findError<T extends Error>(
  error: unknown,
  errorClass: new (...args: never[]) => T
): T | undefined {
  for (const entry of getErrors(error)) {
    if (entry instanceof errorClass) {
      return entry;
    }
  }

  return undefined;
}
