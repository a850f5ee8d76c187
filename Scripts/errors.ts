import type { Locator } from "./session";

export function describeLocator(locator: Locator) {
  return `${locator.by}=${locator.value}`;
}

// A check ran to the end but the page did not look as expected
export class CheckFailedError extends Error {
  constructor(
    message: string,
    readonly expected: string,
    readonly actual: string | null
  ) {
    super(`${message} (expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)})`);
    this.name = "CheckFailedError";
  }
}

export class ElementNotFoundError extends Error {
  constructor(readonly locator: Locator) {
    super(`No element matches ${describeLocator(locator)}`);
    this.name = "ElementNotFoundError";
  }
}

export class NotInteractableError extends Error {
  constructor(readonly locator: Locator) {
    super(`Element ${describeLocator(locator)} is not clickable`);
    this.name = "NotInteractableError";
  }
}

export class WaitTimeoutError extends Error {
  constructor(
    readonly condition: string,
    readonly timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${condition}`, options);
    this.name = "WaitTimeoutError";
  }
}

// Launch failures and faults of the browser itself
export class SessionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SessionError";
  }
}

/** True for "not there / not clickable in time", the only misses an optional step may recover from. */
export function isLookupMiss(
  e: unknown
): e is ElementNotFoundError | NotInteractableError | WaitTimeoutError {
  return (
    e instanceof ElementNotFoundError ||
    e instanceof NotInteractableError ||
    e instanceof WaitTimeoutError
  );
}
