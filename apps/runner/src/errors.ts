/**
 * Error classes shared across the runner.
 *
 * Only CompositionError, LedgerStateError and ConfigError are meant to
 * escape to the process boundary. TransportFault is converted into a
 * failed ActionResult at the atomic boundary, and ActionFailure is what the
 * Test Layer throws when an action reports failure.
 */

import type { ActionFailed, TransportFaultKind } from "./actions/types.js";

/**
 * Base error class for all runner errors
 */
export class DaaError extends Error {
  constructor(
    message: string,
    public code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DaaError";
  }
}

/**
 * Raised by the Physical Layer when the SUT could not be reached or driven:
 * connection refused, timeouts, missing elements, cancelled runs.
 */
export class TransportFault extends DaaError {
  constructor(
    public kind: TransportFaultKind,
    public operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, "TRANSPORT_FAULT", options);
    this.name = "TransportFault";
  }
}

/**
 * A broken action definition. Raised at definition or startup time, and by
 * the adapter guard when an atomic calls an operation it did not declare.
 */
export class CompositionError extends DaaError {
  constructor(message: string) {
    super(message, "COMPOSITION_ERROR");
    this.name = "CompositionError";
  }
}

/**
 * A ledger operation attempted in the wrong lifecycle state.
 */
export class LedgerStateError extends DaaError {
  constructor(message: string) {
    super(message, "LEDGER_STATE_ERROR");
    this.name = "LedgerStateError";
  }
}

export class ConfigError extends DaaError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/**
 * Thrown at the Test Layer boundary when an action's result is a failure.
 * Carries the full attribution chain so a test runner can report it as is.
 */
export class ActionFailure extends DaaError {
  constructor(
    public result: ActionFailed,
    public chain: string,
  ) {
    super(`${chain}\n  claim: ${result.claim}\n  detail: ${result.failure.message}`, "ACTION_FAILED");
    this.name = "ActionFailure";
  }
}
