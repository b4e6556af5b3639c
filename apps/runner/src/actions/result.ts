import type { TransportFault } from "../errors.js";
import type {
  ActionFailed,
  ActionResult,
  ActionSucceeded,
  FailureDetail,
  Verdict,
  VerificationFailureDetail,
} from "./types.js";

export function pass(): Verdict {
  return { passed: true };
}

export function fail(expected: string, actual: string): Verdict {
  return { passed: false, expected, actual };
}

/** Passes when `condition` holds, otherwise reports expected vs actual. */
export function expectThat(condition: boolean, expected: string, actual: string): Verdict {
  return condition ? pass() : fail(expected, actual);
}

export function verificationDetail(expected: string, actual: string): VerificationFailureDetail {
  return {
    type: "verification",
    expected,
    actual,
    message: `expected ${expected}, got ${actual}`,
  };
}

export function transportDetail(fault: TransportFault): FailureDetail {
  return {
    type: "transport",
    kind: fault.kind,
    operation: fault.operation,
    message: fault.message,
  };
}

export function succeeded<O>(action: string, claim: string, value: O): ActionSucceeded<O> {
  const result: ActionSucceeded<O> = {
    outcome: "success",
    action,
    claim,
    value,
    path: Object.freeze([action]),
  };
  return Object.freeze(result);
}

export function failed(action: string, claim: string, failure: FailureDetail): ActionFailed {
  const result: ActionFailed = {
    outcome: "failure",
    action,
    claim,
    failure: Object.freeze(failure),
    path: Object.freeze([action]),
  };
  return Object.freeze(result);
}

/**
 * A composite's view of its child's success: the composite becomes the
 * reporting action, the claim is the conjunction of the children's claims.
 */
export function aggregated<O>(action: string, claims: readonly string[], value: O): ActionSucceeded<O> {
  return succeeded(action, claims.join(" && "), value);
}

/** Adopts a child's failure, prefixing the composite's name for attribution. */
export function nested(composite: string, child: ActionFailed): ActionFailed {
  const result: ActionFailed = {
    ...child,
    path: Object.freeze([composite, ...child.path]),
  };
  return Object.freeze(result);
}

export function isFailure<O>(result: ActionResult<O>): result is ActionFailed {
  return result.outcome === "failure";
}

/** Terminal element of a failure chain: the fault kind or the mismatch. */
export function describeFailure(detail: FailureDetail): string {
  return detail.type === "transport"
    ? `TransportFault(${detail.kind})`
    : `VerificationFailure(${detail.message})`;
}

/**
 * Renders the attribution chain, e.g.
 * `perform_device_upgrade → activate_device → TransportFault(timeout)`.
 */
export function formatFailureChain(result: ActionFailed): string {
  return [...result.path, describeFailure(result.failure)].join(" → ");
}
