import type { OperationName, ProbeOperation } from "../physical/types.js";
import type { ActionContext, StateView } from "./context.js";

export type TransportFaultKind =
  | "connection"
  | "timeout"
  | "element-not-found"
  | "aborted"
  | "unsupported"
  | "unknown";

export interface VerificationFailureDetail {
  type: "verification";
  expected: string;
  actual: string;
  message: string;
}

export interface TransportFailureDetail {
  type: "transport";
  kind: TransportFaultKind;
  operation: string;
  message: string;
}

export type FailureDetail = VerificationFailureDetail | TransportFailureDetail;

export interface ActionSucceeded<O> {
  readonly outcome: "success";
  readonly action: string;
  readonly claim: string;
  readonly value: O;
  /** Attribution chain, outermost composite first. */
  readonly path: readonly string[];
}

export interface ActionFailed {
  readonly outcome: "failure";
  readonly action: string;
  readonly claim: string;
  readonly failure: FailureDetail;
  readonly path: readonly string[];
}

export type ActionResult<O = unknown> = ActionSucceeded<O> | ActionFailed;

export type Verdict =
  | { passed: true }
  | { passed: false; expected: string; actual: string };

interface ActionBase<I, O> {
  readonly name: string;
  execute(context: ActionContext, input: I): Promise<ActionResult<O>>;
}

export interface AtomicAction<I, O> extends ActionBase<I, O> {
  readonly kind: "atomic";
  readonly operation: OperationName;
  readonly probe?: ProbeOperation;
}

export interface CompositeAction<I, O> extends ActionBase<I, O> {
  readonly kind: "composite";
  readonly children: readonly AnyAction[];
}

export type Action<I, O> = AtomicAction<I, O> | CompositeAction<I, O>;

/** Any action regardless of its input and output types. */
export type AnyAction = Action<never, unknown>;

/**
 * One entry in a composite's (or a test case's) fixed step list. The input
 * mapping is pure: it reads the caller's input and values stored by earlier
 * steps, never the SUT.
 */
export interface CompositeStep<I> {
  readonly action: AnyAction;
  readonly store?: string;
  invoke(context: ActionContext, input: I, state: StateView): Promise<ActionResult>;
}
