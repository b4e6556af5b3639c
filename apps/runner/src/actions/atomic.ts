import { CompositionError } from "../errors.js";
import { OperationGuard, type PhysicalLayerAdapter } from "../physical/adapter.js";
import { toTransportFault } from "../physical/faults.js";
import {
  isOperationName,
  isProbeOperation,
  type OperationName,
  type ProbeOperation,
} from "../physical/types.js";
import type { ActionContext } from "./context.js";
import type { EntryOutcome } from "./ledger.js";
import {
  fail,
  failed,
  succeeded,
  transportDetail,
  verificationDetail,
} from "./result.js";
import type { ActionResult, AtomicAction, Verdict } from "./types.js";

export interface AtomicDefinition<I, R> {
  /** Stable name used for attribution, e.g. `request_by_get_and_success`. */
  name: string;
  /** The one Physical Layer operation this action drives. */
  operation: OperationName;
  /** Optional read-only operation that observes the post-condition. */
  probe?: ProbeOperation;
  /** What a pass proves, e.g. `status==200`. */
  claim: string | ((input: I) => string);
  perform(adapter: PhysicalLayerAdapter, input: I): Promise<R>;
  verify(observed: R, input: I): Verdict;
}

export interface ProducingAtomicDefinition<I, R, O> extends AtomicDefinition<I, R> {
  /** Value handed back to the caller once `verify` passed. */
  produce(observed: R, input: I): O;
}

type Judgement<V> =
  | { passed: true; value: V }
  | { passed: false; expected: string; actual: string };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function validate(def: { name: string; operation: string; probe?: string; perform: unknown; verify: unknown }): void {
  if (!def.name || def.name.trim() !== def.name) {
    throw new CompositionError(`Atomic action name must be a non-empty trimmed string, got "${def.name}"`);
  }
  if (!isOperationName(def.operation)) {
    throw new CompositionError(`"${def.name}" declares unknown operation "${def.operation}"`);
  }
  if (def.probe !== undefined && !isProbeOperation(def.probe)) {
    throw new CompositionError(`"${def.name}" declares "${def.probe}" as probe, but probes must be read-only`);
  }
  if (typeof def.perform !== "function") {
    throw new CompositionError(`"${def.name}" has no perform step`);
  }
  if (typeof def.verify !== "function") {
    throw new CompositionError(
      `"${def.name}" has no verification predicate; an atomic action must check the effect of its operation`,
    );
  }
}

/**
 * Defines a self-verifying atomic action: exactly one adapter operation
 * (plus the declared probe), exactly one predicate, exactly one ledger entry
 * per invocation whatever the outcome.
 */
export function defineAtomic<I, R, O>(def: ProducingAtomicDefinition<I, R, O>): AtomicAction<I, O>;
export function defineAtomic<I, R>(def: AtomicDefinition<I, R>): AtomicAction<I, R>;
export function defineAtomic<I, R, O>(
  def: AtomicDefinition<I, R> & { produce?: (observed: R, input: I) => O },
): AtomicAction<I, R | O> {
  validate(def);

  const { name, operation, probe } = def;
  const allowed: OperationName[] = probe ? [operation, probe] : [operation];

  function judge(observed: R, input: I, claim: string): Judgement<R | O> {
    let verdict: Verdict;
    try {
      verdict = def.verify(observed, input);
    } catch (err) {
      verdict = fail(claim, `predicate threw: ${errorMessage(err)}`);
    }
    if (!verdict.passed) return verdict;
    if (!def.produce) return { passed: true, value: observed };
    try {
      return { passed: true, value: def.produce(observed, input) };
    } catch (err) {
      return { passed: false, expected: claim, actual: `unusable result: ${errorMessage(err)}` };
    }
  }

  async function execute(context: ActionContext, input: I): Promise<ActionResult<R | O>> {
    const claim = typeof def.claim === "function" ? def.claim(input) : def.claim;
    const guard = new OperationGuard(name, allowed);

    let result: ActionResult<R | O>;
    try {
      const observed = await def.perform(context.adapter.guarded(guard), input);
      if (guard.callCount === 0) {
        throw new CompositionError(`"${name}" returned without calling its declared "${operation}" operation`);
      }
      const judgement = judge(observed, input, claim);
      result = judgement.passed
        ? succeeded(name, claim, judgement.value)
        : failed(name, claim, verificationDetail(judgement.expected, judgement.actual));
    } catch (err) {
      if (err instanceof CompositionError) throw err;
      const fault = toTransportFault(err, operation, context.adapter.signal);
      result = failed(name, claim, transportDetail(fault));
    }

    let outcome: EntryOutcome = "passed";
    if (result.outcome === "failure") {
      outcome =
        result.failure.type === "transport" && result.failure.kind === "aborted" ? "aborted" : "failed";
    }
    const entry = context.ledger.append({
      action: name,
      input,
      outcome,
      claim,
      failure: result.outcome === "failure" ? result.failure : undefined,
    });
    context.sink.verification(context.runId, entry);

    return result;
  }

  const action: AtomicAction<I, R | O> = { kind: "atomic", name, operation, probe, execute };
  return Object.freeze(action);
}
