import { CompositionError } from "../errors.js";
import type { ActionContext, StateView } from "./context.js";
import { aggregated, nested } from "./result.js";
import type {
  Action,
  ActionResult,
  ActionSucceeded,
  AnyAction,
  CompositeAction,
  CompositeStep,
} from "./types.js";

export interface StepOptions {
  /** Stores the child's produced value under this key for later steps. */
  store?: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Declares one step of a fixed sequence. `input` derives the child's input
 * from the caller's input and previously stored values; it must not
 * branch on SUT content.
 */
export function step<I, CI, CO>(
  action: Action<CI, CO>,
  input: (input: I, state: StateView) => CI,
  options: StepOptions = {},
): CompositeStep<I> {
  async function invoke(context: ActionContext, parentInput: I, state: StateView): Promise<ActionResult> {
    let childInput: CI;
    try {
      childInput = input(parentInput, state);
    } catch (err) {
      if (err instanceof CompositionError) throw err;
      throw new CompositionError(`Cannot derive input for "${action.name}": ${errorMessage(err)}`);
    }
    return action.execute(context, childInput);
  }

  const declared: CompositeStep<I> = { action, store: options.store, invoke };
  return Object.freeze(declared);
}

/**
 * Number of atomic actions reachable from `action`. Throws on cycles and on
 * unresolved child references.
 */
export function countAtomics(action: AnyAction, trail: readonly string[] = []): number {
  if (trail.includes(action.name)) {
    throw new CompositionError(`Composition cycle: ${[...trail, action.name].join(" → ")}`);
  }
  if (action.kind === "atomic") return 1;

  let total = 0;
  for (const child of action.children) {
    if (!child) {
      throw new CompositionError(`"${action.name}" references an unresolved child action`);
    }
    total += countAtomics(child, [...trail, action.name]);
  }
  return total;
}

export interface CompositeDefinition<I> {
  /** Stable name used for attribution, e.g. `perform_device_upgrade`. */
  name: string;
  steps: readonly CompositeStep<I>[];
}

export interface ProducingCompositeDefinition<I, O> extends CompositeDefinition<I> {
  /** Explicit aggregate instead of the last child's value. */
  produce(results: readonly ActionSucceeded<unknown>[], state: StateView): O;
}

function validate<I>(def: CompositeDefinition<I>): void {
  if (!def.name || def.name.trim() !== def.name) {
    throw new CompositionError(`Composite action name must be a non-empty trimmed string, got "${def.name}"`);
  }
  if (!Array.isArray(def.steps) || def.steps.length === 0) {
    throw new CompositionError(`"${def.name}" declares no steps`);
  }
  def.steps.forEach((s, i) => {
    if (!s || !s.action) {
      throw new CompositionError(`Step ${i + 1} of "${def.name}" references an unresolved action`);
    }
    if (countAtomics(s.action, [def.name]) === 0) {
      throw new CompositionError(
        `Step ${i + 1} of "${def.name}" ("${s.action.name}") reaches no atomic action, so nothing would be verified`,
      );
    }
  });
}

/**
 * Defines a composite action: a fixed, ordered sequence of child actions.
 * The first failing child stops the sequence and its failure is returned
 * with this composite's name prefixed to the attribution path. Composites
 * never assert on their own; they only aggregate their children.
 */
export function defineComposite<I, O>(def: ProducingCompositeDefinition<I, O>): CompositeAction<I, O>;
export function defineComposite<I>(def: CompositeDefinition<I>): CompositeAction<I, unknown>;
export function defineComposite<I, O>(
  def: CompositeDefinition<I> & {
    produce?: (results: readonly ActionSucceeded<unknown>[], state: StateView) => O;
  },
): CompositeAction<I, unknown> {
  validate(def);

  const { name } = def;
  const steps = Object.freeze([...def.steps]);
  const children = Object.freeze(steps.map((s) => s.action));

  async function execute(context: ActionContext, input: I): Promise<ActionResult<unknown>> {
    const state = context.state.scope(name);
    const results: ActionSucceeded<unknown>[] = [];

    for (const s of steps) {
      const result = await s.invoke(context, input, state);
      if (result.outcome === "failure") {
        return nested(name, result);
      }
      if (s.store) state.set(s.store, result.value);
      results.push(result);
    }

    let value: unknown = results[results.length - 1].value;
    if (def.produce) {
      try {
        value = def.produce(results, state);
      } catch (err) {
        if (err instanceof CompositionError) throw err;
        throw new CompositionError(`"${name}" could not build its result: ${errorMessage(err)}`);
      }
    }

    return aggregated(
      name,
      results.map((r) => r.claim),
      value,
    );
  }

  const action: CompositeAction<I, unknown> = { kind: "composite", name, children, execute };
  return Object.freeze(action);
}
