import { ActionFailure } from "../errors.js";
import type { ActionContext, StateView } from "./context.js";
import { formatFailureChain } from "./result.js";
import type { Action, ActionResult, CompositeStep } from "./types.js";

/**
 * The only surface test code touches. It hands domain inputs to actions and
 * gets their produced values back; a failing action becomes an
 * ActionFailure, so test code never asserts and never sees the adapter.
 */
export interface TestLayer {
  perform<I, O>(action: Action<I, O>, input: I): Promise<O>;
  run<E>(step: CompositeStep<E>, env: E): Promise<unknown>;
}

function unwrap<O>(result: ActionResult<O>): O {
  if (result.outcome === "failure") {
    throw new ActionFailure(result, formatFailureChain(result));
  }
  return result.value;
}

export function createTestLayer(context: ActionContext, scope = "test"): TestLayer {
  const state: StateView = context.state.scope(scope);

  return {
    async perform<I, O>(action: Action<I, O>, input: I): Promise<O> {
      return unwrap(await action.execute(context, input));
    },

    async run<E>(step: CompositeStep<E>, env: E): Promise<unknown> {
      const value = unwrap(await step.invoke(context, env, state));
      if (step.store) state.set(step.store, value);
      return value;
    },
  };
}
