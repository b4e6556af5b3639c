import { CompositionError } from "../errors.js";
import type { PhysicalLayerAdapter } from "../physical/adapter.js";
import type { OutputSink } from "../output-sink.js";
import type { VerificationLedger } from "./ledger.js";

/** Anything with a zod-style `parse`. */
export interface Parser<T> {
  parse(value: unknown): T;
}

/**
 * A namespaced window onto the run state. Composites get one scoped to
 * their own name so stored keys never collide across flows.
 */
export interface StateView {
  readonly scope: string;
  has(key: string): boolean;
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  /** Reads a stored value and validates it; a missing key is a definition bug. */
  read<T>(key: string, parser: Parser<T>): T;
}

/**
 * Mutable per-run store for values threaded between steps (entity IDs,
 * records created earlier in the run).
 */
export class RunState {
  private values = new Map<string, unknown>();

  scope(name: string): StateView {
    const values = this.values;
    const qualify = (key: string) => `${name}/${key}`;
    return {
      scope: name,
      has: (key) => values.has(qualify(key)),
      get: (key) => values.get(qualify(key)),
      set: (key, value) => {
        values.set(qualify(key), value);
      },
      read<T>(key: string, parser: Parser<T>): T {
        if (!values.has(qualify(key))) {
          throw new CompositionError(
            `"${name}" reads "${key}" but no earlier step stored it`,
          );
        }
        try {
          return parser.parse(values.get(qualify(key)));
        } catch (err) {
          const detail = err instanceof Error ? err.message : String(err);
          throw new CompositionError(`"${name}" stored an unexpected value under "${key}": ${detail}`);
        }
      },
    };
  }

  keys(): string[] {
    return [...this.values.keys()];
  }
}

export interface ActionContext {
  readonly runId: string;
  readonly adapter: PhysicalLayerAdapter;
  readonly state: RunState;
  readonly ledger: VerificationLedger;
  readonly sink: OutputSink;
}

export function createActionContext(options: {
  runId: string;
  adapter: PhysicalLayerAdapter;
  ledger: VerificationLedger;
  sink: OutputSink;
  state?: RunState;
}): ActionContext {
  return Object.freeze({
    runId: options.runId,
    adapter: options.adapter,
    ledger: options.ledger,
    sink: options.sink,
    state: options.state ?? new RunState(),
  });
}
