import { CompositionError } from "../errors.js";
import { countAtomics } from "./composite.js";
import type { AnyAction } from "./types.js";

export interface ActionTreeNode {
  name: string;
  kind: AnyAction["kind"];
  children: ActionTreeNode[];
}

/**
 * Name-indexed catalog of the action library. `validate` walks every
 * registered action so broken definitions surface at startup instead of
 * halfway through a suite.
 */
export class ActionRegistry {
  private actions = new Map<string, AnyAction>();

  register(...actions: AnyAction[]): this {
    for (const action of actions) {
      const existing = this.actions.get(action.name);
      if (existing && existing !== action) {
        throw new CompositionError(`Action name "${action.name}" is registered twice`);
      }
      this.actions.set(action.name, action);
    }
    return this;
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  get(name: string): AnyAction | undefined {
    return this.actions.get(name);
  }

  resolve(name: string): AnyAction {
    const action = this.actions.get(name);
    if (!action) {
      throw new CompositionError(`Unknown action "${name}"`);
    }
    return action;
  }

  list(): AnyAction[] {
    return [...this.actions.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Checks that every composite reaches at least one atomic, that there are
   * no cycles, and that every child is itself registered under its name.
   */
  validate(): void {
    for (const action of this.actions.values()) {
      if (action.kind === "atomic") continue;
      if (countAtomics(action) === 0) {
        throw new CompositionError(`"${action.name}" reaches no atomic action`);
      }
      for (const child of action.children) {
        const registered = this.actions.get(child.name);
        if (!registered) {
          throw new CompositionError(`"${action.name}" uses "${child.name}", which is not registered`);
        }
        if (registered !== child) {
          throw new CompositionError(
            `"${action.name}" uses a different action than the one registered as "${child.name}"`,
          );
        }
      }
    }
  }

  tree(name: string): ActionTreeNode {
    const build = (action: AnyAction): ActionTreeNode => ({
      name: action.name,
      kind: action.kind,
      children: action.kind === "composite" ? action.children.map(build) : [],
    });
    return build(this.resolve(name));
  }
}
