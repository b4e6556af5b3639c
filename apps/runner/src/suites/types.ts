import type { CompositeStep } from "../actions/types.js";

/** Values every suite step may read: where the systems under test live. */
export interface SuiteEnv {
  apiUrl: string;
  storefrontUrl: string;
  storefrontBrand: string;
}

export type BackendKind = "http" | "web";

/**
 * One declarative test case: a fixed list of steps with no logic of its
 * own. Failures surface from the actions, never from the case.
 */
export interface TestCase {
  title: string;
  steps: readonly CompositeStep<SuiteEnv>[];
}

export interface TestSuite {
  id: string;
  title: string;
  /** Physical backends each case needs bound to its run. */
  requires: readonly BackendKind[];
  cases: readonly TestCase[];
}
