import { deviceUpgradeSuite } from "./device-upgrade.js";
import { objectsApiSuite } from "./objects-api.js";
import { storefrontSuite } from "./storefront.js";
import type { TestSuite } from "./types.js";

export const suites: readonly TestSuite[] = [objectsApiSuite, deviceUpgradeSuite, storefrontSuite];

export function findSuite(id: string): TestSuite | undefined {
  return suites.find((s) => s.id === id);
}

export type { BackendKind, SuiteEnv, TestCase, TestSuite } from "./types.js";
