import { z } from "zod";
import { step } from "../actions/composite.js";
import {
  addFirstResultToCartAndVerifyToast,
  applyBrandFilterAndVerifyResults,
  clickCheckoutAndVerifyLoginPrompt,
  clickFirstResultAndVerifyDetailPageMatches,
  deleteItemFromCartAndVerifyEmpty,
  getFirstResultTitleAndPrice,
  navigateToCartAndVerifyPage,
  navigateToHomeAndVerifyTitle,
  navigateToNavbarLinkAndVerifyTitle,
  searchForProductAndExpectNoResults,
  searchForProductAndVerifyHandling,
  searchForProductAndVerifyResultCount,
  searchForProductAndVerifyResultListNotEmpty,
} from "../library/web/storefront.js";
import type { CompositeStep } from "../actions/types.js";
import type { SuiteEnv, TestSuite } from "./types.js";

const firstResultSchema = z.object({ title: z.string(), price: z.string() });

const openHome = step(navigateToHomeAndVerifyTitle, (env: SuiteEnv) => ({
  url: env.storefrontUrl,
  brand: env.storefrontBrand,
}));

function searchFor(term: string): CompositeStep<SuiteEnv> {
  return step(searchForProductAndVerifyResultListNotEmpty, () => ({ term }));
}

export const storefrontSuite: TestSuite = {
  id: "storefront",
  title: "Storefront search and cart",
  requires: ["web"],
  cases: [
    {
      title: "Search for an existing product",
      steps: [openHome, searchFor("iPhone 15")],
    },
    {
      title: "Search for a product that does not exist",
      steps: [
        openHome,
        step(searchForProductAndExpectNoResults, () => ({ term: "xyz_non_existent_random_string_123_456" })),
      ],
    },
    {
      title: "Search with special characters",
      steps: [openHome, step(searchForProductAndVerifyResultCount, () => ({ term: "@#$%^&*" }))],
    },
    {
      title: "Add a single item to the cart",
      steps: [openHome, searchFor("Basics"), step(addFirstResultToCartAndVerifyToast, () => undefined)],
    },
    {
      title: "Delete an item from the cart",
      steps: [
        openHome,
        searchFor("Pen"),
        step(addFirstResultToCartAndVerifyToast, () => undefined),
        step(navigateToCartAndVerifyPage, () => undefined),
        step(deleteItemFromCartAndVerifyEmpty, (env) => ({ brand: env.storefrontBrand })),
      ],
    },
    {
      title: "Proceed to checkout with an empty cart",
      steps: [
        openHome,
        step(navigateToCartAndVerifyPage, () => undefined),
        step(clickCheckoutAndVerifyLoginPrompt, () => undefined),
      ],
    },
    {
      title: "Navigate to Today's Deals",
      steps: [openHome, step(navigateToNavbarLinkAndVerifyTitle, () => ({ linkText: "Today's Deals" }))],
    },
    {
      title: "Filter results by brand",
      steps: [openHome, searchFor("Laptop"), step(applyBrandFilterAndVerifyResults, () => ({ brand: "HP" }))],
    },
    {
      title: "Product detail matches the search result",
      steps: [
        openHome,
        searchFor("Apple MacBook Air 13"),
        step(getFirstResultTitleAndPrice, () => undefined, { store: "firstResult" }),
        step(clickFirstResultAndVerifyDetailPageMatches, (_env, state) =>
          state.read("firstResult", firstResultSchema),
        ),
      ],
    },
    {
      title: "Extremely long search query",
      steps: [openHome, step(searchForProductAndVerifyHandling, () => ({ term: "A".repeat(500) }))],
    },
  ],
};
