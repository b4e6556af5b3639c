import { defineAtomic } from "../../actions/atomic.js";
import { defineComposite, step } from "../../actions/composite.js";
import { expectThat, fail } from "../../actions/result.js";
import { z } from "zod";
import {
  StorefrontSelectors as S,
  brandFilter,
  cartEmptyMessage,
  navBarLink,
} from "./storefront-selectors.js";

export interface HomeInput {
  url: string;
  brand: string;
}

export interface SearchInput {
  term: string;
}

export interface FirstResult {
  title: string;
  price: string;
}

/** Shortens long search terms so claims stay one readable line. */
function quote(text: string, max = 40): string {
  return JSON.stringify(text.length > max ? `${text.slice(0, max)}...` : text);
}

function clean(text: string | null): string {
  return (text ?? "").trim();
}

/** `"1,299."` + `"99"` → `"1,299.99"` */
function joinPrice(whole: string | null, fraction: string | null): string {
  return `${clean(whole).replace(/\.$/, "")}.${clean(fraction)}`;
}

// ── Navigation ───────────────────────────────────────────────────────

export const navigateToHomeAndVerifyTitle = defineAtomic({
  name: "navigate_to_home_and_verify_title",
  operation: "goto",
  probe: "getTitle",
  claim: (input: HomeInput) => `title contains ${quote(input.brand)}`,
  perform: async (adapter, input: HomeInput) => {
    await adapter.goto(input.url);
    return adapter.getTitle();
  },
  verify: (title, input) => expectThat(title.includes(input.brand), `title containing ${quote(input.brand)}`, quote(title)),
});

export interface NavLinkInput {
  linkText: string;
}

export const navigateToNavbarLinkAndVerifyTitle = defineAtomic({
  name: "navigate_to_navbar_link_and_verify_title",
  operation: "click",
  probe: "getTitle",
  claim: (input: NavLinkInput) => `title contains ${quote(input.linkText)}`,
  perform: async (adapter, input: NavLinkInput) => {
    await adapter.click(navBarLink(input.linkText));
    return adapter.getTitle();
  },
  verify: (title, input) => {
    const decoded = title.replace(/&#39;|’/g, "'");
    return expectThat(
      decoded.includes(input.linkText),
      `title containing ${quote(input.linkText)}`,
      quote(title),
    );
  },
});

// ── Search ───────────────────────────────────────────────────────────

export const enterSearchTerm = defineAtomic({
  name: "enter_search_term",
  operation: "fill",
  probe: "getValue",
  claim: (input: SearchInput) => `search box holds ${quote(input.term)}`,
  perform: async (adapter, input: SearchInput) => {
    await adapter.fill(S.searchInput, input.term);
    return adapter.getValue(S.searchInput);
  },
  verify: (value, input) => expectThat(value === input.term, quote(input.term), quote(value)),
});

export const submitSearch = defineAtomic({
  name: "submit_search",
  operation: "click",
  probe: "isVisible",
  claim: "page body visible after submit",
  perform: async (adapter) => {
    await adapter.click(S.searchSubmitButton);
    return adapter.isVisible(S.pageBody);
  },
  verify: (visible) => expectThat(visible, "page body visible", "page body missing"),
});

export const submitSearchAndWaitForResults = defineAtomic({
  name: "submit_search_and_wait_for_results",
  operation: "click",
  probe: "waitFor",
  claim: "result list rendered",
  perform: async (adapter) => {
    await adapter.click(S.searchSubmitButton);
    await adapter.waitFor(S.searchResultSlot, { state: "visible" });
    return true;
  },
  verify: (rendered) => expectThat(rendered, "result list visible", "no result list"),
});

export const verifyResultListNotEmpty = defineAtomic({
  name: "verify_result_list_not_empty",
  operation: "getCount",
  claim: "count>0",
  perform: (adapter) => adapter.getCount(S.searchResultItem),
  verify: (count) => expectThat(count > 0, "count>0", String(count)),
});

export const verifyNoResultsMessage = defineAtomic({
  name: "verify_no_results_message",
  operation: "isVisible",
  claim: '"No results" message visible',
  perform: (adapter) => adapter.isVisible(S.noResultsText),
  verify: (visible) => expectThat(visible, '"No results" message', "no such message"),
});

export const verifySearchBoxVisible = defineAtomic({
  name: "verify_search_box_visible",
  operation: "isVisible",
  claim: "search box still visible",
  perform: (adapter) => adapter.isVisible(S.searchInput),
  verify: (visible) => expectThat(visible, "search box visible", "search box missing"),
});

export interface BrandInput {
  brand: string;
}

export const applyBrandFilterAndVerifyResults = defineAtomic({
  name: "apply_brand_filter_and_verify_results",
  operation: "click",
  probe: "getText",
  claim: (input: BrandInput) => `first result mentions ${quote(input.brand)}`,
  perform: async (adapter, input: BrandInput) => {
    await adapter.click(brandFilter(input.brand));
    return adapter.getText(S.searchResultTitle);
  },
  verify: (text, input) =>
    expectThat(
      clean(text).toLowerCase().includes(input.brand.toLowerCase()),
      `first result mentioning ${quote(input.brand)}`,
      quote(clean(text)),
    ),
});

export const readFirstResultTitle = defineAtomic({
  name: "read_first_result_title",
  operation: "getText",
  claim: "first result has a title",
  perform: (adapter) => adapter.getText(S.searchResultTitle),
  verify: (text) => expectThat(clean(text) !== "", "a non-empty title", quote(clean(text))),
  produce: (text) => clean(text),
});

const priceSchema = z.string().regex(/^[\d,]+\.\d+$/);

export const readFirstResultPrice = defineAtomic({
  name: "read_first_result_price",
  operation: "getText",
  probe: "getText",
  claim: "first result has a price",
  perform: async (adapter) => {
    const whole = await adapter.getText(S.searchResultPriceWhole);
    const fraction = await adapter.getText(S.searchResultPriceFraction);
    return joinPrice(whole, fraction);
  },
  verify: (price) => expectThat(priceSchema.safeParse(price).success, "a price like 1,299.99", quote(price)),
});

// ── Product detail and cart ──────────────────────────────────────────

export const openFirstResult = defineAtomic({
  name: "open_first_result",
  operation: "click",
  probe: "waitFor",
  claim: "product page offers add-to-cart",
  perform: async (adapter) => {
    await adapter.click(S.searchResultLink);
    await adapter.waitFor(S.addToCartButton, { state: "visible" });
    return true;
  },
  verify: (shown) => expectThat(shown, "add-to-cart button", "no add-to-cart button"),
});

export interface DetailTitleInput {
  expectedTitle: string;
}

/** Titles are truncated differently on list and detail pages; a 20-character prefix match suffices. */
export const openFirstResultAndVerifyDetailTitle = defineAtomic({
  name: "open_first_result_and_verify_detail_title",
  operation: "click",
  probe: "getText",
  claim: (input: DetailTitleInput) => `detail title matches ${quote(input.expectedTitle, 20)}`,
  perform: async (adapter) => {
    await adapter.click(S.searchResultLink);
    return adapter.getText(S.productTitle);
  },
  verify: (text, input) => {
    const detail = clean(text);
    const expected = input.expectedTitle;
    return expectThat(
      detail.includes(expected.slice(0, 20)) || expected.includes(detail.slice(0, 20)),
      `title starting ${quote(expected, 20)}`,
      quote(detail),
    );
  },
  produce: (text) => clean(text),
});

export interface DetailPriceInput {
  expectedPrice: string;
}

export const verifyDetailPrice = defineAtomic({
  name: "verify_detail_price",
  operation: "getText",
  probe: "getText",
  claim: (input: DetailPriceInput) => `detail price==${input.expectedPrice}`,
  perform: async (adapter) => {
    const whole = await adapter.getText(S.detailPriceWhole);
    const fraction = await adapter.getText(S.detailPriceFraction);
    return joinPrice(whole, fraction);
  },
  verify: (price, input) => expectThat(price === input.expectedPrice, input.expectedPrice, price),
});

export const addToCartAndVerifyConfirmation = defineAtomic({
  name: "add_to_cart_and_verify_confirmation",
  operation: "click",
  probe: "waitFor",
  claim: '"Added to Cart" confirmation shown',
  perform: async (adapter) => {
    await adapter.click(S.addToCartButton);
    await adapter.waitFor(S.addedToCartConfirmation, { state: "visible" });
    return true;
  },
  verify: (shown) => expectThat(shown, '"Added to Cart" confirmation', "no confirmation"),
});

export interface CartCountInput {
  expected: number;
}

const CART_COUNT = /^\d+$/;

export const verifyCartCount = defineAtomic({
  name: "verify_cart_count",
  operation: "getText",
  claim: (input: CartCountInput) => `cart count==${input.expected}`,
  perform: (adapter) => adapter.getText(S.cartCountBadge),
  verify: (text, input) => {
    const badge = clean(text);
    if (!CART_COUNT.test(badge)) return fail(String(input.expected), quote(badge));
    const count = Number(badge);
    return expectThat(count === input.expected, String(input.expected), String(count));
  },
  produce: (text) => Number(clean(text)),
});

export const navigateToCartAndVerifyPage = defineAtomic({
  name: "navigate_to_cart_and_verify_page",
  operation: "click",
  probe: "getTitle",
  claim: 'title contains "Cart"',
  perform: async (adapter) => {
    await adapter.click(S.navCart);
    return adapter.getTitle();
  },
  verify: (title) => expectThat(title.includes("Cart"), 'title containing "Cart"', quote(title)),
});

export const deleteItemFromCartAndVerifyEmpty = defineAtomic({
  name: "delete_item_from_cart_and_verify_empty",
  operation: "click",
  probe: "waitFor",
  claim: "cart shows its empty message",
  perform: async (adapter, input: BrandInput) => {
    await adapter.click(S.cartDeleteButton);
    await adapter.waitFor(cartEmptyMessage(input.brand), { state: "visible" });
    return true;
  },
  verify: (empty) => expectThat(empty, "empty-cart message", "cart still has items"),
});

export const clickCheckoutAndVerifyLoginPrompt = defineAtomic({
  name: "click_checkout_and_verify_login_prompt",
  operation: "click",
  probe: "getTitle",
  claim: "checkout asks to sign in",
  perform: async (adapter) => {
    await adapter.click(S.checkoutButton);
    return adapter.getTitle();
  },
  verify: (title) =>
    expectThat(/sign[- ]in/i.test(title), "a Sign-In page title", quote(title)),
});

// ── Flows ────────────────────────────────────────────────────────────

export const searchForProductAndVerifyResultListNotEmpty = defineComposite({
  name: "search_for_product_and_verify_result_list_not_empty",
  steps: [
    step(enterSearchTerm, (input: SearchInput) => input),
    step(submitSearchAndWaitForResults, () => undefined),
    step(verifyResultListNotEmpty, () => undefined),
  ],
});

export const searchForProductAndExpectNoResults = defineComposite({
  name: "search_for_product_and_expect_no_results",
  steps: [
    step(enterSearchTerm, (input: SearchInput) => input),
    step(submitSearch, () => undefined),
    step(verifyNoResultsMessage, () => undefined),
  ],
});

/** Odd input (symbols, markup) must leave the page usable. */
export const searchForProductAndVerifyResultCount = defineComposite({
  name: "search_for_product_and_verify_result_count",
  steps: [
    step(enterSearchTerm, (input: SearchInput) => input),
    step(submitSearch, () => undefined),
    step(verifySearchBoxVisible, () => undefined),
  ],
});

export const searchForProductAndVerifyHandling = defineComposite({
  name: "search_for_product_and_verify_handling",
  steps: [step(enterSearchTerm, (input: SearchInput) => input), step(submitSearch, () => undefined)],
});

export const addFirstResultToCartAndVerifyToast = defineComposite({
  name: "add_first_result_to_cart_and_verify_toast",
  steps: [step(openFirstResult, () => undefined), step(addToCartAndVerifyConfirmation, () => undefined)],
});

export const getFirstResultTitleAndPrice = defineComposite({
  name: "get_first_result_title_and_price",
  steps: [
    step(readFirstResultTitle, () => undefined, { store: "title" }),
    step(readFirstResultPrice, () => undefined, { store: "price" }),
  ],
  produce: (_results, state): FirstResult => ({
    title: state.read("title", z.string()),
    price: state.read("price", z.string()),
  }),
});

export const clickFirstResultAndVerifyDetailPageMatches = defineComposite({
  name: "click_first_result_and_verify_detail_page_matches",
  steps: [
    step(openFirstResultAndVerifyDetailTitle, (input: FirstResult) => ({ expectedTitle: input.title })),
    step(verifyDetailPrice, (input: FirstResult) => ({ expectedPrice: input.price })),
  ],
});

export const storefrontActions = [
  navigateToHomeAndVerifyTitle,
  navigateToNavbarLinkAndVerifyTitle,
  enterSearchTerm,
  submitSearch,
  submitSearchAndWaitForResults,
  verifyResultListNotEmpty,
  verifyNoResultsMessage,
  verifySearchBoxVisible,
  applyBrandFilterAndVerifyResults,
  readFirstResultTitle,
  readFirstResultPrice,
  openFirstResult,
  openFirstResultAndVerifyDetailTitle,
  verifyDetailPrice,
  addToCartAndVerifyConfirmation,
  verifyCartCount,
  navigateToCartAndVerifyPage,
  deleteItemFromCartAndVerifyEmpty,
  clickCheckoutAndVerifyLoginPrompt,
  searchForProductAndVerifyResultListNotEmpty,
  searchForProductAndExpectNoResults,
  searchForProductAndVerifyResultCount,
  searchForProductAndVerifyHandling,
  addFirstResultToCartAndVerifyToast,
  getFirstResultTitleAndPrice,
  clickFirstResultAndVerifyDetailPageMatches,
] as const;
