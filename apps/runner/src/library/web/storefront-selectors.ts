/**
 * Storefront page locators. They belong to the Action Layer; suites only
 * ever pass search terms, link texts and brand names.
 */
export const StorefrontSelectors = {
  // Search
  searchInput: "#twotabsearchtextbox",
  searchSubmitButton: "#nav-search-submit-button",
  searchResultSlot: ".s-main-slot",
  searchResultItem: ".s-result-item[data-component-type='s-search-result']",
  searchResultTitle: ".s-result-item[data-component-type='s-search-result'] h2",
  searchResultLink: "div[data-component-type='s-search-result'] h2 a",
  searchResultPriceWhole: ".s-result-item[data-component-type='s-search-result'] .a-price-whole",
  searchResultPriceFraction: ".s-result-item[data-component-type='s-search-result'] .a-price-fraction",
  noResultsText: "text=No results for",

  // Cart
  addToCartButton: "#add-to-cart-button",
  addedToCartConfirmation:
    "#NATC_SMART_WAGON_CONF_MSG_SUCCESS_text, #huc-v2-order-row-confirm-text, text=Added to Cart",
  cartCountBadge: "#nav-cart-count",
  navCart: "#nav-cart",
  cartDeleteButton: "input[value='Delete']",
  checkoutButton: "input[name='proceedToRetailCheckout']",

  // Product detail
  productTitle: "#productTitle",
  detailPriceWhole: ".a-price-whole",
  detailPriceFraction: ".a-price-fraction",

  // Misc
  pageBody: "body",
} as const;

export function navBarLink(text: string): string {
  return `#nav-xshop a:has-text(${JSON.stringify(text)})`;
}

export function brandFilter(brand: string): string {
  return `#brandsRefinements a:has-text(${JSON.stringify(brand)})`;
}

export function cartEmptyMessage(brand: string): string {
  return `text=Your ${brand} Cart is empty`;
}
