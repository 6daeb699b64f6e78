/**
 * @module shopquote
 *
 * Typed client for a quoting and order-management REST API: declarative
 * resource models, partial updates, pagination following and in-place
 * reconciliation after create / update.
 *
 * @example Basic usage
 * ```typescript
 * import { createShopQuote } from "shopquote";
 *
 * const client = createShopQuote({
 *   http: { baseUrl: "https://api.example.com", token: "test-token" },
 * });
 *
 * // Status store (Svelte-compatible)
 * client.quotes.subscribe((status) => console.log(status.state));
 *
 * const quote = await client.quotes.get(1042);
 * quote.erp_code = "Q-1042"; // only touched fields are sent
 * await client.quotes.update(quote);
 * ```
 */

// Main exports
export { createShopQuote, ShopQuote, type ShopQuoteConfig } from "./client.ts";

// Types
export * from "./types/mod.ts";

// Mapping layer
export * from "./model/mod.ts";
export * from "./pagination.ts";
export * from "./reconcile.ts";
export * from "./lifecycle.ts";

// Resource definitions
export * from "./resources/mod.ts";

// Resource managers (for advanced usage)
export * from "./domains/mod.ts";

// Transports (including the mock transport for testing)
export * from "./adapters/mod.ts";
