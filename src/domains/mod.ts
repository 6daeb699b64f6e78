export * from "./base.ts";
export * from "./quote.ts";
export * from "./order.ts";
export * from "./integration.ts";
