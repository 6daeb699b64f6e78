/**
 * @module resources
 *
 * Resource definitions: models, primary keys and endpoints of every resource
 * type, plus the assembly helpers.
 */

export * from "./common.ts";
export * from "./components.ts";
export * from "./assembly.ts";
export * from "./quotes.ts";
export * from "./orders.ts";
export * from "./integrations.ts";
