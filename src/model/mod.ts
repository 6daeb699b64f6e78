/**
 * @module model
 *
 * The mapping layer: sentinel, converters, field descriptors, resource models
 * and their errors.
 */

export { isUnset, NO_UPDATE, type NoUpdate } from "./sentinel.ts";
export { Money } from "./money.ts";
export * from "./converters.ts";
export * from "./fields.ts";
export * from "./model.ts";
export * from "./errors.ts";
