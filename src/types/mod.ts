/**
 * @module types
 *
 * Type exports for shopquote.
 * Re-exports all types from state, transport, resource, and events modules.
 */

export * from "./state.ts";
export * from "./transport.ts";
export * from "./resource.ts";
export * from "./events.ts";
