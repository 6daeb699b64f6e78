/**
 * @module model/sentinel
 *
 * The "not supplied" marker used by partial updates.
 */

/**
 * Marks a field the caller never touched. Distinct from `null`, which means
 * "explicitly cleared" and is sent over the wire. Fields holding this value
 * are left out of outgoing documents entirely.
 */
export const NO_UPDATE: unique symbol = Symbol("NO_UPDATE");

/** Type of the {@link NO_UPDATE} marker */
export type NoUpdate = typeof NO_UPDATE;

/** True iff `value` is the {@link NO_UPDATE} marker itself */
export function isUnset(value: unknown): value is NoUpdate {
	return value === NO_UPDATE;
}
