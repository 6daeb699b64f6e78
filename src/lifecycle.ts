/**
 * @module lifecycle
 *
 * Tracks whether an instance is transient, persisted, or locally modified.
 *
 * A snapshot of the serialized form is recorded whenever an instance is loaded
 * or reconciled; comparing against it tells "persisted" from "modified".
 * Snapshots sit in a `WeakMap`, so no instance is kept alive by this module.
 */

import type { FieldMap } from "./model/fields.ts";
import type { Instance, ResourceModel } from "./model/model.ts";

/** transient → persisted → modified → persisted ... */
export type LifecycleState = "transient" | "persisted" | "modified";

const snapshots = new WeakMap<object, string>();

function serialize<F extends FieldMap>(model: ResourceModel<F>, instance: Instance<F>): string {
	return JSON.stringify(model.toJSON(instance));
}

/** Record the server-confirmed state of `instance` */
export function markPersisted<F extends FieldMap>(
	model: ResourceModel<F>,
	instance: Instance<F>,
): void {
	snapshots.set(instance, serialize(model, instance));
}

/** Current lifecycle state of `instance` */
export function lifecycle<F extends FieldMap>(
	model: ResourceModel<F>,
	instance: Instance<F>,
): LifecycleState {
	const snapshot = snapshots.get(instance);
	if (snapshot === undefined) return "transient";
	return snapshot === serialize(model, instance) ? "persisted" : "modified";
}
