/**
 * @module reconcile
 *
 * Mutation-reconciliation: merge a server response into the caller's live
 * instance after create / update, so references held elsewhere stay valid.
 */

import type { FieldMap } from "./model/fields.ts";
import type { Instance, ResourceModel } from "./model/model.ts";
import { markPersisted } from "./lifecycle.ts";

/**
 * Copy every declared field of `model` from `fresh` onto `target`. Properties
 * of `target` that are not declared fields are left alone.
 */
export function copyFields<F extends FieldMap>(
	model: ResourceModel<F>,
	target: Instance<F>,
	fresh: Instance<F>,
): Instance<F> {
	for (const name of model.fieldNames) {
		target[name] = fresh[name];
	}
	markPersisted(model, target);
	return target;
}

/**
 * Parse `raw` into a fresh instance, then copy its declared fields onto
 * `target`. Parsing happens before the first assignment, so a response that
 * fails to parse leaves `target` untouched.
 *
 * Instances are not safe to read from elsewhere while this runs.
 *
 * @returns `target` itself
 */
export function reconcile<F extends FieldMap>(
	model: ResourceModel<F>,
	target: Instance<F>,
	raw: unknown,
): Instance<F> {
	return copyFields(model, target, model.fromJSON(raw));
}
