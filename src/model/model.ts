/**
 * @module model/model
 *
 * Resource models: a named set of field descriptors plus the two directions
 * of the serialization engine.
 */

import { isPlainObject, type WireDocument } from "./converters.ts";
import {
	MissingRequiredFieldError,
	TypeMismatchError,
	ValidationError,
} from "./errors.ts";
import type {
	AnyField,
	DerivedDescriptor,
	FieldDescriptor,
	FieldMap,
	FieldName,
	FieldValue,
} from "./fields.ts";
import { isUnset } from "./sentinel.ts";

/** A resource instance: one mutable property per declared field */
export type Instance<F extends FieldMap> = {
	-readonly [K in keyof F]: FieldValue<F[K]>;
};

type RequiredKeys<F extends FieldMap> = {
	[K in keyof F]: F[K] extends { readonly hasDefault: false } ? K : never;
}[keyof F];

type OptionalKeys<F extends FieldMap> = {
	[K in keyof F]: F[K] extends FieldDescriptor<unknown, true> ? K : never;
}[keyof F];

/**
 * Input for local construction: every field without a default is required,
 * defaulted fields may be given, derived fields are computed.
 */
export type BuildInput<F extends FieldMap> =
	& { [K in RequiredKeys<F>]: FieldValue<F[K]> }
	& { [K in OptionalKeys<F>]?: FieldValue<F[K]> };

/** Instance type described by a model */
export type InstanceOf<M> = M extends ResourceModel<infer F extends FieldMap> ? Instance<F> : never;

/** Declarative description of one resource type */
export interface ResourceModel<F extends FieldMap> {
	readonly name: string;
	readonly fields: F;
	/** Declared field names in declaration order; the fields reconciliation copies */
	readonly fieldNames: readonly FieldName<F>[];
	/**
	 * Build an instance from a raw mapping. Unknown keys are ignored, absent
	 * keys take their declared default.
	 *
	 * @throws {TypeMismatchError} when a value cannot be converted
	 * @throws {MissingRequiredFieldError} when a field without default is absent
	 * @throws {ValidationError} when a converted value fails its validator
	 */
	fromJSON(raw: unknown, path?: string): Instance<F>;
	/**
	 * Serialize every non-derived field that is not {@link NO_UPDATE};
	 * `null` is written as an explicit `null`.
	 */
	toJSON(instance: Instance<F>): WireDocument;
	/** Construct a not-yet-persisted instance locally */
	build(init: BuildInput<F>): Instance<F>;
}

function decodeDerived(
	descriptor: DerivedDescriptor<unknown>,
	raw: Record<string, unknown>,
	path: string,
): unknown {
	const source = raw[descriptor.source];
	if (source === undefined || source === null || isUnset(source)) return null;
	return descriptor.converter.fromJSON(source, path);
}

function decodeField(
	descriptor: FieldDescriptor<unknown>,
	value: unknown,
	path: string,
): unknown {
	if (value === undefined) {
		if (!descriptor.hasDefault) throw new MissingRequiredFieldError(path);
		const fallback = descriptor.defaultValue;
		// list defaults are copied so instances never share them
		return Array.isArray(fallback) ? [...fallback] : fallback;
	}
	// an untouched field stays untouched when an instance is rebuilt locally
	if (isUnset(value) && isUnset(descriptor.defaultValue)) return value;

	const converted = descriptor.converter.fromJSON(value, path);
	const verdict = descriptor.validate(converted);
	if (verdict !== true) {
		throw new ValidationError(
			path,
			verdict === false ? `invalid ${descriptor.converter.type} value` : verdict,
		);
	}
	return converted;
}

/**
 * Define a resource type.
 *
 * @example
 * ```typescript
 * const ContactModel = defineModel("Contact", {
 *   id: field(integer()),
 *   email: field(string()),
 *   phone: nullableField(string()),
 *   erp_code: untouched(string()),
 * });
 * type Contact = InstanceOf<typeof ContactModel>;
 * ```
 */
export function defineModel<F extends FieldMap>(name: string, fields: F): ResourceModel<F> {
	const fieldNames: FieldName<F>[] = [];
	for (const key in fields) fieldNames.push(key);

	const decode = (raw: unknown, path: string): Instance<F> => {
		if (!isPlainObject(raw)) throw new TypeMismatchError(path || name, name, raw);

		const out: Record<string, unknown> = {};
		for (const key of fieldNames) {
			const descriptor: AnyField = fields[key];
			const fieldPath = path ? `${path}.${key}` : key;
			out[key] = descriptor.kind === "derived"
				? decodeDerived(descriptor, raw, fieldPath)
				: decodeField(descriptor, raw[key], fieldPath);
		}
		// every declared key was assigned a value produced by its own descriptor
		return out as Instance<F>;
	};

	return {
		name,
		fields,
		fieldNames,
		fromJSON: (raw, path = "") => decode(raw, path),
		toJSON(instance) {
			const out: WireDocument = {};
			for (const key of fieldNames) {
				const descriptor: AnyField = fields[key];
				if (descriptor.kind === "derived") continue;
				const value: unknown = instance[key];
				if (isUnset(value)) continue;
				out[key] = value === null ? null : descriptor.converter.toJSON(value);
			}
			return out;
		},
		build: (init) => decode(init, ""),
	};
}
