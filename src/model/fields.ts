/**
 * @module model/fields
 *
 * Field descriptors: how one key of a resource is converted, defaulted and
 * validated. Declared once per resource type and never mutated afterwards.
 */

import {
	type Converter,
	nullable,
	optional,
} from "./converters.ts";
import { NO_UPDATE, type NoUpdate } from "./sentinel.ts";

/** Returns `true` to accept, `false` or a message to reject */
export type Validator<T> = (value: T) => boolean | string;

/** A regular (serialized) field */
export interface FieldDescriptor<T, D extends boolean = boolean> {
	readonly kind: "field";
	readonly converter: Converter<T>;
	/** Fields without a default are required in raw documents and in `build()` */
	readonly hasDefault: D;
	readonly defaultValue: T | undefined;
	/** Validator verdict for an already converted value */
	validate(value: T): boolean | string;
}

/**
 * A computed field, read from another raw key when an instance is built.
 * Never serialized.
 */
export interface DerivedDescriptor<T> {
	readonly kind: "derived";
	readonly source: string;
	readonly converter: Converter<T>;
	readonly hasDefault: true;
}

export type AnyField = FieldDescriptor<unknown> | DerivedDescriptor<unknown>;

/** Field declarations of one resource type, keyed by wire name */
export type FieldMap = Record<string, AnyField>;

/** Typed value a descriptor produces */
export type FieldValue<D> = D extends DerivedDescriptor<infer T>
	? T | null
	: D extends FieldDescriptor<infer T>
	? T
	: never;

export type FieldName<F> = Extract<keyof F, string>;

const acceptAll = (): true => true;

/** A field that must be present */
export function field<T>(converter: Converter<T>): FieldDescriptor<T, false>;
/** A field falling back to `default` when absent */
export function field<T>(
	converter: Converter<T>,
	options: { default: T; validate?: Validator<T> },
): FieldDescriptor<T, true>;
/** A required field with a validator */
export function field<T>(
	converter: Converter<T>,
	options: { validate: Validator<T> },
): FieldDescriptor<T, false>;
export function field<T>(
	converter: Converter<T>,
	options: { default?: T; validate?: Validator<T> } = {},
): FieldDescriptor<T> {
	const validator: Validator<T> = options.validate ?? acceptAll;
	return {
		kind: "field",
		converter,
		hasDefault: "default" in options,
		defaultValue: options.default,
		validate: (value: T) => validator(value),
	};
}

/** Optional key; `null` when absent */
export function nullableField<T>(
	converter: Converter<T>,
	validate?: Validator<T | null>,
): FieldDescriptor<T | null, true> {
	return field<T | null>(nullable(converter), { default: null, validate });
}

/**
 * Field the caller may leave untouched: defaults to {@link NO_UPDATE}, so it
 * is only sent when explicitly assigned (`null` included).
 */
export function untouched<T>(
	converter: Converter<T>,
	validate?: Validator<T | null | NoUpdate>,
): FieldDescriptor<T | null | NoUpdate, true> {
	return field<T | null | NoUpdate>(optional(converter), { default: NO_UPDATE, validate });
}

/** Computed from the raw value under `source` */
export function derived<T>(source: string, converter: Converter<T>): DerivedDescriptor<T> {
	return { kind: "derived", source, converter, hasDefault: true };
}

/** Validator accepting only the listed values (and `null` / unset for optional fields) */
export function oneOf<T>(values: readonly T[]): Validator<T | null | NoUpdate> {
	return (value) =>
		value === null ||
		value === NO_UPDATE ||
		values.includes(value) ||
		`must be one of ${values.map(String).join(", ")}`;
}

/** Validator for numbers that must not be negative */
export function nonNegative(value: number): boolean | string {
	return value >= 0 || "must not be negative";
}
