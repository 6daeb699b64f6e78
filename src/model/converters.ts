/**
 * @module model/converters
 *
 * Converters coerce raw wire values into typed field values and back.
 *
 * Every converter is pure and total: it either returns a value of its declared
 * type or throws a {@link TypeMismatchError} naming the field path and the
 * expected type. Nothing falls back to a default silently.
 */

import Decimal from "decimal.js";
import { TypeMismatchError } from "./errors.ts";
import { Money } from "./money.ts";
import { isUnset, type NoUpdate } from "./sentinel.ts";

/** Any value JSON can carry */
export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

/** A serialized resource, ready for `JSON.stringify` */
export type WireDocument = Record<string, unknown>;

/** Bidirectional mapping between a raw wire value and a typed value */
export interface Converter<T> {
	/** Type name used in error messages */
	readonly type: string;
	/** Coerce a raw value; `path` identifies the field for error reporting */
	fromJSON(raw: unknown, path: string): T;
	/** Produce the wire form of a typed value */
	toJSON(value: T): unknown;
}

/** Anything that can turn a raw mapping into an instance and back */
export interface ModelLike<T> {
	readonly name: string;
	fromJSON(raw: unknown, path?: string): T;
	toJSON(instance: T): WireDocument;
}

/** Plain, non-array object (the shape of a decoded JSON mapping) */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		!(value instanceof Map) &&
		!(value instanceof Date) &&
		!(value instanceof Decimal) &&
		!(value instanceof Money)
	);
}

function isJsonValue(value: unknown): value is JsonValue {
	if (value === null) return true;
	switch (typeof value) {
		case "string":
		case "boolean":
			return true;
		case "number":
			return Number.isFinite(value);
		case "object":
			if (Array.isArray(value)) return value.every(isJsonValue);
			return isPlainObject(value) && Object.values(value).every(isJsonValue);
		default:
			return false;
	}
}

const identity = <T>(value: T): T => value;

function scalar<T>(type: string, accepts: (raw: unknown) => raw is T): Converter<T> {
	return {
		type,
		fromJSON(raw, path) {
			if (!accepts(raw)) throw new TypeMismatchError(path, type, raw);
			return raw;
		},
		toJSON: identity,
	};
}

/** Strings, unchanged */
export function string(): Converter<string> {
	return scalar("string", (raw): raw is string => typeof raw === "string");
}

/** Whole numbers; `3.5`, `"3"` or values beyond 2^53 are mismatches */
export function integer(): Converter<number> {
	return scalar("integer", (raw): raw is number => Number.isSafeInteger(raw));
}

/** Finite numbers */
export function number(): Converter<number> {
	return scalar(
		"number",
		(raw): raw is number => typeof raw === "number" && Number.isFinite(raw),
	);
}

export function boolean(): Converter<boolean> {
	return scalar("boolean", (raw): raw is boolean => typeof raw === "boolean");
}

/** Any JSON value, passed through (for loosely typed payloads such as variable values) */
export function json(): Converter<JsonValue> {
	return scalar("json", isJsonValue);
}

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Date rolls "2026-02-30" over to March, so the parts must survive the trip
function isCalendarDate(raw: unknown): raw is string {
	if (typeof raw !== "string") return false;
	const match = CALENDAR_DATE.exec(raw);
	if (!match) return false;
	const [year, month, day] = match.slice(1).map(Number);
	const parsed = new Date(0);
	parsed.setUTCFullYear(year, month - 1, day);
	return (
		parsed.getUTCFullYear() === year &&
		parsed.getUTCMonth() === month - 1 &&
		parsed.getUTCDate() === day
	);
}

/** `YYYY-MM-DD` calendar dates, kept as strings */
export function date(): Converter<string> {
	return scalar("date (YYYY-MM-DD)", isCalendarDate);
}

/** ISO 8601 timestamps (or `Date` instances) as `Date` */
export function dateTime(): Converter<Date> {
	return {
		type: "datetime",
		fromJSON(raw, path) {
			if (raw instanceof Date && !Number.isNaN(raw.getTime())) return raw;
			if (typeof raw === "string") {
				const parsed = new Date(raw);
				if (!Number.isNaN(parsed.getTime())) return parsed;
			}
			throw new TypeMismatchError(path, "datetime", raw);
		},
		toJSON: (value) => value.toISOString(),
	};
}

const NUMERIC = /^-?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

function toDecimal(raw: unknown): Decimal | null {
	if (typeof raw === "number" && Number.isFinite(raw)) return new Decimal(raw);
	if (typeof raw === "string" && NUMERIC.test(raw.trim())) return new Decimal(raw.trim());
	return null;
}

/** Exact decimals; an existing `Decimal` passes through unchanged */
export function decimal(): Converter<Decimal> {
	return {
		type: "decimal",
		fromJSON(raw, path) {
			if (raw instanceof Decimal) return raw;
			const value = toDecimal(raw);
			if (value === null) throw new TypeMismatchError(path, "decimal", raw);
			return value;
		},
		toJSON: (value) => value.toString(),
	};
}

/** Currency amounts; an existing `Money` passes through unchanged */
export function money(): Converter<Money> {
	return {
		type: "money",
		fromJSON(raw, path) {
			if (raw instanceof Money) return raw;
			const value = raw instanceof Decimal ? raw : toDecimal(raw);
			if (value === null) throw new TypeMismatchError(path, "money", raw);
			return new Money(value);
		},
		toJSON: (value) => value.toJSON(),
	};
}

/**
 * One nested resource. `null` (or an absent value) passes through as `null`:
 * optional nested objects are never built from empty data.
 */
export function nested<T>(model: ModelLike<T>): Converter<T | null> {
	return {
		type: model.name,
		fromJSON(raw, path) {
			if (raw === null || raw === undefined) return null;
			return model.fromJSON(raw, path);
		},
		toJSON: (value) => (value === null ? null : model.toJSON(value)),
	};
}

/** One nested resource that must be present */
export function instance<T>(model: ModelLike<T>): Converter<T> {
	return {
		type: model.name,
		fromJSON: (raw, path) => model.fromJSON(raw, path),
		toJSON: (value) => model.toJSON(value),
	};
}

/** Ordered sequence; `null` is a mismatch unless wrapped in {@link nullable} */
export function list<T>(inner: Converter<T>): Converter<T[]> {
	const type = `list<${inner.type}>`;
	return {
		type,
		fromJSON(raw, path) {
			if (!Array.isArray(raw)) throw new TypeMismatchError(path, type, raw);
			return raw.map((item, i) => inner.fromJSON(item, `${path}[${i}]`));
		},
		toJSON: (value) => value.map((item) => inner.toJSON(item)),
	};
}

const POSITIVE_INTEGER_KEY = /^[1-9]\d*$/;

function toQuantityKey(key: unknown): number | null {
	if (typeof key === "number") return Number.isSafeInteger(key) && key > 0 ? key : null;
	if (typeof key === "string" && POSITIVE_INTEGER_KEY.test(key)) {
		const parsed = Number(key);
		return Number.isSafeInteger(parsed) ? parsed : null;
	}
	return null;
}

/**
 * Mapping keyed by order quantity (positive integers). JSON object keys are
 * strings on the wire, so `{"1": .., "10": ..}` becomes `Map { 1 => .., 10 => .. }`
 * and is written back with string keys.
 */
export function mapping<T>(inner: Converter<T>): Converter<Map<number, T>> {
	const type = `mapping<quantity, ${inner.type}>`;
	return {
		type,
		fromJSON(raw, path) {
			let entries: [unknown, unknown][];
			if (raw instanceof Map) entries = [...raw.entries()];
			else if (isPlainObject(raw)) entries = Object.entries(raw);
			else throw new TypeMismatchError(path, type, raw);

			const out = new Map<number, T>();
			for (const [key, value] of entries) {
				const quantity = toQuantityKey(key);
				const keyPath = `${path}[${String(key)}]`;
				if (quantity === null) {
					throw new TypeMismatchError(keyPath, "positive integer key", key);
				}
				out.set(quantity, inner.fromJSON(value, keyPath));
			}
			return out;
		},
		toJSON(value) {
			const out: Record<string, unknown> = {};
			for (const [key, item] of value) out[String(key)] = inner.toJSON(item);
			return out;
		},
	};
}

/** `null` passes through; otherwise delegates */
export function nullable<T>(inner: Converter<T>): Converter<T | null> {
	return {
		type: `${inner.type} | null`,
		fromJSON: (raw, path) => (raw === null ? null : inner.fromJSON(raw, path)),
		toJSON: (value) => (value === null ? null : inner.toJSON(value)),
	};
}

/** `null` and {@link NO_UPDATE} pass through unchanged; otherwise delegates */
export function optional<T>(inner: Converter<T>): Converter<T | null | NoUpdate> {
	return {
		type: `${inner.type} | null`,
		fromJSON(raw, path) {
			if (raw === null || isUnset(raw)) return raw;
			return inner.fromJSON(raw, path);
		},
		toJSON(value) {
			if (value === null) return null;
			if (isUnset(value)) return undefined;
			return inner.toJSON(value);
		},
	};
}
