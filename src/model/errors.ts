/**
 * @module model/errors
 *
 * Error classes raised while mapping between wire JSON and resource instances,
 * and while following paginated lists.
 */

/** Base class for every error raised by the mapping and list layers */
export class ResourceError extends Error {
	/** Error code for programmatic handling */
	readonly code: string;

	constructor(code: string, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ResourceError";
		this.code = code;
	}
}

/** Short, log-safe description of a raw value */
export function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (value === undefined) return "undefined";
	if (Array.isArray(value)) return "array";
	if (typeof value === "symbol") return value.description ?? "symbol";
	if (typeof value === "string") {
		const shown = value.length > 40 ? `${value.slice(0, 40)}...` : value;
		return `string "${shown}"`;
	}
	if (typeof value === "object") return "object";
	return `${typeof value} ${String(value)}`;
}

/** A raw value could not be coerced to the declared type of a field */
export class TypeMismatchError extends ResourceError {
	readonly field: string;
	readonly expected: string;
	readonly received: string;

	constructor(field: string, expected: string, received: unknown) {
		const description = describeValue(received);
		super(
			"TYPE_MISMATCH",
			`Field "${field}": expected ${expected}, received ${description}`,
		);
		this.name = "TypeMismatchError";
		this.field = field;
		this.expected = expected;
		this.received = description;
	}
}

/** A converted value was rejected by its field's validator */
export class ValidationError extends ResourceError {
	readonly field: string;

	constructor(field: string, message: string, code = "VALIDATION_FAILED") {
		super(code, `Field "${field}": ${message}`);
		this.name = "ValidationError";
		this.field = field;
	}
}

/** A field without a default was absent from the raw document */
export class MissingRequiredFieldError extends ValidationError {
	constructor(field: string) {
		super(field, "required field is missing", "MISSING_REQUIRED_FIELD");
		this.name = "MissingRequiredFieldError";
	}
}

/** A list response was neither a bare array nor a `{ results, next }` envelope */
export class MalformedPaginationEnvelopeError extends ResourceError {
	readonly url: string;

	constructor(url: string, message: string) {
		super("MALFORMED_ENVELOPE", `List response from "${url}": ${message}`);
		this.name = "MalformedPaginationEnvelopeError";
		this.url = url;
	}
}

/** The server kept returning `next` past the configured page ceiling */
export class PaginationLimitError extends ResourceError {
	readonly url: string;
	readonly maxPages: number;

	constructor(url: string, maxPages: number) {
		super(
			"PAGINATION_LIMIT",
			`List "${url}" still had a next page after ${maxPages} pages`,
		);
		this.name = "PaginationLimitError";
		this.url = url;
		this.maxPages = maxPages;
	}
}
