/**
 * @module types/transport
 *
 * Transport interface for server communication.
 * Implement it to connect the resource managers to an HTTP stack; the library
 * ships an implementation over `fetch` and an in-process mock for tests.
 */

/** HTTP verbs the managers issue */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/** Query parameter values; `null` and `undefined` entries are dropped */
export type QueryParamValue = string | number | boolean | null | undefined;

/** Query parameters keyed by name */
export type QueryParams = Record<string, QueryParamValue>;

/** Primary key value used in update URLs */
export type PrimaryKey = string | number;

/**
 * Transport collaborator. Every method resolves to the decoded JSON body
 * (left `unknown`: the mapping layer validates it) and rejects with
 * `@marianmeres/http-utils` errors on non-2xx responses (`HTTP_ERROR.NotFound`
 * for 404). Retries, timeouts and authentication live here, not in the managers.
 */
export interface ResourceTransport {
	/** GET a single resource */
	getResource(url: string, params?: QueryParams): Promise<unknown>;
	/** GET one page of a list (a `{ results, next }` envelope or a bare array) */
	getResourceList(url: string, params?: QueryParams): Promise<unknown>;
	/** POST a new resource (or a batch, when `data` is an array) */
	createResource(url: string, data: unknown): Promise<unknown>;
	/** PATCH `<url>/<primaryKey>` with a partial document */
	updateResource(
		url: string,
		primaryKey: PrimaryKey,
		data: unknown,
		params?: QueryParams,
	): Promise<unknown>;
	/** Arbitrary request, e.g. status-change actions */
	request(
		url: string,
		method: HttpMethod,
		data?: unknown,
		params?: QueryParams,
	): Promise<unknown>;
}
