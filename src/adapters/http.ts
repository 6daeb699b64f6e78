/**
 * @module adapters/http
 *
 * {@link ResourceTransport} over `fetch`, authenticating with an API token.
 */

import { createClog } from "@marianmeres/clog";
import { createHttpError, HTTP_ERROR } from "@marianmeres/http-utils";
import type {
	HttpMethod,
	PrimaryKey,
	QueryParams,
	ResourceTransport,
} from "../types/transport.ts";

/** Options of {@link createHttpTransport} */
export interface HttpTransportOptions {
	/** API root, e.g. `https://api.example.com/v1` */
	baseUrl: string;
	/** API token, sent as `Authorization: API-Token <token>` */
	token: string;
	/** Sent as `X-Api-Version` when set */
	apiVersion?: string;
	/** `fetch` implementation (default: the global one) */
	fetch?: typeof fetch;
	/** Request timeout in ms (default: 30000) */
	timeout?: number;
}

/** Default request timeout */
export const DEFAULT_TIMEOUT = 30_000;

/** `<baseUrl>/<path>?<params>`, skipping `null` / `undefined` params */
export function buildUrl(baseUrl: string, path: string, params: QueryParams = {}): string {
	const url = `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
	const query = new URLSearchParams();
	for (const [key, value] of Object.entries(params)) {
		if (value !== null && value !== undefined) query.set(key, String(value));
	}
	const qs = query.toString();
	return qs ? `${url}?${qs}` : url;
}

async function readBody(response: Response): Promise<unknown> {
	const text = await response.text();
	if (!text) return null;
	try {
		return JSON.parse(text);
	} catch {
		return text;
	}
}

/**
 * Create an HTTP transport.
 *
 * Non-2xx responses reject with `@marianmeres/http-utils` errors:
 * `HTTP_ERROR.NotFound` for 404, the matching class for any other status.
 * Network failures and timeouts reject with a 503 error. Nothing is retried.
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({
 *   baseUrl: "https://api.example.com",
 *   token: process.env.API_TOKEN ?? "",
 * });
 * ```
 */
export function createHttpTransport(options: HttpTransportOptions): ResourceTransport {
	const clog = createClog("shopquote:http", { color: "auto" });
	const doFetch = options.fetch ?? fetch;
	const timeout = options.timeout ?? DEFAULT_TIMEOUT;

	const headers: Record<string, string> = {
		Accept: "application/json",
		Authorization: `API-Token ${options.token}`,
	};
	if (options.apiVersion) headers["X-Api-Version"] = options.apiVersion;

	const send = async (
		method: HttpMethod,
		path: string,
		data?: unknown,
		params?: QueryParams,
	): Promise<unknown> => {
		const url = buildUrl(options.baseUrl, path, params);
		clog.debug("request", { method, path });

		let response: Response;
		try {
			response = await doFetch(url, {
				method,
				headers: data === undefined
					? headers
					: { ...headers, "Content-Type": "application/json" },
				body: data === undefined ? undefined : JSON.stringify(data),
				signal: AbortSignal.timeout(timeout),
			});
		} catch (e) {
			throw createHttpError(
				503,
				`${method} ${path}: ${e instanceof Error ? e.message : String(e)}`,
			);
		}

		const body = await readBody(response);
		clog.debug("response", { method, path, status: response.status });
		if (!response.ok) {
			const message = `${method} ${path}: ${response.status} ${response.statusText}`;
			if (response.status === 404) throw new HTTP_ERROR.NotFound(message);
			throw createHttpError(
				response.status,
				message,
				typeof body === "string" ? body : JSON.stringify(body),
			);
		}
		return body;
	};

	return {
		getResource: (url, params) => send("GET", url, undefined, params),
		getResourceList: (url, params) => send("GET", url, undefined, params),
		createResource: (url, data) => send("POST", url, data),
		updateResource: (url, primaryKey: PrimaryKey, data, params) =>
			send("PATCH", `${url}/${encodeURIComponent(primaryKey)}`, data, params),
		request: (url, method, data, params) => send(method, url, data, params),
	};
}

/** Error class of a 404 response */
export const NotFoundError = HTTP_ERROR.NotFound;

/** Whether `e` is a 404 from the transport */
export function isNotFound(e: unknown): e is InstanceType<typeof HTTP_ERROR.NotFound> {
	return e instanceof HTTP_ERROR.NotFound;
}
