/**
 * In-process mock transport for testing.
 */

import { HTTP_ERROR } from "@marianmeres/http-utils";
import type {
	HttpMethod,
	PrimaryKey,
	QueryParams,
	ResourceTransport,
} from "../../types/transport.ts";

/** One recorded call */
export interface MockRequest {
	operation: keyof ResourceTransport;
	method: HttpMethod;
	/** Path including the primary key for updates */
	url: string;
	params: QueryParams;
	data: unknown;
}

/** Computes a response from the request */
export type MockHandler = (request: MockRequest) => unknown;

/** A canned JSON body, or a handler producing one */
export type MockRoute = MockHandler | Record<string, unknown> | unknown[];

/** Mock transport options */
export interface MockTransportOptions {
	/** Responses keyed by `"<METHOD> <url>"`, e.g. `"GET quotes/public/1042"` */
	routes?: Record<string, MockRoute>;
	/** Simulated network delay in ms (default: 0) */
	delay?: number;
	/** Force errors for testing */
	forceError?: {
		operation?: keyof ResourceTransport;
		message?: string;
	};
}

export interface MockTransport extends ResourceTransport {
	/** Every call, in order */
	readonly calls: MockRequest[];
	/** Add or replace a route */
	route(key: string, response: MockRoute): void;
}

/**
 * Create a mock transport. Unknown routes reject with `HTTP_ERROR.NotFound`;
 * responses are deep-cloned, so fixtures are never shared with the caller.
 */
export function createMockTransport(options: MockTransportOptions = {}): MockTransport {
	const delay = options.delay ?? 0;
	const routes = new Map<string, MockRoute>(Object.entries(options.routes ?? {}));
	const calls: MockRequest[] = [];

	const wait = () => new Promise<void>((r) => setTimeout(r, delay));

	const handle = async (request: MockRequest): Promise<unknown> => {
		calls.push(request);
		await wait();
		if (options.forceError?.operation === request.operation) {
			throw new HTTP_ERROR.BadRequest(
				options.forceError.message ?? `Mock error for ${request.operation}`,
			);
		}
		const key = `${request.method} ${request.url}`;
		const route = routes.get(key);
		if (route === undefined) {
			throw new HTTP_ERROR.NotFound(`No mock route for ${key}`);
		}
		return structuredClone(typeof route === "function" ? await route(request) : route);
	};

	return {
		calls,
		route(key, response) {
			routes.set(key, response);
		},
		getResource: (url, params = {}) =>
			handle({ operation: "getResource", method: "GET", url, params, data: undefined }),
		getResourceList: (url, params = {}) =>
			handle({ operation: "getResourceList", method: "GET", url, params, data: undefined }),
		createResource: (url, data) =>
			handle({ operation: "createResource", method: "POST", url, params: {}, data }),
		updateResource: (url, primaryKey: PrimaryKey, data, params = {}) =>
			handle({
				operation: "updateResource",
				method: "PATCH",
				url: `${url}/${encodeURIComponent(primaryKey)}`,
				params,
				data,
			}),
		request: (url, method, data, params = {}) =>
			handle({ operation: "request", method, url, params, data }),
	};
}
