/**
 * @module pagination
 *
 * Pagination-following list protocol. Pages are requested strictly one after
 * another: the query for page N+1 is only known once page N is parsed.
 */

import { createClog } from "@marianmeres/clog";
import { isPlainObject } from "./model/converters.ts";
import {
	MalformedPaginationEnvelopeError,
	PaginationLimitError,
} from "./model/errors.ts";
import type { QueryParams, ResourceTransport } from "./types/transport.ts";

const clog = createClog("shopquote:pagination", { color: "auto" });

/** Default ceiling on pages followed by one `list` call */
export const DEFAULT_MAX_PAGES = 1000;

// only used to resolve relative `next` values such as "/orders?page=2"
const RELATIVE_BASE = "http://relative.invalid";

/** One parsed list response */
export interface ListPage {
	results: unknown[];
	/** Follow-up URL, or null on the last page */
	next: URL | null;
}

/** Raw items of every page, in server order */
export interface PagedResult {
	items: unknown[];
	pages: number;
}

export interface FetchAllPagesOptions {
	/** Give up after this many pages (default: {@link DEFAULT_MAX_PAGES}) */
	maxPages?: number;
}

/** Drop `null` / `undefined` entries, which mean "no filter" */
export function cleanParams(params: QueryParams = {}): QueryParams {
	const out: QueryParams = {};
	for (const [key, value] of Object.entries(params)) {
		if (value !== null && value !== undefined) out[key] = value;
	}
	return out;
}

function parseNext(url: string, next: unknown): URL | null {
	if (next === null || next === undefined) return null;
	if (typeof next !== "string") {
		throw new MalformedPaginationEnvelopeError(url, "next must be a string or null");
	}
	const relative = next.startsWith("/") || next.startsWith("?");
	try {
		return relative ? new URL(next, RELATIVE_BASE) : new URL(next);
	} catch (e) {
		throw new MalformedPaginationEnvelopeError(
			url,
			`next is not a URL: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
}

/**
 * Parse a list response: either a bare array (the complete list) or a
 * `{ results: [...], next: url | null }` envelope.
 */
export function parseListPage(url: string, body: unknown): ListPage {
	if (Array.isArray(body)) return { results: body, next: null };
	if (!isPlainObject(body)) {
		throw new MalformedPaginationEnvelopeError(url, "expected an array or an envelope object");
	}
	const results = body["results"];
	if (!Array.isArray(results)) {
		throw new MalformedPaginationEnvelopeError(url, "envelope has no results array");
	}
	return { results, next: parseNext(url, body["next"]) };
}

/** Query parameters carried by a `next` URL (last value wins for repeated keys) */
export function paramsFromNext(next: URL): QueryParams {
	return Object.fromEntries(next.searchParams.entries());
}

/**
 * Fetch every page of a list endpoint and concatenate the raw items.
 *
 * Follow-up requests go to the same `url`, with the params parsed from `next`
 * overlaid by the caller's params (caller wins on collision). Aggregation is
 * all-or-nothing: any failure discards what was collected so far.
 *
 * @throws {MalformedPaginationEnvelopeError} on an unparsable page
 * @throws {PaginationLimitError} when `next` is still set after `maxPages` pages
 */
export async function fetchAllPages(
	transport: ResourceTransport,
	url: string,
	params: QueryParams = {},
	options: FetchAllPagesOptions = {},
): Promise<PagedResult> {
	const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
	const callerParams = cleanParams(params);

	let page = parseListPage(url, await transport.getResourceList(url, callerParams));
	const items = [...page.results];
	let pages = 1;

	while (page.next !== null) {
		if (pages >= maxPages) throw new PaginationLimitError(url, maxPages);
		const nextParams = { ...paramsFromNext(page.next), ...callerParams };
		clog.debug("following next", { url, page: pages + 1 });
		page = parseListPage(url, await transport.getResourceList(url, nextParams));
		items.push(...page.results);
		pages++;
	}

	clog.debug("done", { url, pages, count: items.length });
	return { items, pages };
}
