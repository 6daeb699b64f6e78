import { afterEach, beforeEach, expect, test } from "vitest";
import { createClog } from "@marianmeres/clog";
import { createMockTransport, type MockRequest } from "../src/adapters/mock/transport.ts";
import {
	MalformedPaginationEnvelopeError,
	PaginationLimitError,
} from "../src/model/errors.ts";
import { cleanParams, fetchAllPages, parseListPage } from "../src/pagination.ts";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

const BASE = "https://api.example.com/items";

// three pages of sizes 3, 3, 2
const pages: Record<string, { results: number[]; next: string | null }> = {
	"1": { results: [1, 2, 3], next: `${BASE}?page=2&status=open` },
	"2": { results: [4, 5, 6], next: `${BASE}?page=3&status=open` },
	"3": { results: [7, 8], next: null },
};

const pagedRoute = ({ params }: MockRequest) => pages[String(params.page ?? "1")];

test("aggregates every page in server order", async () => {
	const transport = createMockTransport({ routes: { "GET items": pagedRoute } });
	const { items, pages: count } = await fetchAllPages(transport, "items");
	expect(items).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
	expect(count).toBe(3);
	expect(transport.calls.map((c) => c.params)).toEqual([
		{},
		{ page: "2", status: "open" },
		{ page: "3", status: "open" },
	]);
});

test("caller params override params parsed from next", async () => {
	const transport = createMockTransport({ routes: { "GET items": pagedRoute } });
	await fetchAllPages(transport, "items", { status: "closed", page_size: 3 });
	expect(transport.calls.map((c) => c.params)).toEqual([
		{ status: "closed", page_size: 3 },
		{ page: "2", status: "closed", page_size: 3 },
		{ page: "3", status: "closed", page_size: 3 },
	]);
});

test("null and undefined caller params are not sent", async () => {
	expect(cleanParams({ a: 1, b: null, c: undefined, d: false })).toEqual({ a: 1, d: false });

	const transport = createMockTransport({ routes: { "GET items": [1] } });
	await fetchAllPages(transport, "items", { status: null, type: "export_order" });
	expect(transport.calls[0].params).toEqual({ type: "export_order" });
});

test("every page requests the same url", async () => {
	const transport = createMockTransport({ routes: { "GET items": pagedRoute } });
	await fetchAllPages(transport, "items");
	expect(transport.calls.map((c) => c.url)).toEqual(["items", "items", "items"]);
});

test("a bare array is the complete list", async () => {
	const transport = createMockTransport({ routes: { "GET items": [{ id: 1 }, { id: 2 }] } });
	const result = await fetchAllPages(transport, "items");
	expect(result).toEqual({ items: [{ id: 1 }, { id: 2 }], pages: 1 });
	expect(transport.calls.length).toBe(1);
});

test("relative next values are followed", async () => {
	const transport = createMockTransport({
		routes: {
			"GET items": ({ params }) =>
				params.cursor === "abc"
					? { results: ["b"], next: null }
					: { results: ["a"], next: "/items?cursor=abc" },
		},
	});
	const { items } = await fetchAllPages(transport, "items");
	expect(items).toEqual(["a", "b"]);
	expect(transport.calls[1].params).toEqual({ cursor: "abc" });
});

test("parseListPage rejects malformed envelopes", () => {
	expect(() => parseListPage("items", { results: [], next: 42 })).toThrow(
		'List response from "items": next must be a string or null',
	);
	expect(() => parseListPage("items", { results: [], next: "not a url" })).toThrow(
		"next is not a URL",
	);
	expect(() => parseListPage("items", { next: null })).toThrow(
		'List response from "items": envelope has no results array',
	);
	expect(() => parseListPage("items", "oops")).toThrow(MalformedPaginationEnvelopeError);
});

test("an absent next ends the list", () => {
	const page = parseListPage("items", { results: [1] });
	expect(page.next).toBeNull();
});

test("a malformed page discards everything collected so far", async () => {
	const transport = createMockTransport({
		routes: {
			"GET items": ({ params }) =>
				params.page === "2"
					? { results: [3], next: "::" }
					: { results: [1, 2], next: `${BASE}?page=2` },
		},
	});
	await expect(fetchAllPages(transport, "items")).rejects.toThrow(
		MalformedPaginationEnvelopeError,
	);
});

test("stops at the page ceiling", async () => {
	const transport = createMockTransport({
		routes: { "GET items": { results: [1], next: `${BASE}?page=2` } },
	});
	await expect(fetchAllPages(transport, "items", {}, { maxPages: 5 })).rejects.toThrow(
		PaginationLimitError,
	);
	expect(transport.calls.length).toBe(5);
});

test("transport errors propagate", async () => {
	const transport = createMockTransport({
		routes: { "GET items": pagedRoute },
		forceError: { operation: "getResourceList", message: "boom" },
	});
	await expect(fetchAllPages(transport, "items")).rejects.toThrow("boom");
});
