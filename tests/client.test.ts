import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { createClog } from "@marianmeres/clog";
import { createMockTransport } from "../src/adapters/mock/transport.ts";
import { createShopQuote } from "../src/client.ts";
import type { ShopQuoteEvent } from "../src/types/events.ts";
import type { ManagerError } from "../src/types/state.ts";
import orderJson from "./fixtures/order.json";
import quoteJson from "./fixtures/quote.json";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

const setup = () => {
	const transport = createMockTransport({
		routes: {
			"GET quotes/public/1042": quoteJson,
			"GET orders/public/72": orderJson,
		},
	});
	return { transport, client: createShopQuote({ transport }) };
};

test("a transport or http options are required", () => {
	expect(() => createShopQuote({})).toThrow(
		"ShopQuote needs either a transport or http options",
	);
});

test("http options create a fetch transport", async () => {
	const fetchMock = vi.fn<typeof fetch>(async () =>
		new Response(JSON.stringify(quoteJson), { status: 200 })
	);
	const client = createShopQuote({
		http: { baseUrl: "https://api.example.com", token: "test-token", fetch: fetchMock },
	});
	const quote = await client.quotes.get(1042);

	expect(quote.number).toBe(1042);
	expect(fetchMock.mock.calls[0][0]).toBe("https://api.example.com/quotes/public/1042");
});

test("managers share one transport", async () => {
	const { transport, client } = setup();
	await client.quotes.get(1042);
	await client.orders.get(72);
	expect(client.transport).toBe(transport);
	expect(transport.calls.map((c) => c.url)).toEqual(["quotes/public/1042", "orders/public/72"]);
});

test("onBeforeSync fires when a manager starts syncing", async () => {
	const { client } = setup();
	const seen: { resource: string; previousState: string }[] = [];
	client.onBeforeSync((info) => seen.push(info));

	await client.quotes.get(1042);
	await client.orders.get(72);

	expect(seen).toEqual([
		{ resource: "quote", previousState: "ready" },
		{ resource: "order", previousState: "ready" },
	]);
});

test("onAfterSync reports success and failure", async () => {
	const { client } = setup();
	const seen: { resource: string; success: boolean; error?: ManagerError }[] = [];
	const unsubscribe = client.onAfterSync((info) => seen.push(info));

	await client.quotes.get(1042);
	await expect(client.orders.get(99)).rejects.toThrow("No mock route for GET orders/public/99");

	expect(seen.length).toBe(2);
	expect(seen[0]).toEqual({ resource: "quote", success: true });
	expect(seen[1].resource).toBe("order");
	expect(seen[1].success).toBe(false);
	expect(seen[1].error?.code).toBe("NOT_FOUND");
	expect(seen[1].error?.operation).toBe("get");

	unsubscribe();
	await client.quotes.get(1042);
	expect(seen.length).toBe(2);
});

test("on subscribes to one event type", async () => {
	const { client } = setup();
	const fetched: ShopQuoteEvent[] = [];
	client.on("resource:fetched", (event: ShopQuoteEvent) => fetched.push(event));

	await client.quotes.get(1042);
	await client.orders.get(72);

	expect(fetched.map((e) => e.resource)).toEqual(["quote", "order"]);
});

test("onAny receives every event", async () => {
	const { client } = setup();
	const events: string[] = [];
	client.onAny((envelope) => events.push(envelope.event));

	await client.orders.get(72);

	expect(events).toEqual([
		"resource:state:changed",
		"resource:fetched",
		"resource:synced",
	]);
});

test("once fires a single time", async () => {
	const { client } = setup();
	let count = 0;
	client.once("resource:fetched", () => count++);

	await client.quotes.get(1042);
	await client.quotes.get(1042);

	expect(count).toBe(1);
});

test("reset returns every manager to ready", async () => {
	const { client } = setup();
	await expect(client.quotes.get(1)).rejects.toThrow();
	expect(client.quotes.getStatus().state).toBe("error");

	client.reset();

	expect(client.quotes.getStatus()).toEqual({ state: "ready", error: null, lastSyncedAt: null });
	expect(client.orders.getStatus().state).toBe("ready");
});
