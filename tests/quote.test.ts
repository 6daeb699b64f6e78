import Decimal from "decimal.js";
import { afterEach, beforeEach, expect, test } from "vitest";
import { createClog } from "@marianmeres/clog";
import { HTTP_ERROR } from "@marianmeres/http-utils";
import { createPubSub } from "@marianmeres/pubsub";
import { createMockTransport, type MockRoute } from "../src/adapters/mock/transport.ts";
import { QuoteManager } from "../src/domains/quote.ts";
import { TypeMismatchError } from "../src/model/errors.ts";
import { NO_UPDATE } from "../src/model/sentinel.ts";
import { getVariable, getVariableForQuantity } from "../src/resources/components.ts";
import type { QuoteStatusChangedEvent } from "../src/types/events.ts";
import quoteJson from "./fixtures/quote.json";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

const setup = (routes: Record<string, MockRoute> = {}) => {
	const transport = createMockTransport({
		routes: { "GET quotes/public/1042": quoteJson, ...routes },
	});
	const pubsub = createPubSub();
	const quotes = new QuoteManager({ transport, pubsub });
	return { transport, pubsub, quotes };
};

test("get fetches and parses a quote", async () => {
	const { transport, quotes } = setup();
	const quote = await quotes.get(1042);

	expect(transport.calls[0]).toEqual({
		operation: "getResource",
		method: "GET",
		url: "quotes/public/1042",
		params: {},
		data: undefined,
	});
	expect(quote.number).toBe(1042);
	expect(quote.revision_number).toBe(2);
	expect(quote.tax_rate?.equals(new Decimal("0.0825"))).toBe(true);
	expect(quote.customer?.company?.metrics?.quotes_sent_all_time).toBe(14);
	expect(quote.contact?.account?.erp_code).toBe("ACME");
	expect(quote.created_dt?.toISOString()).toBe("2026-04-30T08:15:00.000Z");
	expect(quote.erp_code).toBe("Q-1042");
	expect(quotes.lifecycle(quote)).toBe("persisted");

	const status = quotes.getStatus();
	expect(status.state).toBe("ready");
	expect(status.error).toBeNull();
	expect(typeof status.lastSyncedAt).toBe("number");
});

test("get sends the revision as a query parameter", async () => {
	const { transport, quotes } = setup();
	await quotes.get(1042, 2);
	expect(transport.calls[0].params).toEqual({ revision: 2 });
});

test("quantity-specific costing variables are keyed by quantity", async () => {
	const { quotes } = setup();
	const quote = await quotes.get(1042);
	const operation = quote.quote_items[0].components[0].shop_operations[0];

	expect(getVariableForQuantity(operation, "Setup Fee", 10)?.value).toBe(25);
	expect(getVariableForQuantity(operation, "Setup Fee", 1)?.value).toBe(40);
	expect(getVariableForQuantity(operation, "Setup Fee", 5)).toBeNull();
	expect(getVariableForQuantity(operation, "Nope", 10)).toBeNull();
	expect(getVariable(operation, "Setup Fee")).toBe(40);
});

test("quoted price breaks carry money values", async () => {
	const { quotes } = setup();
	const quote = await quotes.get(1042);
	const [quantity] = quote.quote_items[0].components[0].quantities;
	expect(quantity.unit_price.toJSON()).toBe("42.00");
	expect(quantity.expedites[0].markup).toBe(25);
	expect(quantity.most_likely_won_quantity_percent).toBe(80);
});

test("update sends the quote with its revision and reconciles in place", async () => {
	const { transport, quotes } = setup({
		"PATCH quotes/public/1042": { ...quoteJson, erp_code: "Q-1", quote_notes: "updated" },
	});
	const quote = await quotes.get(1042);
	const held = quote;
	quote.erp_code = "Q-1";
	expect(quotes.lifecycle(quote)).toBe("modified");

	const result = await quotes.update(quote);

	expect(result).toBe(held);
	const call = transport.calls[1];
	expect(call.operation).toBe("updateResource");
	expect(call.url).toBe("quotes/public/1042");
	expect(call.params).toEqual({ revision: 2 });
	expect(call.data).toEqual({ ...quoteJson, erp_code: "Q-1" });
	expect(held.quote_notes).toBe("updated");
	expect(quotes.lifecycle(held)).toBe("persisted");
});

test("update omits the revision parameter when the quote has none", async () => {
	const { transport, quotes } = setup({
		"PATCH quotes/public/1042": { ...quoteJson, revision_number: null },
	});
	const quote = await quotes.get(1042);
	quote.revision_number = null;
	await quotes.update(quote);
	expect(transport.calls[1].params).toEqual({});
});

test("untouched erp_code is not sent", async () => {
	const { erp_code: _omitted, ...withoutErpCode } = quoteJson;
	const { transport, quotes } = setup({
		"GET quotes/public/1042": withoutErpCode,
		"PATCH quotes/public/1042": withoutErpCode,
	});
	const quote = await quotes.get(1042);
	expect(quote.erp_code).toBe(NO_UPDATE);

	await quotes.update(quote);
	expect(transport.calls[1].data).toEqual(withoutErpCode);
});

test("setStatus patches the status change endpoint and emits", async () => {
	const { transport, pubsub, quotes } = setup({
		"PATCH quotes/public/1042/status_change": { ...quoteJson, status: "lost" },
	});
	const events: QuoteStatusChangedEvent[] = [];
	pubsub.subscribe("quote:status:changed", (e: QuoteStatusChangedEvent) => events.push(e));

	const quote = await quotes.get(1042);
	await quotes.setStatus(quote, "lost");

	const call = transport.calls[1];
	expect(call.operation).toBe("request");
	expect(call.method).toBe("PATCH");
	expect(call.data).toEqual({ status: "lost" });
	expect(call.params).toEqual({ revision: 2 });
	expect(quote.status).toBe("lost");
	expect(events.length).toBe(1);
	expect(events[0].number).toBe(1042);
	expect(events[0].status).toBe("lost");
});

test("getNew returns quote and revision pairs", async () => {
	const { transport, quotes } = setup({
		"GET quotes/public/new": [
			{ quote: 1043, revision: null },
			{ quote: 1044, revision: 1 },
		],
	});
	expect(await quotes.getNew()).toEqual([
		{ quote: 1043, revision: null },
		{ quote: 1044, revision: 1 },
	]);
	expect(transport.calls[0].params).toEqual({});

	await quotes.getNew(1042, 2);
	expect(transport.calls[1].params).toEqual({ last_quote: 1042, revision: 2 });

	await quotes.getNew(1042);
	expect(transport.calls[2].params).toEqual({ last_quote: 1042 });
});

test("list follows pages", async () => {
	const { quotes } = setup({
		"GET quotes/public": ({ params }) =>
			params.page === "2"
				? { results: [{ ...quoteJson, number: 1043 }], next: null }
				: { results: [quoteJson], next: "https://api.example.com/quotes/public?page=2" },
	});
	const list = await quotes.list();
	expect(list.map((q) => q.number)).toEqual([1042, 1043]);
	expect(quotes.lifecycle(list[1])).toBe("persisted");
});

test("a missing quote rejects with NotFound and records the error", async () => {
	const { quotes } = setup();
	await expect(quotes.get(9999)).rejects.toBeInstanceOf(HTTP_ERROR.NotFound);

	const status = quotes.getStatus();
	expect(status.state).toBe("error");
	expect(status.error?.code).toBe("NOT_FOUND");
	expect(status.error?.operation).toBe("get");
});

test("an unparsable response rejects and leaves the quote unchanged", async () => {
	const { quotes } = setup({
		"PATCH quotes/public/1042": { ...quoteJson, number: "1042" },
	});
	const quote = await quotes.get(1042);
	quote.quote_notes = "local";

	await expect(quotes.update(quote)).rejects.toThrow(TypeMismatchError);
	expect(quote.quote_notes).toBe("local");
	expect(quote.number).toBe(1042);
	expect(quotes.getStatus().error?.code).toBe("TYPE_MISMATCH");
});
