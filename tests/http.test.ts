import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { createClog } from "@marianmeres/clog";
import { HTTP_ERROR } from "@marianmeres/http-utils";
import { buildUrl, createHttpTransport, isNotFound } from "../src/adapters/http.ts";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

const json = (body: unknown, init: ResponseInit = {}) =>
	new Response(JSON.stringify(body), {
		status: 200,
		headers: { "Content-Type": "application/json" },
		...init,
	});

const setup = (respond: () => Response | Promise<Response>, apiVersion?: string) => {
	const fetchMock = vi.fn<typeof fetch>(async () => await respond());
	const transport = createHttpTransport({
		baseUrl: "https://api.example.com/v1/",
		token: "test-token",
		apiVersion,
		fetch: fetchMock,
	});
	return { fetchMock, transport };
};

test("buildUrl joins paths and skips empty params", () => {
	expect(buildUrl("https://api.example.com/v1/", "/quotes/public/1042")).toBe(
		"https://api.example.com/v1/quotes/public/1042",
	);
	expect(
		buildUrl("https://api.example.com", "orders/public", {
			page: 2,
			status: null,
			customer: undefined,
			active: true,
		}),
	).toBe("https://api.example.com/orders/public?page=2&active=true");
});

test("GET sends the token and parses the body", async () => {
	const { fetchMock, transport } = setup(() => json({ number: 1042 }), "2");
	const body = await transport.getResource("quotes/public/1042", { revision: 2 });

	expect(body).toEqual({ number: 1042 });
	expect(fetchMock).toHaveBeenCalledTimes(1);
	const [url, init] = fetchMock.mock.calls[0];
	expect(url).toBe("https://api.example.com/v1/quotes/public/1042?revision=2");
	expect(init?.method).toBe("GET");
	expect(init?.body).toBeUndefined();
	expect(init?.headers).toEqual({
		Accept: "application/json",
		Authorization: "API-Token test-token",
		"X-Api-Version": "2",
	});
});

test("PATCH sends the primary key in the path and a JSON body", async () => {
	const { fetchMock, transport } = setup(() => json({ number: 1042, status: "sent" }));
	await transport.updateResource("quotes/public", 1042, { status: "sent" }, { revision: 3 });

	const [url, init] = fetchMock.mock.calls[0];
	expect(url).toBe("https://api.example.com/v1/quotes/public/1042?revision=3");
	expect(init?.method).toBe("PATCH");
	expect(init?.body).toBe('{"status":"sent"}');
	expect(init?.headers).toEqual({
		Accept: "application/json",
		Authorization: "API-Token test-token",
		"Content-Type": "application/json",
	});
});

test("an empty body resolves to null", async () => {
	const { transport } = setup(() => new Response(null, { status: 204 }));
	expect(await transport.request("quotes/public/1042/status_change", "PATCH", {})).toBeNull();
});

test("404 rejects with a not found error", async () => {
	const { transport } = setup(() => json({ detail: "Not found." }, { status: 404, statusText: "Not Found" }));
	const error = await transport.getResource("orders/public/9").catch((e: unknown) => e);

	expect(error).toBeInstanceOf(HTTP_ERROR.NotFound);
	expect(isNotFound(error)).toBe(true);
	expect(error instanceof Error && error.message).toBe("GET orders/public/9: 404 Not Found");
});

test("other error statuses reject with the status in the message", async () => {
	const { transport } = setup(() =>
		json({ detail: "boom" }, { status: 500, statusText: "Internal Server Error" })
	);
	const error = await transport.createResource("orders/public", {}).catch((e: unknown) => e);

	expect(isNotFound(error)).toBe(false);
	expect(error instanceof Error && error.message).toBe(
		"POST orders/public: 500 Internal Server Error",
	);
});

test("network failures reject", async () => {
	const { transport } = setup(() => {
		throw new TypeError("fetch failed");
	});
	await expect(transport.getResourceList("orders/public")).rejects.toThrow(
		"GET orders/public: fetch failed",
	);
});
