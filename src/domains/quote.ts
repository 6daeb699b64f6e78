/**
 * @module domains/quote
 *
 * Quote manager: read, list, update and status changes. Quotes are keyed by
 * `number`; the revision travels as a query parameter.
 */

import { instance, list } from "../model/converters.ts";
import { ValidationError } from "../model/errors.ts";
import {
	type NewQuote,
	NewQuoteModel,
	type Quote,
	QUOTE_STATUSES,
	QuoteResource,
	type QuoteStatus,
} from "../resources/quotes.ts";
import type { QueryParams } from "../types/transport.ts";
import type { Buildable, Listable, Readable, Updatable } from "../types/resource.ts";
import { ResourceManager, type ResourceManagerOptions } from "./base.ts";

export type QuoteFields = (typeof QuoteResource)["model"]["fields"];

const newQuotes = list(instance(NewQuoteModel));

function revisionParams(quote: Quote): QueryParams | undefined {
	return quote.revision_number === null ? undefined : { revision: quote.revision_number };
}

function isQuoteStatus(value: string): value is QuoteStatus {
	return QUOTE_STATUSES.some((status) => status === value);
}

/**
 * Quote manager.
 *
 * @example
 * ```typescript
 * const quotes = new QuoteManager({ transport });
 * const quote = await quotes.get(1042, 2);
 * quote.private_notes = "expedite if possible";
 * await quotes.update(quote); // PATCH quotes/public/1042?revision=2
 * await quotes.setStatus(quote, "lost");
 * ```
 */
export class QuoteManager extends ResourceManager<QuoteFields>
	implements
		Readable<Quote, [number: number, revision?: number | null]>,
		Listable<Quote>,
		Updatable<Quote>,
		Buildable<QuoteFields> {
	constructor(options: ResourceManagerOptions) {
		super("quote", QuoteResource, options);
	}

	/** Fetch one quote, optionally a specific revision */
	get(number: number, revision: number | null = null): Promise<Quote> {
		return this.fetchOne(number, {}, revision === null ? undefined : { revision });
	}

	/** Every quote matching `params`, across all pages */
	list(params: QueryParams = {}): Promise<Quote[]> {
		return this.fetchList(params);
	}

	/** Send the touched fields; the quote's revision is sent along when it has one */
	update(quote: Quote): Promise<Quote> {
		return this.updateOne(quote, {}, revisionParams(quote));
	}

	/**
	 * Move `quote` to another status and reconcile it with the server's answer.
	 *
	 * @emits quote:status:changed
	 */
	async setStatus(quote: Quote, status: QuoteStatus): Promise<Quote> {
		if (!isQuoteStatus(status)) {
			throw new ValidationError("status", `must be one of ${QUOTE_STATUSES.join(", ")}`);
		}
		const url = `quotes/public/${encodeURIComponent(quote.number)}/status_change`;
		await this.requestAndReconcile(
			"setStatus",
			quote,
			url,
			"PATCH",
			{ status },
			revisionParams(quote),
		);
		this.emit({
			type: "quote:status:changed",
			resource: "quote",
			timestamp: Date.now(),
			number: quote.number,
			status,
		});
		return quote;
	}

	/**
	 * Quote numbers and revisions created since `lastQuote` (or the server's
	 * default window when omitted).
	 */
	getNew(lastQuote: number | null = null, revision: number | null = null): Promise<NewQuote[]> {
		this.clog.debug("getNew", { lastQuote, revision });
		return this.withSync("getNew", async () => {
			const params = lastQuote === null
				? undefined
				: revision === null
				? { last_quote: lastQuote }
				: { last_quote: lastQuote, revision };
			return newQuotes.fromJSON(
				await this.transport.getResource("quotes/public/new", params),
				"new",
			);
		});
	}
}
