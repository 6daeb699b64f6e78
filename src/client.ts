/**
 * @module client
 *
 * ShopQuote - entry point wiring one transport and one event bus into every
 * resource manager.
 */

import { createClog } from "@marianmeres/clog";
import {
	createPubSub,
	type PubSub,
	type Subscriber,
	type Unsubscriber,
} from "@marianmeres/pubsub";
import { createHttpTransport, type HttpTransportOptions } from "./adapters/http.ts";
import { QuoteManager } from "./domains/quote.ts";
import { OrderManager } from "./domains/order.ts";
import {
	IntegrationActionDefinitionManager,
	IntegrationActionManager,
	ManagedIntegrationManager,
} from "./domains/integration.ts";
import type { ResourceManagerOptions } from "./domains/base.ts";
import type { ManagerError, ManagerState } from "./types/state.ts";
import type { ResourceTransport } from "./types/transport.ts";
import type {
	ErrorEvent,
	ResourceName,
	ShopQuoteEvent,
	ShopQuoteEventType,
	StateChangedEvent,
	SyncedEvent,
} from "./types/events.ts";

/** Configuration for ShopQuote */
export interface ShopQuoteConfig {
	/** Transport used by every manager; takes precedence over `http` */
	transport?: ResourceTransport;
	/** Options for the built-in HTTP transport, used when `transport` is absent */
	http?: HttpTransportOptions;
	/** Page ceiling for list calls (default: 1000) */
	maxPages?: number;
	/** Event bus to publish on (default: a new one) */
	pubsub?: PubSub;
}

/**
 * Main client class: one manager per resource type, sharing a transport and
 * an event bus.
 *
 * @example
 * ```typescript
 * const client = createShopQuote({
 *   http: { baseUrl: "https://api.example.com", token: "test-token" },
 * });
 *
 * client.onAfterSync(({ resource, success }) => console.log(resource, success));
 * const quote = await client.quotes.get(1042);
 * ```
 */
export class ShopQuote {
	readonly #clog = createClog("shopquote", { color: "auto" });
	readonly #pubsub: PubSub;

	/** Transport shared by all managers */
	readonly transport: ResourceTransport;
	readonly quotes: QuoteManager;
	readonly orders: OrderManager;
	readonly managedIntegrations: ManagedIntegrationManager;
	readonly integrationActions: IntegrationActionManager;
	readonly integrationActionDefinitions: IntegrationActionDefinitionManager;

	constructor(config: ShopQuoteConfig) {
		if (config.transport) {
			this.transport = config.transport;
		} else if (config.http) {
			this.transport = createHttpTransport(config.http);
		} else {
			throw new Error("ShopQuote needs either a transport or http options");
		}
		this.#clog.debug("creating client", {
			customTransport: !!config.transport,
			maxPages: config.maxPages,
		});
		this.#pubsub = config.pubsub ?? createPubSub();

		const options: ResourceManagerOptions = {
			transport: this.transport,
			pubsub: this.#pubsub,
			maxPages: config.maxPages,
		};
		this.quotes = new QuoteManager(options);
		this.orders = new OrderManager(options);
		this.managedIntegrations = new ManagedIntegrationManager(options);
		this.integrationActions = new IntegrationActionManager(options);
		this.integrationActionDefinitions = new IntegrationActionDefinitionManager(options);
	}

	/** Subscribe to specific event type */
	on(eventType: ShopQuoteEventType, callback: Subscriber): Unsubscriber {
		return this.#pubsub.subscribe(eventType, callback);
	}

	/** Subscribe to all events (receives { event, data } envelope) */
	onAny(
		callback: (envelope: { event: string; data: ShopQuoteEvent }) => void,
	): Unsubscriber {
		return this.#pubsub.subscribe("*", callback);
	}

	/** Subscribe once to an event */
	once(eventType: ShopQuoteEventType, callback: Subscriber): Unsubscriber {
		return this.#pubsub.subscribeOnce(eventType, callback);
	}

	/**
	 * Register a callback for when any manager starts a server operation.
	 * Fires on every state transition to "syncing".
	 *
	 * @returns Unsubscribe function
	 */
	onBeforeSync(
		callback: (info: { resource: ResourceName; previousState: ManagerState }) => void,
	): Unsubscriber {
		return this.#pubsub.subscribe(
			"resource:state:changed",
			(event: StateChangedEvent) => {
				if (event.newState === "syncing") {
					callback({ resource: event.resource, previousState: event.previousState });
				}
			},
		);
	}

	/**
	 * Register a callback for when any manager completes or fails a server
	 * operation.
	 *
	 * @returns Unsubscribe function
	 */
	onAfterSync(
		callback: (info: { resource: ResourceName; success: boolean; error?: ManagerError }) => void,
	): Unsubscriber {
		const unsub1 = this.#pubsub.subscribe(
			"resource:synced",
			(event: SyncedEvent) => {
				callback({ resource: event.resource, success: true });
			},
		);
		const unsub2 = this.#pubsub.subscribe(
			"resource:error",
			(event: ErrorEvent) => {
				callback({ resource: event.resource, success: false, error: event.error });
			},
		);
		return () => {
			unsub1();
			unsub2();
		};
	}

	/** Reset every manager's status to ready */
	reset(): void {
		this.#clog.debug("reset all managers");
		this.quotes.reset();
		this.orders.reset();
		this.managedIntegrations.reset();
		this.integrationActions.reset();
		this.integrationActionDefinitions.reset();
	}
}

/**
 * Factory function to create a ShopQuote client.
 *
 * @throws {Error} when neither `transport` nor `http` is configured
 */
export function createShopQuote(config: ShopQuoteConfig): ShopQuote {
	return new ShopQuote(config);
}
