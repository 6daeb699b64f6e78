/**
 * Event type definitions for the ShopQuote event system.
 */

import type { ManagerError, ManagerState } from "./state.ts";

/** Resource identifiers */
export type ResourceName =
	| "quote"
	| "order"
	| "managed_integration"
	| "integration_action"
	| "integration_action_definition";

/** Event types emitted by the managers */
export type ShopQuoteEventType =
	| "resource:state:changed"
	| "resource:error"
	| "resource:synced"
	| "resource:fetched"
	| "resource:listed"
	| "resource:created"
	| "resource:updated"
	| "quote:status:changed";

/** Base event data */
export interface ShopQuoteEventBase {
	/** Event timestamp */
	timestamp: number;
	/** Resource type whose manager emitted the event */
	resource: ResourceName;
}

/** State change event */
export interface StateChangedEvent extends ShopQuoteEventBase {
	type: "resource:state:changed";
	previousState: ManagerState;
	newState: ManagerState;
}

/** Error event */
export interface ErrorEvent extends ShopQuoteEventBase {
	type: "resource:error";
	error: ManagerError;
}

/** Server round trip completed */
export interface SyncedEvent extends ShopQuoteEventBase {
	type: "resource:synced";
}

/** Single resource fetched */
export interface FetchedEvent extends ShopQuoteEventBase {
	type: "resource:fetched";
	primaryKey: string | number;
}

/** List fetched, all pages aggregated */
export interface ListedEvent extends ShopQuoteEventBase {
	type: "resource:listed";
	count: number;
	pages: number;
}

/** Resource created and reconciled */
export interface CreatedEvent extends ShopQuoteEventBase {
	type: "resource:created";
	primaryKey: string | number | null;
}

/** Resource updated and reconciled */
export interface UpdatedEvent extends ShopQuoteEventBase {
	type: "resource:updated";
	primaryKey: string | number;
}

/** Quote status changed */
export interface QuoteStatusChangedEvent extends ShopQuoteEventBase {
	type: "quote:status:changed";
	resource: "quote";
	number: number;
	status: string;
}

/** All event types union */
export type ShopQuoteEvent =
	| StateChangedEvent
	| ErrorEvent
	| SyncedEvent
	| FetchedEvent
	| ListedEvent
	| CreatedEvent
	| UpdatedEvent
	| QuoteStatusChangedEvent;
