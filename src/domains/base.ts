/**
 * @module domains/base
 *
 * Base resource manager implementing get / list / create / update once for
 * every resource type, against an injected transport.
 */

import { type Clog, createClog } from "@marianmeres/clog";
import { HTTP_ERROR } from "@marianmeres/http-utils";
import { createStore, type StoreLike } from "@marianmeres/store";
import { createPubSub, type PubSub } from "@marianmeres/pubsub";
import type { FieldMap } from "../model/fields.ts";
import type { BuildInput, Instance, ResourceModel } from "../model/model.ts";
import { ResourceError, TypeMismatchError, ValidationError } from "../model/errors.ts";
import { isUnset } from "../model/sentinel.ts";
import { DEFAULT_MAX_PAGES, fetchAllPages } from "../pagination.ts";
import { copyFields, reconcile } from "../reconcile.ts";
import { lifecycle, type LifecycleState, markPersisted } from "../lifecycle.ts";
import type { ManagerError, ManagerState, ManagerStatus } from "../types/state.ts";
import type { ResourceName, ShopQuoteEvent } from "../types/events.ts";
import type {
	HttpMethod,
	PrimaryKey,
	QueryParams,
	ResourceTransport,
} from "../types/transport.ts";
import type {
	ResourceDefinition,
	ResourceEndpoints,
	ResourceScope,
} from "../types/resource.ts";

/** Options shared by every resource manager */
export interface ResourceManagerOptions {
	/** Transport used for every request */
	transport: ResourceTransport;
	/** Shared pubsub instance for events */
	pubsub?: PubSub;
	/** Page ceiling for list calls (default: 1000) */
	maxPages?: number;
}

/**
 * Abstract base class for resource managers.
 *
 * Implements:
 * - Svelte-compatible status store (`ready` ↔ `syncing` → `error`), never
 *   holding resource data
 * - Generic read, paginated list, create and update with in-place
 *   reconciliation
 * - Event emission via pub/sub
 *
 * Subclasses decide which capabilities are public. Errors are recorded in the
 * status store, emitted, and rethrown to the caller.
 *
 * @typeParam F - Field declarations of the managed resource
 */
export abstract class ResourceManager<F extends FieldMap> {
	protected readonly store: StoreLike<ManagerStatus>;
	protected readonly pubsub: PubSub;
	protected readonly clog: Clog;
	protected readonly transport: ResourceTransport;
	protected readonly maxPages: number;
	readonly resourceName: ResourceName;
	readonly definition: ResourceDefinition<F>;

	constructor(
		resourceName: ResourceName,
		definition: ResourceDefinition<F>,
		options: ResourceManagerOptions,
	) {
		this.resourceName = resourceName;
		this.definition = definition;
		this.transport = options.transport;
		this.pubsub = options.pubsub ?? createPubSub();
		this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
		this.clog = createClog(`shopquote:${resourceName}`, { color: "auto" });
		this.store = createStore<ManagerStatus>({
			state: "ready",
			error: null,
			lastSyncedAt: null,
		});
		this.clog.debug("initialized", { primaryKey: definition.primaryKey });
	}

	/** Get the Svelte-compatible subscribe method */
	get subscribe(): StoreLike<ManagerStatus>["subscribe"] {
		return this.store.subscribe;
	}

	/** Get current status synchronously */
	getStatus(): ManagerStatus {
		return this.store.get();
	}

	/** Resource model (fields, fromJSON, toJSON) */
	get model(): ResourceModel<F> {
		return this.definition.model;
	}

	/** Construct a transient instance locally; nothing is sent */
	build(init: BuildInput<F>): Instance<F> {
		return this.model.build(init);
	}

	/** Whether `instance` is transient, persisted, or modified since its last sync */
	lifecycle(instance: Instance<F>): LifecycleState {
		return lifecycle(this.model, instance);
	}

	/** Serialize `instance` the way it would be sent (untouched fields omitted) */
	toJSON(instance: Instance<F>): Record<string, unknown> {
		return this.model.toJSON(instance);
	}

	/** Reset status to ready */
	reset(): void {
		this.clog.debug("reset");
		this.store.set({ state: "ready", error: null, lastSyncedAt: null });
	}

	/** Transition to a new state */
	protected setState(state: ManagerState): void {
		const current = this.store.get();
		if (current.state !== state) {
			this.clog.debug("state change", { from: current.state, to: state });
			this.store.update((s) => ({ ...s, state }));
			this.emit({
				type: "resource:state:changed",
				resource: this.resourceName,
				timestamp: Date.now(),
				previousState: current.state,
				newState: state,
			});
		}
	}

	/** Set error state */
	protected setError(error: ManagerError): void {
		this.clog.error("error", {
			code: error.code,
			message: error.message,
			operation: error.operation,
		});
		this.store.update((s) => ({ ...s, state: "error", error }));
		this.emit({
			type: "resource:error",
			resource: this.resourceName,
			timestamp: Date.now(),
			error,
		});
	}

	/** Mark as synced */
	protected markSynced(): void {
		this.store.update((s) => ({
			...s,
			state: "ready",
			error: null,
			lastSyncedAt: Date.now(),
		}));
		this.emit({
			type: "resource:synced",
			resource: this.resourceName,
			timestamp: Date.now(),
		});
	}

	/** Emit an event via pubsub */
	protected emit(event: ShopQuoteEvent): void {
		this.pubsub.publish(event.type, event);
	}

	/**
	 * Run one server operation.
	 *
	 * 1. Sets state to "syncing"
	 * 2. Awaits the operation
	 * 3. On success: marks synced and returns the result
	 * 4. On error: records and emits the error, then rethrows it unchanged
	 */
	protected async withSync<T>(operation: string, run: () => Promise<T>): Promise<T> {
		this.setState("syncing");
		try {
			const result = await run();
			this.markSynced();
			return result;
		} catch (e) {
			this.setError({
				code: e instanceof ResourceError
					? e.code
					: e instanceof HTTP_ERROR.NotFound
					? "NOT_FOUND"
					: "REQUEST_FAILED",
				message: e instanceof Error ? e.message : `${operation} failed`,
				originalError: e,
				operation,
			});
			throw e;
		}
	}

	/** Relative path for an operation */
	protected endpoint(operation: keyof ResourceEndpoints, scope: ResourceScope = {}): string {
		const build = this.definition.endpoints[operation];
		if (!build) {
			throw new Error(`${this.model.name} does not support ${operation}`);
		}
		return build(scope);
	}

	/** Primary key value of `instance`, which must be set */
	protected primaryKeyOf(instance: Instance<F>): PrimaryKey {
		const name = this.definition.primaryKey;
		const value: unknown = instance[name];
		if (typeof value === "string" || typeof value === "number") return value;
		if (value === null || value === undefined || isUnset(value)) {
			throw new ValidationError(name, "primary key is not set");
		}
		throw new TypeMismatchError(name, "string or integer primary key", value);
	}

	/** Primary key if set, otherwise null */
	protected primaryKeyOrNull(instance: Instance<F>): PrimaryKey | null {
		const value: unknown = instance[this.definition.primaryKey];
		return typeof value === "string" || typeof value === "number" ? value : null;
	}

	/** GET `<get endpoint>/<primaryKey>` and parse it */
	protected fetchOne(
		primaryKey: PrimaryKey,
		scope: ResourceScope = {},
		params?: QueryParams,
	): Promise<Instance<F>> {
		this.clog.debug("get", { primaryKey });
		return this.withSync("get", async () => {
			const url = `${this.endpoint("get", scope)}/${encodeURIComponent(String(primaryKey))}`;
			const instance = this.model.fromJSON(await this.transport.getResource(url, params));
			markPersisted(this.model, instance);
			this.emit({
				type: "resource:fetched",
				resource: this.resourceName,
				timestamp: Date.now(),
				primaryKey,
			});
			return instance;
		});
	}

	/** Follow every page of the list endpoint and parse all items */
	protected fetchList(params: QueryParams = {}, scope: ResourceScope = {}): Promise<Instance<F>[]> {
		this.clog.debug("list", { params });
		return this.withSync("list", async () => {
			const { items, pages } = await fetchAllPages(
				this.transport,
				this.endpoint("list", scope),
				params,
				{ maxPages: this.maxPages },
			);
			const instances = this.parseMany(items);
			this.emit({
				type: "resource:listed",
				resource: this.resourceName,
				timestamp: Date.now(),
				count: instances.length,
				pages,
			});
			return instances;
		});
	}

	/** POST `instance` and reconcile it with the created resource */
	protected createOne(instance: Instance<F>, scope: ResourceScope = {}): Promise<Instance<F>> {
		this.clog.debug("create");
		return this.withSync("create", async () => {
			const raw = await this.transport.createResource(
				this.endpoint("create", scope),
				this.model.toJSON(instance),
			);
			reconcile(this.model, instance, raw);
			this.emit({
				type: "resource:created",
				resource: this.resourceName,
				timestamp: Date.now(),
				primaryKey: this.primaryKeyOrNull(instance),
			});
			return instance;
		});
	}

	/** PATCH the touched fields of `instance` and reconcile it with the response */
	protected updateOne(
		instance: Instance<F>,
		scope: ResourceScope = {},
		params?: QueryParams,
	): Promise<Instance<F>> {
		return this.withSync("update", async () => {
			const primaryKey = this.primaryKeyOf(instance);
			this.clog.debug("update", { primaryKey });
			const raw = await this.transport.updateResource(
				this.endpoint("update", scope),
				primaryKey,
				this.model.toJSON(instance),
				params,
			);
			reconcile(this.model, instance, raw);
			this.emit({
				type: "resource:updated",
				resource: this.resourceName,
				timestamp: Date.now(),
				primaryKey,
			});
			return instance;
		});
	}

	/** Send an arbitrary request and reconcile `instance` with the response */
	protected requestAndReconcile(
		operation: string,
		instance: Instance<F>,
		url: string,
		method: HttpMethod,
		data?: unknown,
		params?: QueryParams,
	): Promise<Instance<F>> {
		this.clog.debug(operation, { url, method });
		return this.withSync(operation, async () => {
			const raw = await this.transport.request(url, method, data, params);
			return reconcile(this.model, instance, raw);
		});
	}

	/**
	 * Send several instances in one request and reconcile each with the
	 * matching element of the array response. Every element is parsed before
	 * any instance is touched.
	 */
	protected sendBatch(
		operation: "createMany" | "updateMany",
		instances: Instance<F>[],
		url: string,
		method: "POST" | "PATCH",
	): Promise<Instance<F>[]> {
		this.clog.debug(operation, { count: instances.length });
		return this.withSync(operation, async () => {
			const data = instances.map((instance) => this.model.toJSON(instance));
			const raw = method === "POST"
				? await this.transport.createResource(url, data)
				: await this.transport.request(url, method, data);
			if (!Array.isArray(raw)) {
				throw new TypeMismatchError(`${this.model.name}[]`, "list", raw);
			}
			if (raw.length !== instances.length) {
				throw new ValidationError(
					`${this.model.name}[]`,
					`expected ${instances.length} items in response, received ${raw.length}`,
				);
			}
			const fresh = this.parseMany(raw);
			return instances.map((instance, i) => copyFields(this.model, instance, fresh[i]));
		});
	}

	/** Parse raw list items, recording each as persisted */
	protected parseMany(items: unknown[]): Instance<F>[] {
		return items.map((item, i) => {
			const instance = this.model.fromJSON(item, `[${i}]`);
			markPersisted(this.model, instance);
			return instance;
		});
	}
}
