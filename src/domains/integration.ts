/**
 * @module domains/integration
 *
 * Managers for managed integrations, their integration actions and the
 * action definitions they support.
 */

import {
	type IntegrationAction,
	type IntegrationActionDefinition,
	IntegrationActionDefinitionResource,
	IntegrationActionResource,
	type ManagedIntegration,
	ManagedIntegrationResource,
} from "../resources/integrations.ts";
import type { QueryParams } from "../types/transport.ts";
import type {
	Buildable,
	Creatable,
	Listable,
	Readable,
	Updatable,
} from "../types/resource.ts";
import { ResourceManager, type ResourceManagerOptions } from "./base.ts";

export type ManagedIntegrationFields = (typeof ManagedIntegrationResource)["model"]["fields"];
export type IntegrationActionFields = (typeof IntegrationActionResource)["model"]["fields"];
export type IntegrationActionDefinitionFields =
	(typeof IntegrationActionDefinitionResource)["model"]["fields"];

/** Managed integration manager */
export class ManagedIntegrationManager extends ResourceManager<ManagedIntegrationFields>
	implements
		Readable<ManagedIntegration, [uuid: string]>,
		Listable<ManagedIntegration>,
		Creatable<ManagedIntegration>,
		Updatable<ManagedIntegration>,
		Buildable<ManagedIntegrationFields> {
	constructor(options: ResourceManagerOptions) {
		super("managed_integration", ManagedIntegrationResource, options);
	}

	get(uuid: string): Promise<ManagedIntegration> {
		return this.fetchOne(uuid);
	}

	list(params: QueryParams = {}): Promise<ManagedIntegration[]> {
		return this.fetchList(params);
	}

	create(integration: ManagedIntegration): Promise<ManagedIntegration> {
		return this.createOne(integration);
	}

	update(integration: ManagedIntegration): Promise<ManagedIntegration> {
		return this.updateOne(integration);
	}
}

/** Filter of {@link IntegrationActionManager.filter}; unset keys are not sent */
export interface IntegrationActionFilter {
	status?: string | null;
	type?: string | null;
}

/**
 * Integration action manager. Actions are listed and created under their
 * managed integration, and read or updated by their own uuid.
 *
 * @example
 * ```typescript
 * const actions = new IntegrationActionManager({ transport });
 * const queued = await actions.filter(integrationUuid, { status: "queued" });
 * for (const action of queued) {
 *   action.status = "completed";
 * }
 * await actions.updateMany(integrationUuid, queued);
 * ```
 */
export class IntegrationActionManager extends ResourceManager<IntegrationActionFields>
	implements
		Readable<IntegrationAction, [uuid: string]>,
		Listable<IntegrationAction, [managedIntegrationUuid: string, params?: QueryParams]>,
		Creatable<IntegrationAction, [managedIntegrationUuid: string]>,
		Updatable<IntegrationAction>,
		Buildable<IntegrationActionFields> {
	constructor(options: ResourceManagerOptions) {
		super("integration_action", IntegrationActionResource, options);
	}

	get(uuid: string): Promise<IntegrationAction> {
		return this.fetchOne(uuid);
	}

	list(managedIntegrationUuid: string, params: QueryParams = {}): Promise<IntegrationAction[]> {
		return this.fetchList(params, { managedIntegration: managedIntegrationUuid });
	}

	/** Actions of one integration with the given status and/or type */
	filter(
		managedIntegrationUuid: string,
		{ status = null, type = null }: IntegrationActionFilter = {},
	): Promise<IntegrationAction[]> {
		return this.list(managedIntegrationUuid, { status, type });
	}

	create(action: IntegrationAction, managedIntegrationUuid: string): Promise<IntegrationAction> {
		return this.createOne(action, { managedIntegration: managedIntegrationUuid });
	}

	update(action: IntegrationAction): Promise<IntegrationAction> {
		return this.updateOne(action);
	}

	/** Create several actions in one request; each is reconciled with its counterpart */
	createMany(
		managedIntegrationUuid: string,
		actions: IntegrationAction[],
	): Promise<IntegrationAction[]> {
		const url = this.endpoint("create", { managedIntegration: managedIntegrationUuid });
		return this.sendBatch("createMany", actions, url, "POST");
	}

	/** Update several actions in one request; each is reconciled with its counterpart */
	updateMany(
		managedIntegrationUuid: string,
		actions: IntegrationAction[],
	): Promise<IntegrationAction[]> {
		const url = this.endpoint("list", { managedIntegration: managedIntegrationUuid });
		return this.sendBatch("updateMany", actions, url, "PATCH");
	}
}

/** Integration action definition manager (list only) */
export class IntegrationActionDefinitionManager
	extends ResourceManager<IntegrationActionDefinitionFields>
	implements Listable<IntegrationActionDefinition, [managedIntegrationUuid: string]> {
	constructor(options: ResourceManagerOptions) {
		super("integration_action_definition", IntegrationActionDefinitionResource, options);
	}

	list(managedIntegrationUuid: string): Promise<IntegrationActionDefinition[]> {
		return this.fetchList({}, { managedIntegration: managedIntegrationUuid });
	}
}
