/**
 * @module resources/integrations
 *
 * Managed ERP integrations and the actions queued against them. Both are
 * identified by a server-assigned `uuid`.
 */

import { boolean, dateTime, string } from "../model/converters.ts";
import { derived, field, nullableField, untouched } from "../model/fields.ts";
import { defineModel, type InstanceOf } from "../model/model.ts";
import type { ResourceScope } from "../types/resource.ts";
import { defineResource, requireManagedIntegration } from "./common.ts";

export const ManagedIntegrationModel = defineModel("ManagedIntegration", {
	uuid: untouched(string()),
	erp_name: field(string()),
	is_active: field(boolean()),
	erp_version: nullableField(string()),
	integration_version: nullableField(string()),
	integrations_project_subcommit: nullableField(string()),
	create_integration_action_after_creating_new_order: nullableField(boolean()),
});
export type ManagedIntegration = InstanceOf<typeof ManagedIntegrationModel>;

export const IntegrationActionModel = defineModel("IntegrationAction", {
	uuid: untouched(string()),
	type: field(string()),
	entity_id: field(string()),
	status: untouched(string()),
	status_message: untouched(string()),
	created: untouched(string()),
	updated: untouched(string()),
	created_dt: derived("created", dateTime()),
	updated_dt: derived("updated", dateTime()),
});
export type IntegrationAction = InstanceOf<typeof IntegrationActionModel>;

export const IntegrationActionDefinitionModel = defineModel("IntegrationActionDefinition", {
	uuid: field(string()),
	name: field(string()),
	type: field(string()),
	related_object_type: nullableField(string()),
});
export type IntegrationActionDefinition = InstanceOf<typeof IntegrationActionDefinitionModel>;

export const ManagedIntegrationResource = defineResource(ManagedIntegrationModel, "uuid", {
	list: () => "managed_integrations/public",
	get: () => "managed_integrations/public",
	create: () => "managed_integrations/public",
	update: () => "managed_integrations/public",
});

const nestedActions = (scope: ResourceScope): string =>
	`managed_integrations/public/${requireManagedIntegration(scope)}/integration_actions`;

export const IntegrationActionResource = defineResource(IntegrationActionModel, "uuid", {
	list: nestedActions,
	create: nestedActions,
	get: () => "integration_actions/public",
	update: () => "integration_actions/public",
});

export const IntegrationActionDefinitionResource = defineResource(
	IntegrationActionDefinitionModel,
	"uuid",
	{
		list: (scope) =>
			`managed_integrations/public/${requireManagedIntegration(scope)}/integration_action_definitions`,
	},
);
