/**
 * @module resources/common
 *
 * Shared resource types and the resource definition helper.
 */

import { string, integer } from "../model/converters.ts";
import { field, nullableField, oneOf } from "../model/fields.ts";
import type { FieldMap, FieldName } from "../model/fields.ts";
import { defineModel, type InstanceOf, type ResourceModel } from "../model/model.ts";
import type {
	ResourceDefinition,
	ResourceEndpoints,
	ResourceScope,
} from "../types/resource.ts";

/** Bundle a model with its primary key and endpoints */
export function defineResource<F extends FieldMap>(
	model: ResourceModel<F>,
	primaryKey: FieldName<F>,
	endpoints: ResourceEndpoints,
): ResourceDefinition<F> {
	return { model, primaryKey, endpoints };
}

/** Managed integration uuid of a nested resource scope */
export function requireManagedIntegration(scope: ResourceScope): string {
	if (!scope.managedIntegration) {
		throw new Error("A managed integration uuid is required for this endpoint");
	}
	return encodeURIComponent(scope.managedIntegration);
}

/** Countries accepted in addresses */
export const ADDRESS_COUNTRIES = ["CA", "USA"] as const;

export const AddressModel = defineModel("Address", {
	id: field(integer()),
	address1: field(string()),
	city: field(string()),
	country: field(string(), { validate: oneOf<string>(ADDRESS_COUNTRIES) }),
	postal_code: field(string()),
	state: field(string()),
	address2: nullableField(string()),
	business_name: nullableField(string()),
	first_name: nullableField(string()),
	last_name: nullableField(string()),
	phone: nullableField(string()),
	phone_ext: nullableField(string()),
});
export type Address = InstanceOf<typeof AddressModel>;

/** Sales person or estimator */
export const SalespersonModel = defineModel("Salesperson", {
	first_name: field(string()),
	last_name: field(string()),
	email: field(string()),
	erp_code: nullableField(string()),
});
export type Salesperson = InstanceOf<typeof SalespersonModel>;
