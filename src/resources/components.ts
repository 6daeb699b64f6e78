/**
 * @module resources/components
 *
 * Building blocks shared by quote and order components: materials, processes,
 * operations with costing variables, and the component field set itself.
 */

import {
	boolean,
	instance,
	integer,
	json,
	list,
	money,
	nested,
	nullable,
	number,
	string,
} from "../model/converters.ts";
import type { JsonValue } from "../model/converters.ts";
import { field, nonNegative, nullableField, oneOf } from "../model/fields.ts";
import type { FieldMap } from "../model/fields.ts";
import { defineModel, type InstanceOf, type ResourceModel } from "../model/model.ts";

/** Component kinds; purchased components are hardware */
export const COMPONENT_TYPES = ["assembled", "manufactured", "purchased"] as const;

export const MaterialModel = defineModel("Material", {
	id: field(nullable(integer())),
	name: field(string()),
	display_name: nullableField(string()),
	family: field(string()),
	material_class: nullableField(string()),
});
export type Material = InstanceOf<typeof MaterialModel>;

export const ProcessModel = defineModel("Process", {
	id: field(nullable(integer())),
	name: field(string()),
	external_name: nullableField(string()),
});
export type Process = InstanceOf<typeof ProcessModel>;

export const SupportingFileModel = defineModel("SupportingFile", {
	filename: field(string()),
	url: field(string()),
});
export type SupportingFile = InstanceOf<typeof SupportingFileModel>;

/** Parent → child link of an assembly, with the child's quantity per parent */
export const ChildComponentModel = defineModel("ChildComponent", {
	child_id: field(integer()),
	quantity: field(integer(), { validate: nonNegative }),
});
export type ChildComponent = InstanceOf<typeof ChildComponentModel>;

/** Costing variable of an ordered operation or add-on */
export const CostingVariableModel = defineModel("CostingVariable", {
	label: field(string()),
	variable_class: field(string()),
	value_type: field(string()),
	value: field(json()),
	row: nullableField(json()),
	options: nullableField(list(json())),
});
export type CostingVariable = InstanceOf<typeof CostingVariableModel>;

export const OperationQuantityModel = defineModel("OperationQuantity", {
	quantity: field(integer()),
	price: field(nullable(money())),
	manual_price: nullableField(money()),
	lead_time: nullableField(integer()),
});
export type OperationQuantity = InstanceOf<typeof OperationQuantityModel>;

/** Fields every operation carries, whatever its costing variables look like */
export const operationFields = {
	id: field(integer()),
	category: field(string(), { validate: oneOf<string>(["operation", "material"]) }),
	cost: field(nullable(money())),
	is_finish: field(boolean()),
	is_outside_service: field(boolean()),
	name: field(string()),
	operation_definition_name: nullableField(string()),
	notes: nullableField(string()),
	position: field(integer()),
	runtime: nullableField(number()),
	setup_time: nullableField(number()),
	quantities: field(list(instance(OperationQuantityModel))),
};

/** Anything carrying labelled costing variables */
export interface HasCostingVariables {
	costing_variables: { label: string; value: JsonValue }[];
}

/**
 * Value of the costing variable with `label`, or `null` when the operation
 * has no such variable.
 */
export function getVariable(operation: HasCostingVariables, label: string): JsonValue {
	const variable = operation.costing_variables.find((cv) => cv.label === label);
	return variable ? variable.value : null;
}

/** Anything carrying costing variables with per-quantity payloads */
export interface HasQuantityCostingVariables<P> {
	costing_variables: { label: string; quantities: Map<number, P> }[];
}

/**
 * Payload of the costing variable with `label` at `quantity`, or `null` when
 * either is missing.
 */
export function getVariableForQuantity<P>(
	operation: HasQuantityCostingVariables<P>,
	label: string,
	quantity: number,
): P | null {
	const variable = operation.costing_variables.find((cv) => cv.label === label);
	return variable?.quantities.get(quantity) ?? null;
}

/** A component whose type says whether it is hardware */
export function isHardware(component: { type: string }): boolean {
	return component.type === "purchased";
}

/**
 * Field set of a component, parameterized by the operation model used for its
 * material and shop operations.
 */
export function componentFields<O extends FieldMap>(operation: ResourceModel<O>) {
	return {
		id: field(integer()),
		child_ids: field(list(integer())),
		children: field(list(instance(ChildComponentModel))),
		description: field(nullable(string())),
		export_controlled: field(boolean()),
		finishes: field(list(string())),
		innate_quantity: field(integer()),
		is_root_component: field(boolean()),
		material: field(nested(MaterialModel)),
		material_operations: field(list(instance(operation))),
		parent_ids: field(list(integer())),
		part_name: field(string()),
		part_number: field(nullable(string())),
		part_url: nullableField(string()),
		part_uuid: field(nullable(string())),
		process: field(nested(ProcessModel)),
		revision: field(nullable(string())),
		shop_operations: field(list(instance(operation))),
		supporting_files: field(list(instance(SupportingFileModel))),
		thumbnail_url: nullableField(string()),
		type: field(string(), { validate: oneOf<string>(COMPONENT_TYPES) }),
	};
}
