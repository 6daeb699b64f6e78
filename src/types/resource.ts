/**
 * @module types/resource
 *
 * Resource definitions and the capability interfaces managers implement.
 */

import type { FieldMap, FieldName } from "../model/fields.ts";
import type { BuildInput, Instance, ResourceModel } from "../model/model.ts";
import type { QueryParams } from "./transport.ts";

/** Parent identifiers for resources nested under another resource's path */
export interface ResourceScope {
	/** Managed integration uuid (integration actions and their definitions) */
	managedIntegration?: string;
}

/** Builds a relative endpoint path */
export type EndpointBuilder = (scope: ResourceScope) => string;

/** Relative endpoint paths, one per supported operation */
export interface ResourceEndpoints {
	list?: EndpointBuilder;
	get?: EndpointBuilder;
	create?: EndpointBuilder;
	update?: EndpointBuilder;
}

/** Model + primary key + endpoints: everything a manager needs about a resource */
export interface ResourceDefinition<F extends FieldMap> {
	readonly model: ResourceModel<F>;
	/** Field identifying an instance in get/update URLs (not necessarily `id`) */
	readonly primaryKey: FieldName<F>;
	readonly endpoints: ResourceEndpoints;
}

/** Fetch one resource by primary key */
export interface Readable<T, A extends unknown[] = [primaryKey: string | number]> {
	get(...args: A): Promise<T>;
}

/** Fetch every page of a list */
export interface Listable<T, A extends unknown[] = [params?: QueryParams]> {
	list(...args: A): Promise<T[]>;
}

/** Persist a locally built instance, reconciling it in place */
export interface Creatable<T, A extends unknown[] = []> {
	create(instance: T, ...args: A): Promise<T>;
}

/** Persist local changes of an instance, reconciling it in place */
export interface Updatable<T> {
	update(instance: T): Promise<T>;
}

/** Local construction of transient instances */
export interface Buildable<F extends FieldMap> {
	build(init: BuildInput<F>): Instance<F>;
}
