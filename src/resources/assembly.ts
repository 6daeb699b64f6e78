/**
 * @module resources/assembly
 *
 * Assembly views over an item's components. Components link to each other
 * through `children` (with per-link quantities) and `parent_ids`, forming a
 * rooted DAG with exactly one root component.
 */

import { ValidationError } from "../model/errors.ts";

/** The parts of a component the assembly helpers look at */
export interface AssemblyComponent {
	id: number;
	is_root_component: boolean;
	child_ids: number[];
	parent_ids: number[];
	children: { child_id: number; quantity: number }[];
}

/** Anything holding a flat list of components (quote items, order items) */
export interface Assembly<C extends AssemblyComponent> {
	components: C[];
}

/** One step of a depth-first assembly walk */
export interface AssemblyNode<C> {
	component: C;
	/** Depth below the root (root is 0) */
	level: number;
	/** Position among the siblings under the same parent */
	levelIndex: number;
	/** Number of siblings under the same parent, this node included */
	levelCount: number;
	parent: C | null;
}

/**
 * The single root component.
 *
 * @throws {ValidationError} when there is no root or more than one
 */
export function rootComponent<C extends AssemblyComponent>(item: Assembly<C>): C {
	const roots = item.components.filter((c) => c.is_root_component);
	if (roots.length !== 1) {
		throw new ValidationError(
			"components",
			`expected exactly one root component, found ${roots.length}`,
		);
	}
	return roots[0];
}

/** Component with `id`, or `null` */
export function getComponent<C extends AssemblyComponent>(
	item: Assembly<C>,
	id: number,
): C | null {
	return item.components.find((c) => c.id === id) ?? null;
}

function requireComponent<C extends AssemblyComponent>(item: Assembly<C>, id: number): C {
	const component = getComponent(item, id);
	if (!component) throw new ValidationError("components", `unknown component ${id}`);
	return component;
}

function* walk<C extends AssemblyComponent>(
	item: Assembly<C>,
	node: AssemblyNode<C>,
	ancestors: Set<number>,
): Generator<AssemblyNode<C>> {
	yield node;
	const { component } = node;
	ancestors.add(component.id);
	const count = component.children.length;
	for (const [index, link] of component.children.entries()) {
		if (ancestors.has(link.child_id)) {
			throw new ValidationError(
				"components",
				`cycle through component ${link.child_id}`,
			);
		}
		yield* walk(
			item,
			{
				component: requireComponent(item, link.child_id),
				level: node.level + 1,
				levelIndex: index,
				levelCount: count,
				parent: component,
			},
			ancestors,
		);
	}
	ancestors.delete(component.id);
}

/**
 * Depth-first walk from the root, following each component's `children` in
 * order. A component shared by several parents is visited once per link.
 *
 * @throws {ValidationError} on a missing root, an unknown child id or a cycle
 */
export function* iterateAssembly<C extends AssemblyComponent>(
	item: Assembly<C>,
): Generator<AssemblyNode<C>> {
	const root = rootComponent(item);
	yield* walk(
		item,
		{ component: root, level: 0, levelIndex: 0, levelCount: 1, parent: null },
		new Set(),
	);
}

/**
 * Check the assembly invariants: one root, parent and child id lists that
 * agree with each other, and no cycles.
 *
 * @throws {ValidationError} describing the first inconsistency found
 */
export function validateAssembly<C extends AssemblyComponent>(item: Assembly<C>): void {
	const root = rootComponent(item);
	if (root.parent_ids.length > 0) {
		throw new ValidationError("components", `root component ${root.id} has parents`);
	}
	for (const parent of item.components) {
		for (const link of parent.children) {
			const child = requireComponent(item, link.child_id);
			if (!parent.child_ids.includes(child.id)) {
				throw new ValidationError(
					"components",
					`component ${parent.id} links child ${child.id} missing from its child_ids`,
				);
			}
			if (!child.parent_ids.includes(parent.id)) {
				throw new ValidationError(
					"components",
					`component ${child.id} does not list parent ${parent.id}`,
				);
			}
		}
		for (const parentId of parent.parent_ids) {
			const owner = requireComponent(item, parentId);
			if (!owner.children.some((link) => link.child_id === parent.id)) {
				throw new ValidationError(
					"components",
					`component ${parentId} does not list child ${parent.id}`,
				);
			}
		}
	}
	// a full walk surfaces cycles
	Array.from(iterateAssembly(item));
}

/** Sum of `quantity` over every parent → child link pointing at `componentId` */
export function totalChildQuantity<C extends AssemblyComponent>(
	item: Assembly<C>,
	componentId: number,
): number {
	let total = 0;
	for (const component of item.components) {
		for (const link of component.children) {
			if (link.child_id === componentId) total += link.quantity;
		}
	}
	return total;
}
