/**
 * @module domains/order
 *
 * Order manager: orders are read-only through the public API.
 */

import { integer, list } from "../model/converters.ts";
import { type Order, OrderResource } from "../resources/orders.ts";
import type { QueryParams } from "../types/transport.ts";
import type { Buildable, Listable, Readable } from "../types/resource.ts";
import { ResourceManager, type ResourceManagerOptions } from "./base.ts";

export type OrderFields = (typeof OrderResource)["model"]["fields"];

const orderNumbers = list(integer());

/**
 * Order manager.
 *
 * @example
 * ```typescript
 * const orders = new OrderManager({ transport });
 * for (const number of await orders.getNew(last)) {
 *   const order = await orders.get(number);
 * }
 * ```
 */
export class OrderManager extends ResourceManager<OrderFields>
	implements Readable<Order, [number: number]>, Listable<Order>, Buildable<OrderFields> {
	constructor(options: ResourceManagerOptions) {
		super("order", OrderResource, options);
	}

	get(number: number): Promise<Order> {
		return this.fetchOne(number);
	}

	list(params: QueryParams = {}): Promise<Order[]> {
		return this.fetchList(params);
	}

	/** Numbers of the orders placed after `lastOrder` */
	getNew(lastOrder: number | null = null): Promise<number[]> {
		this.clog.debug("getNew", { lastOrder });
		return this.withSync("getNew", async () =>
			orderNumbers.fromJSON(
				await this.transport.getResource(
					"orders/public/new",
					lastOrder === null ? undefined : { last_order: lastOrder },
				),
				"new",
			)
		);
	}
}
