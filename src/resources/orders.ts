/**
 * @module resources/orders
 *
 * Orders, their items and shipping/payment details. Orders are identified by
 * `number`.
 */

import {
	boolean,
	date,
	dateTime,
	decimal,
	instance,
	integer,
	list,
	money,
	nullable,
	string,
} from "../model/converters.ts";
import { derived, field, nullableField, oneOf, untouched } from "../model/fields.ts";
import { defineModel, type InstanceOf } from "../model/model.ts";
import { AddressModel, defineResource, SalespersonModel } from "./common.ts";
import { componentFields, CostingVariableModel, operationFields } from "./components.ts";
import { CompanyModel } from "./quotes.ts";

export const PAYMENT_TYPES = ["credit_card", "purchase_order"] as const;

export const SHIPPING_OPTION_TYPES = [
	"pickup",
	"customers_shipping_account",
	"suppliers_shipping_account",
] as const;

export const PaymentDetailsModel = defineModel("PaymentDetails", {
	card_brand: nullableField(string()),
	card_last4: nullableField(string()),
	net_payout: nullableField(money()),
	payment_type: nullableField(string(), oneOf<string>(PAYMENT_TYPES)),
	purchase_order_number: nullableField(string()),
	purchasing_dept_contact_email: nullableField(string()),
	purchasing_dept_contact_name: nullableField(string()),
	shipping_cost: nullableField(money()),
	subtotal: nullableField(money()),
	tax_cost: nullableField(money()),
	tax_rate: nullableField(decimal()),
	total_price: nullableField(money()),
});
export type PaymentDetails = InstanceOf<typeof PaymentDetailsModel>;

export const ShippingOptionModel = defineModel("ShippingOption", {
	type: field(string(), { validate: oneOf<string>(SHIPPING_OPTION_TYPES) }),
	customers_account_number: nullableField(string()),
	customers_carrier: nullableField(string()),
	shipping_method: nullableField(string()),
});
export type ShippingOption = InstanceOf<typeof ShippingOptionModel>;

const upper = (value: string | null): string => value === null ? "N/A" : value.toUpperCase();

/**
 * Human readable shipping instructions, one line per fact.
 *
 * @example
 * ```typescript
 * shippingSummary(option, new Date("2026-03-02"), "purchase_order");
 * // Use Supplier's Shipping Account
 * // Method: GROUND
 * // Supplier will bill customer for shipping.
 * // Ship date: 2026-03-02
 * ```
 */
export function shippingSummary(
	option: ShippingOption,
	shipDate: Date,
	paymentType: string | null,
): string {
	const shipOn = `Ship date: ${shipDate.toISOString().slice(0, 10)}`;
	switch (option.type) {
		case "pickup":
			return ["Customer will pickup from supplier's location.", shipOn].join("\n");
		case "customers_shipping_account":
			return [
				"Use Customer's Shipping Account",
				`Carrier: ${upper(option.customers_carrier)}`,
				`Method: ${upper(option.shipping_method)}`,
				`Account #: ${option.customers_account_number ?? "N/A"}`,
				shipOn,
			].join("\n");
		default:
			return [
				"Use Supplier's Shipping Account",
				`Method: ${upper(option.shipping_method)}`,
				paymentType === "credit_card"
					? "Shipping cost has been charged to customer's credit card."
					: "Supplier will bill customer for shipping.",
				shipOn,
			].join("\n");
	}
}

export const OrderedAddOnModel = defineModel("OrderedAddOn", {
	is_required: field(boolean()),
	name: field(string()),
	notes: nullableField(string()),
	price: field(money()),
	quantity: field(integer()),
	costing_variables: field(list(instance(CostingVariableModel))),
});
export type OrderedAddOn = InstanceOf<typeof OrderedAddOnModel>;

export const OrderOperationModel = defineModel("OrderOperation", {
	...operationFields,
	costing_variables: field(list(instance(CostingVariableModel))),
});
export type OrderOperation = InstanceOf<typeof OrderOperationModel>;

export const OrderComponentModel = defineModel("OrderComponent", {
	...componentFields(OrderOperationModel),
	deliver_quantity: field(integer()),
	make_quantity: field(integer()),
});
export type OrderComponent = InstanceOf<typeof OrderComponentModel>;

export const OrderItemModel = defineModel("OrderItem", {
	id: field(integer()),
	quote_item_id: nullableField(integer()),
	quote_item_type: field(string()),
	root_component_id: field(integer()),
	components: field(list(instance(OrderComponentModel))),
	description: nullableField(string()),
	export_controlled: field(boolean()),
	filename: nullableField(string()),
	lead_days: field(integer()),
	private_notes: nullableField(string()),
	public_notes: nullableField(string()),
	quantity: field(integer()),
	quantity_outstanding: field(integer()),
	ordered_add_ons: field(list(instance(OrderedAddOnModel)), { default: [] }),
	add_on_fees: nullableField(money()),
	base_price: field(money()),
	price: field(money()),
	unit_price: field(money()),
	ships_on: field(date()),
	ships_on_dt: derived("ships_on", dateTime()),
});
export type OrderItem = InstanceOf<typeof OrderItemModel>;

export const OrderCustomerModel = defineModel("OrderCustomer", {
	id: field(nullable(integer())),
	first_name: field(string()),
	last_name: field(string()),
	email: field(string()),
	phone: nullableField(string()),
	phone_ext: nullableField(string()),
	notes: nullableField(string()),
	company: nullableField(instance(CompanyModel)),
});
export type OrderCustomer = InstanceOf<typeof OrderCustomerModel>;

export const OrderModel = defineModel("Order", {
	number: field(integer()),
	quote_number: nullableField(integer()),
	quote_revision_number: nullableField(integer()),
	status: field(string()),
	customer: nullableField(instance(OrderCustomerModel)),
	sales_person: nullableField(instance(SalespersonModel)),
	estimator: nullableField(instance(SalespersonModel)),
	billing_info: nullableField(instance(AddressModel)),
	shipping_info: nullableField(instance(AddressModel)),
	shipping_option: nullableField(instance(ShippingOptionModel)),
	payment_details: field(instance(PaymentDetailsModel)),
	order_items: field(list(instance(OrderItemModel))),
	deliver_by: nullableField(date()),
	ships_on: nullableField(date()),
	private_notes: nullableField(string()),
	created: field(string()),
	created_dt: derived("created", dateTime()),
	erp_code: untouched(string()),
});
export type Order = InstanceOf<typeof OrderModel>;

export const OrderResource = defineResource(OrderModel, "number", {
	list: () => "orders/public",
	get: () => "orders/public",
});
