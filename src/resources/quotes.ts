/**
 * @module resources/quotes
 *
 * Quotes and everything nested in them. Quotes are identified by `number`;
 * a quote may have several revisions sharing that number.
 */

import {
	boolean,
	date,
	dateTime,
	decimal,
	instance,
	integer,
	json,
	list,
	mapping,
	money,
	nested,
	nullable,
	number,
	string,
} from "../model/converters.ts";
import { derived, field, nullableField, untouched } from "../model/fields.ts";
import { defineModel, type InstanceOf } from "../model/model.ts";
import { defineResource, SalespersonModel } from "./common.ts";
import { componentFields, operationFields } from "./components.ts";

/** Statuses a quote can be moved to with `setStatus` */
export const QUOTE_STATUSES = ["outstanding", "cancelled", "trash", "lost"] as const;
export type QuoteStatus = (typeof QUOTE_STATUSES)[number];

/** Costing variable value for one quantity */
export const CostingVariablePayloadModel = defineModel("CostingVariablePayload", {
	value: field(json()),
	// row and options are only set for drop-down variables
	row: nullableField(json()),
	options: nullableField(list(json())),
});
export type CostingVariablePayload = InstanceOf<typeof CostingVariablePayloadModel>;

export const QuoteCostingVariableModel = defineModel("QuoteCostingVariable", {
	label: field(string()),
	value: field(json()),
	quantity_specific: field(boolean()),
	quantities: field(mapping(instance(CostingVariablePayloadModel))),
	variable_class: field(string()),
	value_type: field(string()),
});
export type QuoteCostingVariable = InstanceOf<typeof QuoteCostingVariableModel>;

export const QuoteOperationModel = defineModel("QuoteOperation", {
	...operationFields,
	costing_variables: field(list(instance(QuoteCostingVariableModel))),
});
export type QuoteOperation = InstanceOf<typeof QuoteOperationModel>;

export const AddOnQuantityModel = defineModel("AddOnQuantity", {
	quantity: field(integer()),
	price: field(nullable(money())),
	manual_price: nullableField(money()),
});
export type AddOnQuantity = InstanceOf<typeof AddOnQuantityModel>;

export const AddOnModel = defineModel("AddOn", {
	is_required: field(boolean()),
	name: field(string()),
	notes: nullableField(string()),
	quantities: field(list(instance(AddOnQuantityModel))),
	costing_variables: field(list(instance(QuoteCostingVariableModel))),
});
export type AddOn = InstanceOf<typeof AddOnModel>;

export const ExpediteModel = defineModel("Expedite", {
	id: field(integer()),
	lead_time: field(integer()),
	markup: field(number()),
	unit_price: field(money()),
	total_price: field(money()),
});
export type Expedite = InstanceOf<typeof ExpediteModel>;

/** Price break of a quoted component */
export const QuantityModel = defineModel("Quantity", {
	id: field(integer()),
	quantity: field(integer()),
	markup_1_price: nullableField(money()),
	markup_1_name: nullableField(string()),
	markup_2_price: nullableField(money()),
	markup_2_name: nullableField(string()),
	unit_price: field(money()),
	total_price: field(money()),
	total_price_with_required_add_ons: field(money()),
	lead_time: field(integer()),
	expedites: field(list(instance(ExpediteModel)), { default: [] }),
	is_most_likely_won_quantity: field(boolean()),
	most_likely_won_quantity_percent: nullableField(integer()),
});
export type Quantity = InstanceOf<typeof QuantityModel>;

export const QuoteComponentModel = defineModel("QuoteComponent", {
	...componentFields(QuoteOperationModel),
	add_ons: field(list(instance(AddOnModel)), { default: [] }),
	quantities: field(list(instance(QuantityModel))),
});
export type QuoteComponent = InstanceOf<typeof QuoteComponentModel>;

export const MetricsModel = defineModel("Metrics", {
	order_revenue_all_time: field(money()),
	order_revenue_last_thirty_days: field(money()),
	quotes_sent_all_time: field(integer()),
	quotes_sent_last_thirty_days: field(integer()),
});
export type Metrics = InstanceOf<typeof MetricsModel>;

export const CompanyModel = defineModel("Company", {
	id: field(nullable(integer())),
	business_name: field(string()),
	notes: nullableField(string()),
	metrics: nullableField(instance(MetricsModel)),
	erp_code: nullableField(string()),
});
export type Company = InstanceOf<typeof CompanyModel>;

export const AccountModel = defineModel("Account", {
	id: field(integer()),
	name: field(string()),
	notes: nullableField(string()),
	erp_code: nullableField(string()),
});
export type Account = InstanceOf<typeof AccountModel>;

export const CustomerModel = defineModel("Customer", {
	id: field(nullable(integer())),
	first_name: field(string()),
	last_name: field(string()),
	email: field(string()),
	notes: nullableField(string()),
	company: field(nested(CompanyModel)),
});
export type Customer = InstanceOf<typeof CustomerModel>;

export const ContactModel = defineModel("Contact", {
	id: field(integer()),
	first_name: field(string()),
	last_name: field(string()),
	email: field(string()),
	notes: nullableField(string()),
	phone: nullableField(string()),
	phone_ext: nullableField(string()),
	account: field(nested(AccountModel)),
});
export type Contact = InstanceOf<typeof ContactModel>;

export const QuoteItemModel = defineModel("QuoteItem", {
	id: field(integer()),
	type: field(string()),
	position: field(integer()),
	export_controlled: field(boolean()),
	component_ids: field(list(integer())),
	components: field(list(instance(QuoteComponentModel))),
	private_notes: nullableField(string()),
	public_notes: nullableField(string()),
});
export type QuoteItem = InstanceOf<typeof QuoteItemModel>;

export const ParentQuoteModel = defineModel("ParentQuote", {
	id: field(integer()),
	number: field(integer()),
	status: field(string()),
});
export type ParentQuote = InstanceOf<typeof ParentQuoteModel>;

export const ParentSupplierOrderModel = defineModel("ParentSupplierOrder", {
	id: field(integer()),
	number: field(integer()),
	status: field(string()),
});
export type ParentSupplierOrder = InstanceOf<typeof ParentSupplierOrderModel>;

export const RequestForQuoteModel = defineModel("RequestForQuote", {
	id: field(integer()),
	email: field(string()),
	first_name: field(string()),
	last_name: field(string()),
	business_name: field(string()),
	phone: nullableField(string()),
	phone_ext: nullableField(string()),
	requested_delivery_date: nullableField(date()),
	contact_info_conflict: field(boolean()),
});
export type RequestForQuote = InstanceOf<typeof RequestForQuoteModel>;

export const QuoteModel = defineModel("Quote", {
	id: field(integer()),
	number: field(integer()),
	revision_number: nullableField(integer()),
	status: field(nullable(string())),
	salesperson: nullableField(instance(SalespersonModel)),
	sales_person: nullableField(instance(SalespersonModel)),
	estimator: nullableField(instance(SalespersonModel)),
	contact: nullableField(instance(ContactModel)),
	customer: nullableField(instance(CustomerModel)),
	tax_rate: nullableField(decimal()),
	tax_cost: nullableField(money()),
	private_notes: nullableField(string()),
	quote_notes: nullableField(string()),
	quote_items: field(list(instance(QuoteItemModel))),
	sent_date: nullableField(string()),
	expired_date: field(date()),
	expired: field(boolean()),
	export_controlled: field(boolean()),
	digital_last_viewed_on: nullableField(string()),
	request_for_quote: nullableField(instance(RequestForQuoteModel)),
	parent_quote: nullableField(instance(ParentQuoteModel)),
	parent_supplier_order: nullableField(instance(ParentSupplierOrderModel)),
	authenticated_pdf_quote_url: nullableField(string()),
	is_unviewed_drafted_rfq: field(boolean()),
	created: field(string()),
	created_dt: derived("created", dateTime()),
	erp_code: untouched(string()),
});
export type Quote = InstanceOf<typeof QuoteModel>;

/** Entry of the "new quotes" feed */
export const NewQuoteModel = defineModel("NewQuote", {
	quote: field(integer()),
	revision: field(nullable(integer())),
});
export type NewQuote = InstanceOf<typeof NewQuoteModel>;

export const QuoteResource = defineResource(QuoteModel, "number", {
	list: () => "quotes/public",
	get: () => "quotes/public",
	update: () => "quotes/public",
});
