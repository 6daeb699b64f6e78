import { afterEach, beforeEach, expect, test } from "vitest";
import { createClog } from "@marianmeres/clog";
import { dateTime, integer, list, string } from "../src/model/converters.ts";
import {
	MissingRequiredFieldError,
	TypeMismatchError,
	ValidationError,
} from "../src/model/errors.ts";
import { derived, field, nonNegative, nullableField, oneOf, untouched } from "../src/model/fields.ts";
import { defineModel } from "../src/model/model.ts";
import { isUnset, NO_UPDATE } from "../src/model/sentinel.ts";
import { AddressModel } from "../src/resources/common.ts";
import { OrderModel } from "../src/resources/orders.ts";
import { QuantityModel, QuoteModel } from "../src/resources/quotes.ts";
import orderJson from "./fixtures/order.json";
import quoteJson from "./fixtures/quote.json";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

const ContactModel = defineModel("Contact", {
	id: field(integer()),
	email: field(string()),
	phone: nullableField(string()),
	erp_code: untouched(string()),
	tags: field(list(string()), { default: [] }),
	seats: field(integer(), { default: 1, validate: nonNegative }),
	created: untouched(string()),
	created_dt: derived("created", dateTime()),
});

test("the sentinel is a single identity-compared value", () => {
	expect(isUnset(NO_UPDATE)).toBe(true);
	expect(isUnset(Symbol("NO_UPDATE"))).toBe(false);
	expect(isUnset(null)).toBe(false);
	expect(isUnset(undefined)).toBe(false);
});

test("fieldNames lists declared fields in order", () => {
	expect(ContactModel.fieldNames).toEqual([
		"id",
		"email",
		"phone",
		"erp_code",
		"tags",
		"seats",
		"created",
		"created_dt",
	]);
});

test("fromJSON applies defaults and ignores unknown keys", () => {
	const contact = ContactModel.fromJSON({ id: 1, email: "a@example.com", unknown: true });
	expect(contact).toEqual({
		id: 1,
		email: "a@example.com",
		phone: null,
		erp_code: NO_UPDATE,
		tags: [],
		seats: 1,
		created: NO_UPDATE,
		created_dt: null,
	});
	expect("unknown" in contact).toBe(false);
});

test("fromJSON rejects a missing required field", () => {
	expect(() => ContactModel.fromJSON({ id: 1 })).toThrow(MissingRequiredFieldError);
	expect(() => ContactModel.fromJSON({ id: 1 })).toThrow(
		'Field "email": required field is missing',
	);
});

test("fromJSON rejects a non-object document", () => {
	expect(() => ContactModel.fromJSON([1, 2])).toThrow(TypeMismatchError);
	expect(() => ContactModel.fromJSON("contact")).toThrow(
		'Field "Contact": expected Contact, received string "contact"',
	);
});

test("validators reject converted values", () => {
	expect(() => ContactModel.fromJSON({ id: 1, email: "a@example.com", seats: -2 })).toThrow(
		'Field "seats": must not be negative',
	);

	const Flag = defineModel("Flag", { level: field(integer(), { validate: (v) => v < 10 }) });
	expect(() => Flag.fromJSON({ level: 12 })).toThrow('Field "level": invalid integer value');
});

test("oneOf accepts listed values and unset optionals", () => {
	const check = oneOf(["CA", "USA"]);
	expect(check("CA")).toBe(true);
	expect(check(null)).toBe(true);
	expect(check(NO_UPDATE)).toBe(true);
	expect(check("MX")).toBe("must be one of CA, USA");
});

test("address country is validated", () => {
	const raw = {
		id: 1,
		address1: "1 Main St",
		city: "Springfield",
		country: "MX",
		postal_code: "01101",
		state: "MA",
	};
	try {
		AddressModel.fromJSON(raw);
		expect.unreachable();
	} catch (e) {
		expect(e).toBeInstanceOf(ValidationError);
		if (!(e instanceof ValidationError)) return;
		expect(e.code).toBe("VALIDATION_FAILED");
		expect(e.field).toBe("country");
		expect(e.message).toBe('Field "country": must be one of CA, USA');
	}
});

test("derived fields read their source and are never serialized", () => {
	const contact = ContactModel.fromJSON({
		id: 1,
		email: "a@example.com",
		created: "2026-01-02T03:04:05.000Z",
	});
	expect(contact.created_dt?.toISOString()).toBe("2026-01-02T03:04:05.000Z");
	expect(ContactModel.toJSON(contact)).toEqual({
		id: 1,
		email: "a@example.com",
		phone: null,
		tags: [],
		seats: 1,
		created: "2026-01-02T03:04:05.000Z",
	});
});

test("toJSON omits untouched fields and writes explicit nulls", () => {
	const contact = ContactModel.build({ id: 7, email: "b@example.com" });
	const wire = ContactModel.toJSON(contact);
	expect(wire).toEqual({ id: 7, email: "b@example.com", phone: null, tags: [], seats: 1 });
	expect("erp_code" in wire).toBe(false);

	contact.erp_code = null;
	expect(ContactModel.toJSON(contact).erp_code).toBeNull();

	contact.erp_code = "C-7";
	expect(ContactModel.toJSON(contact).erp_code).toBe("C-7");
});

test("build runs converters and keeps explicit sentinels", () => {
	const contact = ContactModel.build({ id: 3, email: "c@example.com", erp_code: NO_UPDATE });
	expect(contact.erp_code).toBe(NO_UPDATE);
	expect(contact.created_dt).toBeNull();
});

test("quote round-trips through fromJSON and toJSON", () => {
	const quote = QuoteModel.fromJSON(quoteJson);
	expect(QuoteModel.toJSON(quote)).toEqual(quoteJson);
});

test("sub-cent prices survive a round trip", () => {
	const raw = {
		id: 1,
		quantity: 1000,
		markup_1_price: null,
		markup_1_name: null,
		markup_2_price: null,
		markup_2_name: null,
		unit_price: "0.125",
		total_price: "125.00",
		total_price_with_required_add_ons: "125.00",
		lead_time: 10,
		expedites: [],
		is_most_likely_won_quantity: false,
		most_likely_won_quantity_percent: null,
	};
	const out = QuantityModel.toJSON(QuantityModel.fromJSON(raw));
	expect(out.unit_price).toBe("0.125");
	expect(out).toEqual(raw);
});

test("quotes keep both salesperson fields", () => {
	const quote = QuoteModel.fromJSON(quoteJson);
	expect(quote.salesperson?.erp_code).toBeNull();
	expect(quote.sales_person?.erp_code).toBe("HQS");
	const { sales_person: _, ...withoutSalesPerson } = quoteJson;
	expect(QuoteModel.fromJSON(withoutSalesPerson).sales_person).toBeNull();
});

test("order round-trips through fromJSON and toJSON", () => {
	const order = OrderModel.fromJSON(orderJson);
	expect(OrderModel.toJSON(order)).toEqual(orderJson);
});

test("errors deep in an order name the full path", () => {
	const broken = structuredClone(orderJson);
	broken.order_items[0].components[2].id = 0.5;
	expect(() => OrderModel.fromJSON(broken)).toThrow(
		'Field "order_items[0].components[2].id": expected integer, received number 0.5',
	);
});
