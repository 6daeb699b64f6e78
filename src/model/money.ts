/**
 * @module model/money
 *
 * Decimal-backed currency amount.
 */

import Decimal from "decimal.js";

/**
 * An amount of money. Arithmetic-sensitive values never go through binary
 * floating point: the amount is held as a `Decimal`.
 *
 * @example
 * ```typescript
 * const price = new Money("2757.80");
 * price.dollars.equals(new Decimal("2757.8")); // true
 * JSON.stringify({ price }); // {"price":"2757.80"}
 * ```
 */
export class Money {
	readonly dollars: Decimal;
	readonly currency: string;

	constructor(amount: Decimal.Value, currency = "USD") {
		this.dollars = new Decimal(amount);
		this.currency = currency;
	}

	/** Same currency and numerically equal amount ("150" equals "150.00") */
	equals(other: Money): boolean {
		return this.currency === other.currency && this.dollars.equals(other.dollars);
	}

	/** Wire representation: two decimal places, or every digit of a sub-cent amount */
	toJSON(): string {
		return this.dollars.decimalPlaces() <= 2 ? this.dollars.toFixed(2) : this.dollars.toString();
	}

	toString(): string {
		return `${this.dollars.toFixed(2)} ${this.currency}`;
	}
}
