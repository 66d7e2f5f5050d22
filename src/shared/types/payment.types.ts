/**
 * CyberSource Gateway - Payment Types
 *
 * MONEY RULES:
 * 1. NO FLOATING POINT: amounts travel as integer minor units (bigint or safe integer)
 * 2. Decimal strings are produced only when the request document is written
 */

/**
 * Money - An amount in minor units with its ISO 4217 currency
 *
 * A bare number or bigint is accepted wherever money is taken; it is
 * interpreted in the transaction currency (options.currency, else USD).
 */
export interface Money {
  readonly amount: bigint | number;
  readonly currency: string;
}

export type MoneyInput = Money | bigint | number;

/**
 * Card brands the processor accepts
 */
export type CardBrand = 'visa' | 'master' | 'american_express' | 'discover';

/**
 * CreditCard - Caller-supplied card value object
 *
 * `brand` stays a plain string: an unrecognised brand is reported by the
 * request builder, not by the type checker.
 */
export interface CreditCard {
  readonly number: string;
  readonly month: number;
  readonly year: number;
  readonly brand: string;
  readonly verificationValue?: string;
  readonly firstName?: string;
  readonly lastName?: string;
}

export interface Address {
  readonly address1?: string;
  readonly address2?: string;
  readonly city?: string;
  readonly state?: string;
  readonly zip?: string;
  readonly country?: string;
  readonly email?: string;
}

/**
 * LineItem - One product line for tax calculation
 */
export interface LineItem {
  readonly unitPrice: bigint | number; // minor units
  readonly quantity: number;
  readonly productCode: string;        // tax category, e.g. 'default'
  readonly productName: string;
  readonly productSKU: string;
}

/**
 * Line items in order. A keyed Map is iterated in insertion order;
 * its keys never reach the wire.
 */
export type LineItems = ReadonlyArray<LineItem> | ReadonlyMap<string, LineItem>;

export interface TransactionOptions {
  readonly orderId?: string;
  readonly currency?: string;
  readonly address?: Address;
  readonly billingAddress?: Address;
  readonly shippingAddress?: Address;
  readonly lineItems?: LineItems;
}

/**
 * ReplyMap - Flattened processor reply (element name -> text)
 */
export type ReplyMap = Partial<Record<string, string>>;

/**
 * GatewayResponse - Normalised outcome of one operation
 */
export interface GatewayResponse {
  readonly success: boolean;
  readonly message?: string;
  readonly params: ReplyMap;
  readonly test: boolean;
  readonly authorization?: string;
}
