/**
 * CyberSource Gateway - Request Builder
 *
 * Turns normalised payment values into the operation part of a
 * requestMessage. Block order follows the processor's schema:
 *
 *   billTo, shipTo, item*, purchaseTotals, card, <services>, businessRules
 */

import {
  Address,
  CreditCard,
  LineItem,
  LineItems,
  Money,
  TransactionOptions,
} from '../../shared/types';
import { decodeAuthorization } from './authorization';
import { cardTypeCode } from './card-codes';
import { formatAmount } from './money';
import { XmlNode, element, leaf } from './xml-node';

/**
 * Gateway settings that shape request bodies
 */
export interface RequestBuilderOptions {
  readonly ignoreAvs: boolean;
  readonly ignoreCvv: boolean;
  readonly nexus?: string;
  readonly vatRegNumber?: string;
}

/**
 * RequestBody - Operation content plus the order reference the envelope
 * will carry as merchantReferenceCode
 */
export interface RequestBody {
  readonly orderReference?: string;
  readonly nodes: ReadonlyArray<XmlNode>;
}

export interface ResolvedAddresses {
  readonly billing: Address;
  readonly shipping: Address;
}

const RUN = { run: 'true' } as const;

/**
 * Fill both address slots from whatever the caller supplied.
 * billing: billingAddress -> address -> shippingAddress -> {}
 * shipping: shippingAddress -> resolved billing
 */
export function resolveAddresses(options: TransactionOptions): ResolvedAddresses {
  const billing = options.billingAddress ?? options.address ?? options.shippingAddress ?? {};
  const shipping = options.shippingAddress ?? billing;
  return { billing, shipping };
}

/**
 * Line items in caller order (array order, or Map insertion order)
 */
export function orderedLineItems(items: LineItems): LineItem[] {
  return Array.from(items.values());
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function twoDigits(value: number): string {
  return String(value).padStart(2, '0').slice(-2);
}

function fourDigits(value: number): string {
  return String(value).padStart(4, '0').slice(-4);
}

export class RequestBuilder {
  constructor(private readonly options: RequestBuilderOptions) {}

  buildAuthRequest(money: Money, card: CreditCard, options: TransactionOptions): RequestBody {
    const { billing } = resolveAddresses(options);
    return {
      orderReference: options.orderId,
      nodes: [
        this.addressBlock('billTo', card, billing),
        this.purchaseTotals(money),
        this.cardBlock(card),
        element('ccAuthService', [], RUN),
        this.businessRules(),
      ],
    };
  }

  /**
   * Auth and capture in one request
   */
  buildPurchaseRequest(money: Money, card: CreditCard, options: TransactionOptions): RequestBody {
    const { billing } = resolveAddresses(options);
    return {
      orderReference: options.orderId,
      nodes: [
        this.addressBlock('billTo', card, billing),
        this.purchaseTotals(money),
        this.cardBlock(card),
        element('ccAuthService', [], RUN),
        element('ccCaptureService', [], RUN),
        this.businessRules(),
      ],
    };
  }

  /**
   * No card or address is resent; the order id comes back out of the
   * authorization token
   */
  buildCaptureRequest(money: Money, authorization: string): RequestBody {
    const { orderId, requestId, requestToken } = decodeAuthorization(authorization);
    return {
      orderReference: orderId,
      nodes: [
        this.purchaseTotals(money),
        element(
          'ccCaptureService',
          [leaf('authRequestID', requestId), leaf('authRequestToken', requestToken)],
          RUN
        ),
        this.businessRules(),
      ],
    };
  }

  buildVoidRequest(authorization: string): RequestBody {
    const { orderId, requestId, requestToken } = decodeAuthorization(authorization);
    return {
      orderReference: orderId,
      nodes: [
        element(
          'voidService',
          [leaf('voidRequestID', requestId), leaf('voidRequestToken', requestToken)],
          RUN
        ),
      ],
    };
  }

  /**
   * Tax is quoted, not charged: purchaseTotals carries the currency and
   * no grandTotalAmount
   */
  buildTaxCalculationRequest(
    card: CreditCard,
    lineItems: ReadonlyArray<LineItem>,
    currency: string,
    options: TransactionOptions
  ): RequestBody {
    const { billing, shipping } = resolveAddresses(options);
    return {
      orderReference: options.orderId,
      nodes: [
        this.addressBlock('billTo', card, billing),
        this.addressBlock('shipTo', card, shipping),
        ...lineItems.map((item, index) => this.lineItem(item, index, currency)),
        this.currencyTotals(currency),
        this.taxService(),
        this.businessRules(),
      ],
    };
  }

  private addressBlock(name: 'billTo' | 'shipTo', card: CreditCard, address: Address): XmlNode {
    return element(name, [
      leaf('firstName', card.firstName),
      leaf('lastName', card.lastName),
      leaf('street1', address.address1),
      leaf('street2', address.address2),
      leaf('city', address.city),
      leaf('state', address.state),
      leaf('postalCode', address.zip),
      leaf('country', address.country),
      leaf('email', address.email),
    ]);
  }

  private purchaseTotals(grandTotal: Money): XmlNode {
    return element('purchaseTotals', [
      leaf('currency', grandTotal.currency),
      leaf('grandTotalAmount', formatAmount(grandTotal.amount, grandTotal.currency)),
    ]);
  }

  private currencyTotals(currency: string): XmlNode {
    return element('purchaseTotals', [leaf('currency', currency)]);
  }

  private cardBlock(card: CreditCard): XmlNode {
    const cardType = cardTypeCode(card.brand);

    const children: XmlNode[] = [
      leaf('accountNumber', card.number),
      leaf('expirationMonth', twoDigits(card.month)),
      leaf('expirationYear', fourDigits(card.year)),
    ];
    if (!this.options.ignoreCvv && !isBlank(card.verificationValue)) {
      children.push(leaf('cvNumber', card.verificationValue));
    }
    children.push(leaf('cardType', cardType));

    return element('card', children);
  }

  private lineItem(item: LineItem, index: number, currency: string): XmlNode {
    return element(
      'item',
      [
        leaf('unitPrice', formatAmount(item.unitPrice, currency, `lineItems[${index}].unitPrice`)),
        leaf('quantity', String(item.quantity)),
        leaf('productCode', item.productCode),
        leaf('productName', item.productName),
        leaf('productSKU', item.productSKU),
      ],
      { id: String(index) }
    );
  }

  private taxService(): XmlNode {
    const children: XmlNode[] = [];
    if (!isBlank(this.options.nexus)) {
      children.push(leaf('nexus', this.options.nexus));
    }
    if (!isBlank(this.options.vatRegNumber)) {
      children.push(leaf('sellerRegistration', this.options.vatRegNumber));
    }
    return element('taxService', children, RUN);
  }

  private businessRules(): XmlNode {
    const children: XmlNode[] = [];
    if (this.options.ignoreAvs) {
      children.push(leaf('ignoreAVSResult', 'true'));
    }
    if (this.options.ignoreCvv) {
      children.push(leaf('ignoreCVResult', 'true'));
    }
    return element('businessRules', children);
  }
}
