/**
 * CyberSource Gateway - Gateway
 * Authorize, capture, purchase, void and tax calculation over the SOAP API
 *
 * Every operation runs the same pipeline:
 * 1. Validate caller input (ValidationError, nothing is built)
 * 2. Build the operation body and wrap it in the envelope
 * 3. Test mode: answer canned test cards locally
 * 4. Send to the test or live endpoint through the TransportPort
 * 5. Flatten the reply and resolve success / message / authorization
 *
 * Notes:
 * - AVS and CVV only work against the production server. The test server
 *   always answers X for AVS and nothing for CVV.
 * - The processor's Business Center transaction search shows the full
 *   error text, including field names, when a reply is unclear.
 */

import {
  CardBrand,
  CreditCard,
  GatewayResponse,
  MoneyInput,
  ReplyMap,
  TransactionOptions,
} from '../../shared/types';
import {
  GatewayConfig,
  GatewayConfigInput,
  getGatewayMode,
  parseGatewayConfig,
} from '../../config';
import { HttpTransport } from './adapters/http.transport';
import { AuthorizationParts, encodeAuthorization, separatorClashes } from './authorization';
import { SUPPORTED_CARD_BRANDS } from './card-codes';
import { buildEnvelope } from './envelope';
import { DEFAULT_CURRENCY, resolveMoney } from './money';
import { reasonMessage } from './reason-codes';
import { RequestBody, RequestBuilder, orderedLineItems, resolveAddresses } from './request.builder';
import { parseReply } from './response.parser';
import { CannedTestCardResponder, TestCardResponder } from './test-cards';
import { TransportPort } from './transport.port';
import {
  AddressSchema,
  AuthorizationSchema,
  CreditCardSchema,
  LineItemListSchema,
  OrderIdSchema,
  validate,
} from './validation';
import { findLeafText } from './xml-node';

export type GatewayAction = 'authorize' | 'capture' | 'purchase' | 'void' | 'calculate_tax';

export interface GatewayCollaborators {
  readonly transport?: TransportPort;
  readonly testCards?: TestCardResponder;
}

const ACCEPT = 'ACCEPT';

/**
 * Turn a flattened reply into the normalised response.
 *
 * message: reason code table, else the parser's `message`, else undefined.
 * authorization: only for accepted, authorizable operations, and only when
 * the reply's request id and token fit in the token. A reply value holding
 * the separator leaves it undefined; params still carry the raw values.
 */
export function resolveResponse(
  reply: ReplyMap,
  orderReference: string | undefined,
  test: boolean,
  authorizable: boolean
): GatewayResponse {
  const success = reply.decision === ACCEPT;
  const fromTable = reply.reasonCode !== undefined ? reasonMessage(reply.reasonCode) : undefined;
  const message = fromTable ?? reply.message;

  let authorization: string | undefined;
  if (success && authorizable) {
    const parts: AuthorizationParts = {
      orderId: orderReference,
      requestId: reply.requestID,
      requestToken: reply.requestToken,
    };
    const clashing = separatorClashes(parts);
    if (clashing.length > 0) {
      console.warn(
        `[CyberSource] order=${orderReference ?? '-'} accepted but no authorization issued: reply values contain ";" (${clashing.join(', ')})`
      );
    } else {
      authorization = encodeAuthorization(parts);
    }
  }

  return { success, message, params: reply, test, authorization };
}

export class CyberSourceGateway {
  static readonly displayName = 'CyberSource';
  static readonly homepageUrl = 'http://www.cybersource.com';
  static readonly supportedCardTypes: ReadonlyArray<CardBrand> = SUPPORTED_CARD_BRANDS;
  static readonly supportedCountries: ReadonlyArray<string> = Object.freeze(['US']);
  static readonly defaultCurrency = DEFAULT_CURRENCY;

  private readonly config: GatewayConfig;
  private readonly builder: RequestBuilder;
  private readonly transport: TransportPort;
  private readonly testCards: TestCardResponder;

  /**
   * @throws ValidationError when login or password is missing
   */
  constructor(options: GatewayConfigInput, collaborators: GatewayCollaborators = {}) {
    this.config = parseGatewayConfig(options);
    this.builder = new RequestBuilder(this.config);
    this.transport = collaborators.transport ?? new HttpTransport({ timeoutMs: this.config.timeoutMs });
    this.testCards = collaborators.testCards ?? new CannedTestCardResponder();

    console.log(`[CyberSource] Gateway ready (mode: ${this.isTest() ? 'test' : 'live'})`);
  }

  /**
   * Per-instance flag, or the process-wide test mode
   */
  isTest(): boolean {
    return this.config.test || getGatewayMode() === 'test';
  }

  get url(): string {
    return this.isTest() ? this.config.testUrl : this.config.liveUrl;
  }

  /**
   * Reserve funds. options.orderId is required.
   */
  async authorize(money: MoneyInput, card: CreditCard, options: TransactionOptions = {}): Promise<GatewayResponse> {
    validate(OrderIdSchema, options.orderId, 'orderId');
    validate(CreditCardSchema, card, 'card');
    validate(AddressSchema, resolveAddresses(options).billing, 'billingAddress');

    const body = this.builder.buildAuthRequest(resolveMoney(money, options.currency), card, options);
    return this.commit('authorize', body, true);
  }

  /**
   * Settle a previous authorization (orderId;requestId;requestToken)
   */
  async capture(money: MoneyInput, authorization: string, options: TransactionOptions = {}): Promise<GatewayResponse> {
    validate(AuthorizationSchema, authorization, 'authorization');

    const body = this.builder.buildCaptureRequest(resolveMoney(money, options.currency), authorization);
    return this.commit('capture', body, true);
  }

  /**
   * Authorize and capture in one request. options.orderId is required.
   */
  async purchase(money: MoneyInput, card: CreditCard, options: TransactionOptions = {}): Promise<GatewayResponse> {
    validate(OrderIdSchema, options.orderId, 'orderId');
    validate(CreditCardSchema, card, 'card');
    validate(AddressSchema, resolveAddresses(options).billing, 'billingAddress');

    const body = this.builder.buildPurchaseRequest(resolveMoney(money, options.currency), card, options);
    return this.commit('purchase', body, true);
  }

  /**
   * Cancel an authorization or an unsettled capture. The response carries
   * no authorization.
   */
  async void(authorization: string, _options: TransactionOptions = {}): Promise<GatewayResponse> {
    validate(AuthorizationSchema, authorization, 'authorization');

    const body = this.builder.buildVoidRequest(authorization);
    return this.commit('void', body, false);
  }

  /**
   * Quote tax for options.lineItems (required, at least one).
   *
   * Without real prices per item, pass one line item priced at the order
   * subtotal. productCode tells the processor what kind of item is sold.
   */
  async calculateTax(card: CreditCard, options: TransactionOptions): Promise<GatewayResponse> {
    validate(CreditCardSchema, card, 'card');
    const { billing, shipping } = resolveAddresses(options);
    validate(AddressSchema, billing, 'billingAddress');
    validate(AddressSchema, shipping, 'shippingAddress');
    const lineItems = validate(
      LineItemListSchema,
      options.lineItems === undefined ? [] : orderedLineItems(options.lineItems),
      'lineItems'
    );

    const currency = (options.currency ?? DEFAULT_CURRENCY).toUpperCase();
    const body = this.builder.buildTaxCalculationRequest(card, lineItems, currency, options);
    return this.commit('calculate_tax', body, false);
  }

  private async commit(action: GatewayAction, body: RequestBody, authorizable: boolean): Promise<GatewayResponse> {
    const envelope = buildEnvelope(this.config, body);
    const test = this.isTest();

    if (test) {
      const cardNumber = findLeafText(body.nodes, ['card', 'accountNumber']);
      const canned = cardNumber !== undefined ? this.testCards.respond(cardNumber) : null;
      if (canned) {
        console.log(`[CyberSource] ${action} answered by test card table (success: ${canned.success})`);
        return canned;
      }
    }

    const url = test ? this.config.testUrl : this.config.liveUrl;
    console.log(`[CyberSource] ${action} order=${body.orderReference ?? '-'} -> ${test ? 'test' : 'live'} endpoint`);

    const raw = await this.transport.send(url, envelope);
    const reply = parseReply(raw);
    const response = resolveResponse(reply, body.orderReference, test, authorizable);

    console.log(
      `[CyberSource] ${action} order=${body.orderReference ?? '-'} decision=${reply.decision ?? 'NONE'} reasonCode=${reply.reasonCode ?? '-'}`
    );
    return response;
  }
}
