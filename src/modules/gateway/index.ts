/**
 * CyberSource Gateway - Module Export
 */

// Gateway (orchestration)
export { CyberSourceGateway, GatewayAction, GatewayCollaborators, resolveResponse } from './cybersource.gateway';

// Transport port and its HTTP adapter
export { TransportPort } from './transport.port';
export { HttpTransport, HttpTransportConfig } from './adapters/http.transport';

// Test mode
export {
  CannedTestCardResponder,
  TestCardResponder,
  TEST_AUTHORIZATION,
  TEST_ERROR_MESSAGE,
  TEST_FAILURE_MESSAGE,
  TEST_SUCCESS_MESSAGE,
} from './test-cards';

// Wire format
export { RequestBuilder, RequestBody, RequestBuilderOptions, resolveAddresses, orderedLineItems } from './request.builder';
export { buildEnvelope, EnvelopeCredentials } from './envelope';
export { parseReply, flattenNode } from './response.parser';
export { XmlNode, XmlLeaf, XmlElement, element, leaf } from './xml-node';

// Lookups and codecs
export { encodeAuthorization, decodeAuthorization, separatorClashes, AuthorizationParts, AUTHORIZATION_SEPARATOR } from './authorization';
export { reasonMessage } from './reason-codes';
export { cardTypeCode, isSupportedBrand, SUPPORTED_CARD_BRANDS } from './card-codes';
export { formatAmount, minorUnitExponent, resolveMoney, DEFAULT_CURRENCY } from './money';
