/**
 * CyberSource Gateway - SOAP Envelope
 *
 * s:Envelope
 *   s:Header / wsse:Security / wsse:UsernameToken (plaintext password token)
 *   s:Body / requestMessage
 *     merchantID, merchantReferenceCode, clientLibrary*, <operation body>
 */

import { DOMImplementation, XMLSerializer } from '@xmldom/xmldom';
import { RequestBody } from './request.builder';
import { appendToDom, leaf } from './xml-node';

export const SOAP_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
export const WSSE_NS = 'http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-secext-1.0.xsd';
export const PASSWORD_TEXT_TYPE =
  'http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-username-token-profile-1.0#PasswordText';
export const TRANSACTION_NS = 'urn:schemas-cybersource-com:transaction-data-1.26';

const XMLNS_NS = 'http://www.w3.org/2000/xmlns/';
const XSI_NS = 'http://www.w3.org/2001/XMLSchema-instance';
const XSD_NS = 'http://www.w3.org/2001/XMLSchema';

export const CLIENT_LIBRARY = 'cybersource-soap-gateway';
export const CLIENT_LIBRARY_VERSION = '0.1.0';
export const CLIENT_ENVIRONMENT = process.platform;

export interface EnvelopeCredentials {
  readonly login: string;
  readonly password: string;
}

export function buildEnvelope(credentials: EnvelopeCredentials, body: RequestBody): string {
  const doc = new DOMImplementation().createDocument(SOAP_NS, 's:Envelope', null);
  const envelope = doc.documentElement;

  const header = doc.createElementNS(SOAP_NS, 's:Header');
  const security = doc.createElementNS(WSSE_NS, 'wsse:Security');
  security.setAttributeNS(SOAP_NS, 's:mustUnderstand', '1');
  const usernameToken = doc.createElementNS(WSSE_NS, 'wsse:UsernameToken');
  const username = doc.createElementNS(WSSE_NS, 'wsse:Username');
  username.appendChild(doc.createTextNode(credentials.login));
  const password = doc.createElementNS(WSSE_NS, 'wsse:Password');
  password.setAttribute('Type', PASSWORD_TEXT_TYPE);
  password.appendChild(doc.createTextNode(credentials.password));
  usernameToken.appendChild(username);
  usernameToken.appendChild(password);
  security.appendChild(usernameToken);
  header.appendChild(security);
  envelope.appendChild(header);

  const soapBody = doc.createElementNS(SOAP_NS, 's:Body');
  soapBody.setAttributeNS(XMLNS_NS, 'xmlns:xsi', XSI_NS);
  soapBody.setAttributeNS(XMLNS_NS, 'xmlns:xsd', XSD_NS);

  const requestMessage = doc.createElementNS(TRANSACTION_NS, 'requestMessage');
  const merchantData = [
    leaf('merchantID', credentials.login),
    leaf('merchantReferenceCode', body.orderReference),
    leaf('clientLibrary', CLIENT_LIBRARY),
    leaf('clientLibraryVersion', CLIENT_LIBRARY_VERSION),
    leaf('clientEnvironment', CLIENT_ENVIRONMENT),
  ];
  for (const node of [...merchantData, ...body.nodes]) {
    appendToDom(doc, requestMessage, node, TRANSACTION_NS);
  }
  soapBody.appendChild(requestMessage);
  envelope.appendChild(soapBody);

  const declaration = '<?xml version="1.0" encoding="UTF-8"?>';
  return `${declaration}\n${new XMLSerializer().serializeToString(doc)}`;
}
