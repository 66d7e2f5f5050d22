import { describe, it, expect } from '@jest/globals';
import { DOMParser } from '@xmldom/xmldom';
import {
  PASSWORD_TEXT_TYPE,
  SOAP_NS,
  TRANSACTION_NS,
  WSSE_NS,
  buildEnvelope,
} from './envelope';
import { childElements, element, leaf } from './xml-node';

const credentials = { login: 'test-merchant', password: 'test-secret' };

function parse(xml: string): Document {
  return new DOMParser().parseFromString(xml, 'text/xml');
}

function textOf(doc: Document, namespace: string, name: string): string | null {
  const node = doc.getElementsByTagNameNS(namespace, name).item(0);
  return node ? node.textContent : null;
}

describe('buildEnvelope', () => {
  const body = {
    orderReference: 'X1',
    nodes: [
      element('purchaseTotals', [leaf('currency', 'USD'), leaf('grandTotalAmount', '10.00')]),
      element('ccAuthService', [], { run: 'true' }),
    ],
  };

  it('starts with the XML declaration and a SOAP envelope', () => {
    const xml = buildEnvelope(credentials, body);
    const doc = parse(xml);

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n')).toBe(true);
    expect(doc.documentElement.localName).toBe('Envelope');
    expect(doc.documentElement.namespaceURI).toBe(SOAP_NS);
  });

  it('carries a plaintext username token', () => {
    const doc = parse(buildEnvelope(credentials, body));

    expect(textOf(doc, WSSE_NS, 'Username')).toBe('test-merchant');
    expect(textOf(doc, WSSE_NS, 'Password')).toBe('test-secret');

    const password = doc.getElementsByTagNameNS(WSSE_NS, 'Password').item(0);
    expect(password?.getAttribute('Type')).toBe(PASSWORD_TEXT_TYPE);

    const security = doc.getElementsByTagNameNS(WSSE_NS, 'Security').item(0);
    expect(security?.getAttributeNS(SOAP_NS, 'mustUnderstand')).toBe('1');
  });

  it('writes merchant data ahead of the operation body', () => {
    const doc = parse(buildEnvelope(credentials, body));
    const requestMessage = doc.getElementsByTagNameNS(TRANSACTION_NS, 'requestMessage').item(0);

    const order = requestMessage ? childElements(requestMessage).map((child) => child.localName) : [];

    expect(order).toEqual([
      'merchantID',
      'merchantReferenceCode',
      'clientLibrary',
      'clientLibraryVersion',
      'clientEnvironment',
      'purchaseTotals',
      'ccAuthService',
    ]);
    expect(textOf(doc, TRANSACTION_NS, 'merchantID')).toBe('test-merchant');
    expect(textOf(doc, TRANSACTION_NS, 'merchantReferenceCode')).toBe('X1');
    expect(textOf(doc, TRANSACTION_NS, 'grandTotalAmount')).toBe('10.00');

    const service = doc.getElementsByTagNameNS(TRANSACTION_NS, 'ccAuthService').item(0);
    expect(service?.getAttribute('run')).toBe('true');
  });

  it('writes an empty order reference when none is known', () => {
    const doc = parse(buildEnvelope(credentials, { nodes: [] }));
    expect(textOf(doc, TRANSACTION_NS, 'merchantReferenceCode')).toBe('');
  });

  it('escapes markup in values', () => {
    const xml = buildEnvelope({ login: 'test-merchant', password: 'a<b&c' }, body);

    expect(xml).toContain('a&lt;b&amp;c');
    expect(textOf(parse(xml), WSSE_NS, 'Password')).toBe('a<b&c');
  });
});
