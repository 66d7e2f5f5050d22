import { describe, it, expect } from '@jest/globals';
import { flattenNode, parseReply } from './response.parser';
import { element, leaf } from './xml-node';

const SOAP_OPEN =
  '<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/"><soap:Header/><soap:Body>';
const SOAP_CLOSE = '</soap:Body></soap:Envelope>';

function replyMessage(inner: string): string {
  return `${SOAP_OPEN}<c:replyMessage xmlns:c="urn:schemas-cybersource-com:transaction-data-1.26">${inner}</c:replyMessage>${SOAP_CLOSE}`;
}

describe('parseReply', () => {
  it('keys every leaf of a flat reply by its name', () => {
    const reply = parseReply(
      replyMessage(
        '<c:merchantReferenceCode>X1</c:merchantReferenceCode>' +
          '<c:requestID>R1</c:requestID>' +
          '<c:decision>ACCEPT</c:decision>' +
          '<c:reasonCode>100</c:reasonCode>' +
          '<c:requestToken>T1</c:requestToken>'
      )
    );

    expect(reply).toEqual({
      merchantReferenceCode: 'X1',
      requestID: 'R1',
      decision: 'ACCEPT',
      reasonCode: '100',
      message: '100',
      requestToken: 'T1',
    });
  });

  it('flattens nested service replies', () => {
    const reply = parseReply(
      replyMessage(
        '<c:decision>ACCEPT</c:decision>' +
          '<c:purchaseTotals><c:currency>USD</c:currency></c:purchaseTotals>' +
          '<c:ccAuthReply><c:amount>10.00</c:amount><c:authorizationCode>888888</c:authorizationCode>' +
          '<c:avsCode>X</c:avsCode></c:ccAuthReply>'
      )
    );

    expect(reply).toEqual({
      decision: 'ACCEPT',
      currency: 'USD',
      amount: '10.00',
      authorizationCode: '888888',
      avsCode: 'X',
    });
  });

  it('keys leaves under item containers by item id', () => {
    const reply = parseReply(
      replyMessage(
        '<c:taxReply>' +
          '<c:item id="0"><c:quantity>2</c:quantity><c:totalTaxAmount>0.11</c:totalTaxAmount></c:item>' +
          '<c:item id="1"><c:quantity>1</c:quantity><c:totalTaxAmount>0.33</c:totalTaxAmount></c:item>' +
          '<c:totalTaxAmount>0.44</c:totalTaxAmount>' +
          '</c:taxReply>'
      )
    );

    expect(reply).toEqual({
      item_0_quantity: '2',
      item_0_totalTaxAmount: '0.11',
      item_1_quantity: '1',
      item_1_totalTaxAmount: '0.33',
      totalTaxAmount: '0.44',
    });
  });

  it('lets later leaves overwrite earlier ones with the same key', () => {
    const reply = parseReply(
      replyMessage(
        '<c:ccAuthReply><c:reasonCode>100</c:reasonCode></c:ccAuthReply>' +
          '<c:ccCaptureReply><c:reasonCode>235</c:reasonCode></c:ccCaptureReply>'
      )
    );

    expect(reply).toEqual({ reasonCode: '235' });
  });

  it('stores empty elements as empty strings', () => {
    expect(parseReply(replyMessage('<c:requestToken/>'))).toEqual({ requestToken: '' });
  });

  it('builds the message of a SOAP fault from code and string', () => {
    const reply = parseReply(
      `${SOAP_OPEN}<soap:Fault><faultcode>Client</faultcode><faultstring>Bad auth</faultstring></soap:Fault>${SOAP_CLOSE}`
    );

    expect(reply).toEqual({
      faultcode: 'Client',
      faultstring: 'Bad auth',
      message: 'Client: Bad auth',
    });
  });

  it('returns an empty map for anything else', () => {
    expect(parseReply('')).toEqual({});
    expect(parseReply('   ')).toEqual({});
    expect(parseReply('Service Unavailable')).toEqual({});
    expect(parseReply('<html><body><h1>Bad Gateway</h1></body></html>')).toEqual({});
  });
});

describe('flattenNode', () => {
  it('leaves already-flat input unchanged', () => {
    const reply = flattenNode({}, element('replyMessage', [leaf('decision', 'REJECT'), leaf('reasonCode', '203')]));
    expect(reply).toEqual({ decision: 'REJECT', reasonCode: '203' });
  });

  it('gives sibling items distinct keys', () => {
    const reply = flattenNode(
      {},
      element('taxReply', [
        element('item', [leaf('quantity', '2')], { id: '0' }),
        element('item', [leaf('quantity', '5')], { id: '1' }),
      ])
    );

    expect(reply).toEqual({ item_0_quantity: '2', item_1_quantity: '5' });
  });

  it('drops the id segment when the item has none', () => {
    const reply = flattenNode({}, element('item', [leaf('quantity', '3')]));
    expect(reply).toEqual({ item_quantity: '3' });
  });
});
