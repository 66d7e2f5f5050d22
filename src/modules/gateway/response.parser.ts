/**
 * CyberSource Gateway - Response Parser
 *
 * Flattens a reply document into a ReplyMap.
 *
 * Two roots are recognised, matched on local name so any prefix works:
 * - replyMessage: every leaf becomes one key; a top-level reasonCode is also
 *   kept under `message` as the fallback text
 * - Fault: flattened the same way, then message = "faultcode: faultstring"
 *
 * Leaves under an element whose name contains "item" are keyed
 * `<parent>_<id>_<leaf>` (or `<parent>_<leaf>` when the parent has no id).
 * Anything else, including malformed XML, yields an empty map.
 */

import { DOMParser } from '@xmldom/xmldom';
import { ReplyMap } from '../../shared/types';
import { XmlElement, XmlNode, childElements, fromDom } from './xml-node';

const REPLY_ROOT = 'replyMessage';
const FAULT_ROOT = 'Fault';
const REASON_CODE = 'reasonCode';
const ITEM_CONTAINER = /item/;

/**
 * Add one node's leaves to `reply`. Later keys overwrite earlier ones.
 */
export function flattenNode(reply: ReplyMap, node: XmlNode, parent?: XmlElement): ReplyMap {
  if (node.kind === 'element') {
    for (const child of node.children) {
      flattenNode(reply, child, node);
    }
    return reply;
  }

  reply[leafKey(node.name, parent)] = node.text ?? '';
  return reply;
}

function leafKey(name: string, parent?: XmlElement): string {
  if (parent === undefined || !ITEM_CONTAINER.test(parent.name)) {
    return name;
  }
  const id = parent.attributes.id;
  const container = id !== undefined ? `${parent.name}_${id}` : parent.name;
  return `${container}_${name}`;
}

function parseDocument(xml: string): Document | null {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => problems.push(msg),
      fatalError: (msg: string) => problems.push(msg),
    },
  });

  try {
    const doc = parser.parseFromString(xml, 'text/xml');
    if (problems.length > 0 || !doc || !doc.documentElement) {
      console.warn(`[ResponseParser] Unparseable reply: ${problems[0] ?? 'no document element'}`);
      return null;
    }
    return doc;
  } catch (error) {
    console.warn('[ResponseParser] Unparseable reply:', error instanceof Error ? error.message : error);
    return null;
  }
}

function firstByLocalName(doc: Document, localName: string): Element | null {
  return doc.getElementsByTagNameNS('*', localName).item(0);
}

/**
 * Parse a raw reply. Never throws.
 */
export function parseReply(xml: string): ReplyMap {
  const reply: ReplyMap = {};
  if (xml.trim() === '') {
    return reply;
  }

  const doc = parseDocument(xml);
  if (!doc) {
    return reply;
  }

  const replyRoot = firstByLocalName(doc, REPLY_ROOT);
  if (replyRoot) {
    for (const child of childElements(replyRoot)) {
      const node = fromDom(child);
      if (node.name === REASON_CODE && node.kind === 'leaf') {
        reply.message = node.text ?? '';
      }
      flattenNode(reply, node);
    }
    return reply;
  }

  const faultRoot = firstByLocalName(doc, FAULT_ROOT);
  if (faultRoot) {
    flattenNode(reply, fromDom(faultRoot));
    reply.message = `${reply.faultcode ?? ''}: ${reply.faultstring ?? ''}`;
  }

  return reply;
}
