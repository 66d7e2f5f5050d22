/**
 * CyberSource Gateway - XML Node Tree
 *
 * A plain tree of leaves (text) and elements (children), used for both the
 * outgoing request body and the incoming reply. Only this file and the
 * envelope/parser touch the DOM.
 */

export type XmlAttributes = Readonly<Record<string, string>>;

export interface XmlLeaf {
  readonly kind: 'leaf';
  readonly name: string;
  readonly text?: string;
  readonly attributes: XmlAttributes;
}

export interface XmlElement {
  readonly kind: 'element';
  readonly name: string;
  readonly children: ReadonlyArray<XmlNode>;
  readonly attributes: XmlAttributes;
}

export type XmlNode = XmlLeaf | XmlElement;

const ELEMENT_NODE = 1;

export function leaf(name: string, text?: string, attributes: XmlAttributes = {}): XmlLeaf {
  return { kind: 'leaf', name, text, attributes };
}

export function element(
  name: string,
  children: ReadonlyArray<XmlNode> = [],
  attributes: XmlAttributes = {}
): XmlElement {
  return { kind: 'element', name, children, attributes };
}

/**
 * Child elements in document order (text, comments and PIs skipped)
 */
export function childElements(node: Element): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i);
    if (isElement(child)) {
      result.push(child);
    }
  }
  return result;
}

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

/**
 * Convert a DOM element into an XmlNode. Element names lose their prefix.
 */
export function fromDom(node: Element): XmlNode {
  const name = node.localName || node.nodeName;
  const attributes: Record<string, string> = {};
  for (let i = 0; i < node.attributes.length; i++) {
    const attribute = node.attributes.item(i);
    if (attribute) {
      attributes[attribute.localName || attribute.name] = attribute.value;
    }
  }

  const children = childElements(node);
  if (children.length === 0) {
    return leaf(name, node.textContent ?? undefined, attributes);
  }
  return element(name, children.map(fromDom), attributes);
}

/**
 * Write an XmlNode (and its subtree) under `parent`, every element in `namespace`
 */
export function appendToDom(doc: Document, parent: Element, node: XmlNode, namespace: string | null): void {
  const target = doc.createElementNS(namespace, node.name);
  for (const [key, value] of Object.entries(node.attributes)) {
    target.setAttribute(key, value);
  }

  if (node.kind === 'leaf') {
    if (node.text !== undefined) {
      target.appendChild(doc.createTextNode(node.text));
    }
  } else {
    for (const child of node.children) {
      appendToDom(doc, target, child, namespace);
    }
  }

  parent.appendChild(target);
}

/**
 * First leaf found at the end of `path` (element names, depth-first)
 */
export function findLeafText(nodes: ReadonlyArray<XmlNode>, path: ReadonlyArray<string>): string | undefined {
  const [head, ...rest] = path;
  for (const node of nodes) {
    if (node.name !== head) continue;
    if (rest.length === 0) {
      if (node.kind === 'leaf') return node.text;
      continue;
    }
    if (node.kind === 'element') {
      const found = findLeafText(node.children, rest);
      if (found !== undefined) return found;
    }
  }
  return undefined;
}
