import { XMLParser, XMLValidator } from 'fast-xml-parser';

export interface XmlText {
  kind: 'text';
  value: string;
}

export interface XmlElement {
  kind: 'element';
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

export class MalformedDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedDocumentError';

    Object.setPrototypeOf(this, MalformedDocumentError.prototype);
  }
}

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convertAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      attributes[key.slice(ATTRIBUTE_PREFIX.length)] = String(value);
    }
  }
  return attributes;
}

// preserveOrder output: [{ tag: [children], ':@': {attrs} }, { '#text': 'x' }]
function convertNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const entries: unknown[] = raw;
  const nodes: XmlNode[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY || key.startsWith('?')) {
        continue;
      }
      if (key === TEXT_KEY) {
        if (typeof value === 'string' || typeof value === 'number') {
          nodes.push({ kind: 'text', value: String(value) });
        }
        continue;
      }
      nodes.push({
        kind: 'element',
        name: key,
        attributes: convertAttributes(entry[ATTRIBUTES_KEY]),
        children: convertNodes(value),
      });
    }
  }
  return nodes;
}

/**
 * Parses an XML document into its root element.
 *
 * @throws MalformedDocumentError when the text is not well-formed XML
 */
export function parseXml(xml: string, partName: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedDocumentError(
      `${partName} is not well-formed XML (line ${validation.err.line}): ${validation.err.msg}`,
    );
  }

  const root = convertNodes(parser.parse(xml)).find(isElement);
  if (!root) {
    throw new MalformedDocumentError(`${partName} has no root element`);
  }
  return root;
}

export function isElement(node: XmlNode): node is XmlElement {
  return node.kind === 'element';
}

export function childElements(element: XmlElement, name?: string): XmlElement[] {
  return element.children
    .filter(isElement)
    .filter((child) => name === undefined || child.name === name);
}

export function findChild(
  element: XmlElement | undefined,
  name: string,
): XmlElement | undefined {
  return element ? childElements(element, name)[0] : undefined;
}

/**
 * Depth-first, document-order walk over every element below `element`.
 */
export function* descendants(element: XmlElement): Generator<XmlElement> {
  for (const child of childElements(element)) {
    yield child;
    yield* descendants(child);
  }
}

// Spacing elements that carry text without a text node.
const INLINE_TEXT = new Map<string, string>([
  ['text:tab', '\t'],
  ['text:line-break', '\n'],
]);

export function textContent(element: XmlElement): string {
  return element.children
    .map((child) => {
      if (child.kind === 'text') {
        return child.value;
      }
      if (child.name === 'text:s') {
        return ' '.repeat(Number(child.attributes['text:c'] ?? '1') || 1);
      }
      return INLINE_TEXT.get(child.name) ?? textContent(child);
    })
    .join('');
}

export function localName(qualifiedName: string): string {
  const separator = qualifiedName.indexOf(':');
  return separator === -1 ? qualifiedName : qualifiedName.slice(separator + 1);
}
