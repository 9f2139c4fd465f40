import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces.js';
import { isRecord, qualify } from '../utils.js';
import { DocumentParseError } from '../validation/errors.js';

const XML_NS = 'http://www.w3.org/XML/1998/namespace';

// fast-xml-parser (preserveOrder) output layout
const ATTR_PREFIX = '@_';
const ATTRS_KEY = ':@';
const TEXT_KEY = '#text';

export type XmlContent = XmlElement | string;

/**
 * A namespace-resolved element of a parsed XML document.
 */
export interface XmlElement {
  /** Tag as written in the document, prefix included. */
  readonly rawName: string;
  readonly local: string;
  readonly namespace?: string;
  /** `{namespace}local` lookup key. */
  readonly qname: string;
  /** Attribute values keyed by their written name; namespace declarations excluded. */
  readonly attributes: ReadonlyMap<string, string>;
  /** In-scope prefix → namespace map (`''` is the default namespace). */
  readonly namespaces: ReadonlyMap<string, string>;
  /** Text and child elements in document order. */
  readonly content: readonly XmlContent[];
  readonly children: readonly XmlElement[];
  /** 1-based index of the element in document order. */
  readonly position: number;
  /** Slash-separated tag path from the root, for error messages. */
  readonly path: string;
}

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * Input reaching this module is already a decoded JS string, so any
 * `encoding="ISO-8859-1"` (or similar) declaration is misleading and would
 * make `fast-xml-parser` reject the document.
 */
function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(
    /(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i,
    '$1 encoding="UTF-8"',
  );
}

function makeParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    allowBooleanAttributes: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
  });
}

function entryTag(entry: Record<string, unknown>): string | undefined {
  return Object.keys(entry).find((key) => key !== ATTRS_KEY);
}

function splitName(name: string): { prefix: string; local: string } {
  const colon = name.indexOf(':');
  return colon > 0
    ? { prefix: name.slice(0, colon), local: name.slice(colon + 1) }
    : { prefix: '', local: name };
}

class TreeBuilder {
  private position = 0;

  build(
    entry: Record<string, unknown>,
    tag: string,
    inherited: ReadonlyMap<string, string>,
    parentPath: string,
  ): XmlElement {
    const namespaces = new Map(inherited);
    const attributes = new Map<string, string>();
    const rawAttrs = entry[ATTRS_KEY];
    if (isRecord(rawAttrs)) {
      for (const [key, value] of Object.entries(rawAttrs)) {
        const name = key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key;
        const text = typeof value === 'string' ? value : String(value);
        if (name === 'xmlns') {
          namespaces.set('', text);
        } else if (name.startsWith('xmlns:')) {
          namespaces.set(name.slice('xmlns:'.length), text);
        } else {
          attributes.set(name, text);
        }
      }
    }

    const path = `${parentPath}/${tag}`;
    const { prefix, local } = splitName(tag);
    const namespace = namespaces.get(prefix) || undefined;
    if (prefix && !namespace) {
      throw new DocumentParseError(`Undeclared namespace prefix "${prefix}" at [${path}]`);
    }
    for (const name of attributes.keys()) {
      const attrPrefix = splitName(name).prefix;
      if (attrPrefix && !namespaces.has(attrPrefix)) {
        throw new DocumentParseError(`Undeclared namespace prefix "${attrPrefix}" at [${path}/@${name}]`);
      }
    }

    this.position += 1;
    const position = this.position;
    const content: XmlContent[] = [];
    const children: XmlElement[] = [];
    const rawChildren = entry[tag];
    if (Array.isArray(rawChildren)) {
      for (const child of rawChildren) {
        if (!isRecord(child)) continue;
        const childTag = entryTag(child);
        if (childTag === undefined) continue;
        if (childTag === TEXT_KEY) {
          const text = child[TEXT_KEY];
          content.push(typeof text === 'string' ? text : String(text));
          continue;
        }
        const element = this.build(child, childTag, namespaces, path);
        content.push(element);
        children.push(element);
      }
    }

    return {
      rawName: tag,
      local,
      namespace,
      qname: qualify(namespace, local),
      attributes,
      namespaces,
      content,
      children,
      position,
      path,
    };
  }
}

/**
 * Parses an XML document into a namespace-resolved element tree.
 *
 * @param xml    - The document text.
 * @param source - Name used in error messages (usually the file path).
 * @throws `DocumentParseError` if the document is not well-formed.
 */
export function parseXml(xml: string, source = 'document'): XmlElement {
  const content = normalizeXmlEncodingDeclaration(xml);
  const validation = XMLValidator.validate(content, { allowBooleanAttributes: true });
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new DocumentParseError(`Malformed XML in ${source} (${line}:${col}): ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = makeParser().parse(content);
  } catch (err) {
    throw new DocumentParseError(`Failed to parse XML content from: ${source}`, err);
  }

  if (Array.isArray(parsed)) {
    for (const entry of parsed) {
      if (!isRecord(entry)) continue;
      const tag = entryTag(entry);
      if (tag === undefined || tag === TEXT_KEY) continue;
      return new TreeBuilder().build(entry, tag, new Map([['xml', XML_NS]]), '');
    }
  }
  throw new DocumentParseError(`No root element found in ${source}`);
}

/**
 * Concatenated direct text of an element, untrimmed.
 */
export function directText(node: XmlElement): string {
  let text = '';
  for (const item of node.content) {
    if (typeof item === 'string') text += item;
  }
  return text;
}

function appendContent(parent: XMLBuilder, content: readonly XmlContent[]): void {
  for (const item of content) {
    if (typeof item === 'string') {
      parent.txt(item);
      continue;
    }
    const child = parent.ele(item.namespace ?? null, item.rawName);
    for (const [name, value] of item.attributes) {
      const { prefix } = splitName(name);
      child.att(prefix ? item.namespaces.get(prefix) ?? null : null, name, value);
    }
    appendContent(child, item.content);
  }
}

/**
 * Serializes `content` as the children of a new `<local>` element in
 * `namespace`. Used to capture wildcard markup as one opaque value.
 */
export function serializeWrapped(
  namespace: string | undefined,
  local: string,
  content: readonly XmlContent[],
): string {
  const doc = create();
  appendContent(doc.ele(namespace ?? null, local), content);
  return doc.end({ headless: true });
}

/**
 * Builds an in-memory element (not backed by a document) wrapping `content`.
 */
export function wrapContent(
  namespace: string,
  local: string,
  content: readonly XmlContent[],
  origin: XmlElement,
): XmlElement {
  return {
    rawName: local,
    local,
    namespace,
    qname: qualify(namespace, local),
    attributes: new Map(),
    namespaces: new Map([['', namespace]]),
    content,
    children: content.filter((item): item is XmlElement => typeof item !== 'string'),
    position: origin.position,
    path: `${origin.path}/${local}`,
  };
}

/**
 * Text of an element and all its descendants, in document order.
 */
export function textContent(node: XmlElement): string {
  let text = '';
  for (const item of node.content) {
    text += typeof item === 'string' ? item : textContent(item);
  }
  return text;
}
