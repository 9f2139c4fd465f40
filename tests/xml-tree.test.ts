import { describe, expect, it } from 'vitest';
import { directText, parseXml, serializeWrapped, textContent } from '../src/xml/tree.js';
import { DocumentParseError } from '../src/validation/errors.js';

describe('parseXml', () => {
  const xml = '<a xmlns="urn:x" xmlns:p="urn:p"><p:b k="v">t</p:b><c/></a>';

  it('resolves default and prefixed namespaces', () => {
    const root = parseXml(xml);
    const [b, c] = root.children;

    expect(root.qname).toBe('{urn:x}a');
    expect(b.namespace).toBe('urn:p');
    expect(b.local).toBe('b');
    expect(b.qname).toBe('{urn:p}b');
    expect(c.qname).toBe('{urn:x}c');
  });

  it('keeps attributes but not namespace declarations', () => {
    const root = parseXml(xml);
    expect(root.attributes.size).toBe(0);
    expect(root.children[0].attributes.get('k')).toBe('v');
  });

  it('numbers elements in document order and records their path', () => {
    const root = parseXml(xml);
    expect(root.position).toBe(1);
    expect(root.children.map((child) => child.position)).toEqual([2, 3]);
    expect(root.children[0].path).toBe('/a/p:b');
  });

  it('accepts documents declaring a legacy encoding', () => {
    const root = parseXml('<?xml version="1.0" encoding="ISO-8859-1"?><a>café</a>');
    expect(directText(root)).toBe('café');
  });

  it('rejects malformed documents', () => {
    expect(() => parseXml('<a><b></a>', 'broken.xml')).toThrow(DocumentParseError);
  });

  it('rejects undeclared prefixes', () => {
    expect(() => parseXml('<q:a/>')).toThrow(DocumentParseError);
  });
});

describe('textContent', () => {
  it('concatenates nested text', () => {
    const root = parseXml('<a>x<b>y<c>z</c></b>w</a>');
    expect(textContent(root)).toBe('xyzw');
    expect(directText(root)).toBe('xw');
  });
});

describe('serializeWrapped', () => {
  it('wraps mixed content in a new element', () => {
    const source = parseXml('<d xmlns="urn:h">Hello <em>there</em>!</d>');
    const markup = serializeWrapped('urn:h', 'div', source.content);
    const wrapped = parseXml(markup);

    expect(wrapped.qname).toBe('{urn:h}div');
    expect(wrapped.children.map((child) => child.qname)).toEqual(['{urn:h}em']);
    expect(textContent(wrapped)).toBe('Hello there!');
  });
});
