import { publicName } from '../config.js';
import { Has, Individual, VALUE_PLACEHOLDER } from '../owl/entities.js';
import type { DocumentValue, OntologyEntry } from '../owl/entities.js';
import { parseLiteral, TextLiteral } from '../owl/literal.js';
import type { Literal } from '../owl/literal.js';
import { directText, parseXml, serializeWrapped, wrapContent } from '../xml/tree.js';
import type { XmlElement } from '../xml/tree.js';
import { toIri, XHTML_NS } from '../utils.js';
import {
  CompilationStateError,
  EmptyValueError,
  UnexpectedNamespaceError,
  UnknownVocabularyValueError,
  XsdMappingError,
} from '../validation/errors.js';
import { DEFAULT_TYPE_NAME } from './registry.js';
import type { TypeRegistry } from './registry.js';
import type {
  AttributeDecl,
  CompiledSchema,
  ComplexTypeDef,
  ContentModel,
  ElementDecl,
  ExtensionModel,
  SchemaType,
  SequenceModel,
  SimpleTypeDef,
  WildcardDecl,
} from './types.js';

/**
 * Walks XML documents against a compiled schema and builds their entity graph.
 * The schema is only read; one walker may parse any number of documents.
 */
export class InstanceWalker {
  private readonly registry: TypeRegistry;

  constructor(private readonly schema: CompiledSchema) {
    this.registry = schema.types;
  }

  /**
   * Parses a document root. The root always yields its own value, even when
   * its type would flatten anywhere else.
   *
   * @throws `XsdMappingError` if the root tag is not a top-level element.
   */
  parseDocument(root: XmlElement): DocumentValue {
    const element = this.schema.elements.get(root.qname);
    if (!element) {
      throw new XsdMappingError(root.path, `<${root.rawName}> is not a top-level element of the schema`);
    }
    return this.parseNode(this.registry.resolve(element.type), root);
  }

  // -------------------------------------------------------------------------
  // Values
  // -------------------------------------------------------------------------

  private parseNode(type: SchemaType, node: XmlElement): Literal | Individual {
    if (type.kind === 'complex') return this.parseComplex(type, node);
    const text = directText(node).trim();
    if (!text) throw new EmptyValueError(node.path);
    return this.parseScalar(type, text, node.path);
  }

  /**
   * Parses a string (node text or attribute value) through a literal or
   * vocabulary type.
   */
  private parseScalar(
    type: SchemaType,
    value: string,
    path: string,
    seen: ReadonlySet<SchemaType> = new Set(),
  ): Literal | Individual {
    switch (type.kind) {
      case 'literal':
        return parseLiteral(type.rule, value, type.datatype, path);
      case 'simple':
        return this.parseVocabulary(type, value, path, seen);
      case 'complex':
        throw new XsdMappingError(path, `complex type "${type.name}" cannot parse a text value`);
    }
  }

  private parseVocabulary(
    type: SimpleTypeDef,
    value: string,
    path: string,
    seen: ReadonlySet<SchemaType>,
  ): Literal | Individual {
    if (type.enumerations.size === 0) {
      // A restriction without enumerations reads like its base.
      const base = type.base && !seen.has(type)
        ? this.registry.resolve(type.base)
        : this.registry.resolve({ kind: 'named', name: DEFAULT_TYPE_NAME });
      return this.parseScalar(base, value, path, new Set([...seen, type]));
    }
    const enumeration = type.enumerations.get(value);
    if (!enumeration) throw new UnknownVocabularyValueError(value, type.localName, path);
    return enumeration.reference;
  }

  private parseComplex(type: ComplexTypeDef, node: XmlElement): Individual {
    if (!type.alone && !type.marked) {
      throw new CompilationStateError(type.name, 'parsed before its class was declared');
    }
    const assertions = this.parseAttributes(type.attributes, node);
    if (type.content) assertions.push(...this.parseContent(type.content, node));

    const typeName = publicName(this.schema.options, node.local);
    return new Individual(`${typeName}_${node.position}`, {
      assertions,
      type: typeName,
      naming: this.schema.options.naming,
    });
  }

  private parseAttributes(attributes: readonly AttributeDecl[], node: XmlElement): Has[] {
    const assertions: Has[] = [];
    for (const attribute of attributes) {
      const value = node.attributes.get(attribute.name);
      if (value === undefined) continue;
      const type = this.registry.resolve(attribute.type);
      const path = `${node.path}/@${attribute.name}`;
      if (type.kind === 'complex') {
        throw new XsdMappingError(path, `attribute bound to complex type "${type.name}"`);
      }
      assertions.push(new Has(attribute.name, this.parseScalar(type, value.trim(), path)));
    }
    return assertions;
  }

  // -------------------------------------------------------------------------
  // Content models
  // -------------------------------------------------------------------------

  private parseContent(content: ContentModel, node: XmlElement): Has[] {
    switch (content.kind) {
      case 'sequence':
        return this.parseSequence(content, node);
      case 'choice':
        return this.parseChildren(content.names, node);
      case 'extension':
        return this.parseExtension(content, node);
    }
  }

  private parseSequence(sequence: SequenceModel, node: XmlElement): Has[] {
    if (sequence.wildcard) {
      const captured = wrapContent(XHTML_NS, 'div', node.content, node);
      return [this.parseWildcard(sequence.wildcard, captured)];
    }
    return this.parseChildren(sequence.names, node);
  }

  private parseChildren(names: ReadonlyMap<string, ElementDecl>, node: XmlElement): Has[] {
    const assertions: Has[] = [];
    for (const child of node.children) {
      const element = names.get(child.qname);
      if (!element) {
        throw new XsdMappingError(child.path, `<${child.rawName}> is not allowed in <${node.rawName}>`);
      }
      assertions.push(...this.parseElement(element, child));
    }
    return assertions;
  }

  /**
   * Parses a child element. A flattening type hands its assertions to the
   * caller, its value placeholder renamed after the element.
   */
  private parseElement(element: ElementDecl, node: XmlElement): Has[] {
    const type = this.registry.resolve(element.type);
    const value = this.parseNode(type, node);
    const relation = publicName(this.schema.options, node.local);
    if (type.kind === 'complex' && type.alone && value instanceof Individual) {
      return value.assertions.map((assertion) =>
        assertion.isPlaceholder ? new Has(relation, assertion.value) : assertion,
      );
    }
    return [new Has(relation, value)];
  }

  private parseExtension(extension: ExtensionModel, node: XmlElement): Has[] {
    const assertions = this.parseAttributes(extension.attributes, node);
    const base = this.registry.resolve(extension.base);
    try {
      const value = this.parseNode(base, node);
      if (base.kind === 'complex' && value instanceof Individual) {
        assertions.push(...value.assertions);
      } else {
        assertions.push(new Has(VALUE_PLACEHOLDER, value));
      }
    } catch (err) {
      // An extension of an empty value only carries its attributes.
      if (!(err instanceof EmptyValueError)) throw err;
    }
    return assertions;
  }

  private parseWildcard(wildcard: WildcardDecl, captured: XmlElement): Has {
    const { namespace } = captured;
    if (!this.acceptsNamespace(wildcard.namespace, namespace)) {
      throw new UnexpectedNamespaceError(namespace, captured.path, `wildcard only accepts "${wildcard.namespace}"`);
    }
    const type = this.registry.lookup(captured.qname);
    if (type) return new Has(VALUE_PLACEHOLDER, this.parseNode(type, captured));

    if (namespace === undefined || !this.schema.options.passThroughNamespaces.includes(namespace)) {
      throw new UnexpectedNamespaceError(namespace, captured.path, 'no schema type and not a pass-through namespace');
    }
    const markup = serializeWrapped(namespace, captured.local, captured.content);
    return new Has(VALUE_PLACEHOLDER, new TextLiteral(markup, toIri(namespace, captured.local)));
  }

  /**
   * Checks a namespace against an `xs:any` constraint
   * (`##any`, `##other`, `##local`, `##targetNamespace` or a URI list).
   */
  private acceptsNamespace(constraint: string, namespace: string | undefined): boolean {
    const target = this.schema.targetNamespace;
    return constraint
      .trim()
      .split(/\s+/)
      .some((token) => {
        switch (token) {
          case '##any':
            return true;
          case '##other':
            return namespace !== undefined && namespace !== target;
          case '##local':
            return namespace === undefined;
          case '##targetNamespace':
            return namespace === target;
          default:
            return token === namespace;
        }
      });
  }
}

/**
 * Parses one document and returns its value only.
 *
 * @param document - XML text or an already parsed tree.
 */
export function parseDocument(
  schema: CompiledSchema,
  document: string | XmlElement,
  source = 'document',
): DocumentValue {
  const root = typeof document === 'string' ? parseXml(document, source) : document;
  return new InstanceWalker(schema).parseDocument(root);
}

/**
 * Parses one document and returns the schema's prelude followed by the
 * document's value.
 */
export function parse(
  schema: CompiledSchema,
  document: string | XmlElement,
  source = 'document',
): OntologyEntry[] {
  return [...schema.prelude, parseDocument(schema, document, source)];
}
