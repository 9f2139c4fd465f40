import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { resolveBindingOptions } from '../config.js';
import type { BindingOptions, BindingOptionsInput } from '../config.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { Individual } from '../owl/entities.js';
import { parseXml, textContent } from '../xml/tree.js';
import type { XmlElement } from '../xml/tree.js';
import { qualify, XS_NS } from '../utils.js';
import { DocumentParseError, TypeConflictError, XsdParseError } from '../validation/errors.js';
import { initializePrelude } from './prelude.js';
import { DEFAULT_TYPE_NAME, describeTypeRef, sameTypeRef, TypeRegistry } from './registry.js';
import type {
  AttributeDecl,
  ChoiceModel,
  CompiledSchema,
  ComplexTypeDef,
  ContentModel,
  ElementDecl,
  EnumerationDef,
  ExtensionModel,
  SequenceModel,
  SimpleTypeDef,
  TypeRef,
  WildcardDecl,
} from './types.js';

export interface CompileOptions {
  binding?: BindingOptionsInput;
  logger?: Logger;
  /** Name used in error messages (usually the file path). */
  source?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isXs(node: XmlElement, local: string): boolean {
  return node.namespace === XS_NS && node.local === local;
}

function xsChildren(node: XmlElement, local: string): XmlElement[] {
  return node.children.filter((child) => isXs(child, local));
}

function xsChild(node: XmlElement, ...locals: string[]): XmlElement | undefined {
  return node.children.find((child) => child.namespace === XS_NS && locals.includes(child.local));
}

function parseOccurs(value: string | undefined): number | 'unbounded' {
  if (value === 'unbounded') return 'unbounded';
  if (value === undefined) return 1;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? 1 : n;
}

function parseMinOccurs(value: string | undefined): number {
  const n = parseOccurs(value);
  return n === 'unbounded' ? 1 : n;
}

/**
 * Text of every `xs:annotation/xs:documentation` child, trimmed, empty ones dropped.
 */
function parseAnnotations(node: XmlElement): string[] {
  const annotations: string[] = [];
  for (const annotation of xsChildren(node, 'annotation')) {
    for (const documentation of xsChildren(annotation, 'documentation')) {
      const text = textContent(documentation).trim();
      if (text) annotations.push(text);
    }
  }
  return annotations;
}

function named(name: string): TypeRef {
  return { kind: 'named', name };
}

// ---------------------------------------------------------------------------
// Compiler
// ---------------------------------------------------------------------------

class SchemaCompiler {
  readonly registry = new TypeRegistry();
  private readonly targetNamespace: string | undefined;
  private readonly qualifiedLocals: boolean;
  private readonly forceAlone: ReadonlySet<string>;

  constructor(
    private readonly root: XmlElement,
    private readonly options: BindingOptions,
    private readonly logger: Logger,
  ) {
    this.targetNamespace = root.attributes.get('targetNamespace') || undefined;
    this.qualifiedLocals = root.attributes.get('elementFormDefault') === 'qualified';
    this.forceAlone = new Set(options.forceAlone);
  }

  compile(): CompiledSchema {
    const elements = new Map<string, ElementDecl>();

    for (const child of this.root.children) {
      if (child.namespace !== XS_NS) {
        this.logger.warn(`Skipping foreign top-level element <${child.rawName}>`);
        continue;
      }
      switch (child.local) {
        case 'element': {
          const element = this.parseElement(child, '', true);
          if (elements.has(element.qname)) {
            this.logger.warn(`Duplicate top-level element "${element.name}"; keeping the first`);
          } else {
            elements.set(element.qname, element);
          }
          break;
        }
        case 'complexType': {
          const local = this.requireName(child);
          this.defineNamed(this.buildComplexType(child, qualify(this.targetNamespace, local), local, local));
          break;
        }
        case 'simpleType': {
          const local = this.requireName(child);
          this.defineNamed(this.buildSimpleType(child, qualify(this.targetNamespace, local), local, local));
          break;
        }
        case 'annotation':
          break;
        default:
          this.logger.warn(`<xs:${child.local}> is not supported and was skipped`);
      }
    }

    const prelude = initializePrelude({
      registry: this.registry,
      elements,
      options: this.options,
      logger: this.logger,
    });
    this.registry.seal();
    this.logger.debug(
      `Compiled ${elements.size} top-level element(s), ${this.registry.all.length} type(s), ` +
        `${prelude.length} prelude entr${prelude.length === 1 ? 'y' : 'ies'}`,
    );

    return {
      targetNamespace: this.targetNamespace,
      elements,
      types: this.registry,
      prelude,
      options: this.options,
    };
  }

  // -------------------------------------------------------------------------
  // Names
  // -------------------------------------------------------------------------

  private requireName(node: XmlElement): string {
    const name = node.attributes.get('name');
    if (!name) {
      throw new XsdParseError(`Invalid XSD: <${node.rawName}> at [${node.path}] has no name`);
    }
    return name;
  }

  /**
   * Resolves a QName written in the schema (`prefix:local` or `local`) against
   * the namespaces in scope at `node`.
   */
  private resolveTypeName(node: XmlElement, value: string): string {
    const colon = value.indexOf(':');
    if (colon < 0) {
      return qualify(node.namespaces.get('') || this.targetNamespace, value);
    }
    const prefix = value.slice(0, colon);
    const namespace = node.namespaces.get(prefix);
    if (namespace === undefined) {
      throw new XsdParseError(`Invalid XSD: undeclared prefix "${prefix}" in "${value}" at [${node.path}]`);
    }
    return qualify(namespace, value.slice(colon + 1));
  }

  private defineNamed(type: ComplexTypeDef | SimpleTypeDef): void {
    if (!this.registry.define(type)) {
      this.logger.warn(`Type "${type.path}" is already defined; keeping the first definition`);
    }
  }

  // -------------------------------------------------------------------------
  // Declarations
  // -------------------------------------------------------------------------

  private parseElement(node: XmlElement, ownerPath: string, topLevel: boolean): ElementDecl {
    const name = node.attributes.get('name');
    if (!name) {
      const ref = node.attributes.get('ref');
      throw new XsdParseError(
        ref
          ? `Invalid XSD: element references (ref="${ref}") are not supported at [${node.path}]`
          : `Invalid XSD: element without a name at [${node.path}]`,
      );
    }
    const path = ownerPath ? `${ownerPath}/${name}` : name;
    return {
      kind: 'element',
      name,
      qname: qualify(topLevel || this.qualifiedLocals ? this.targetNamespace : undefined, name),
      type: this.declaredType(node, path, name),
      minOccurs: parseMinOccurs(node.attributes.get('minOccurs')),
      maxOccurs: parseOccurs(node.attributes.get('maxOccurs')),
      annotations: parseAnnotations(node),
    };
  }

  private parseAttribute(node: XmlElement, ownerPath: string): AttributeDecl | undefined {
    const name = node.attributes.get('name');
    if (!name) {
      this.logger.warn(`Skipping attribute without a name at [${node.path}]`);
      return undefined;
    }
    return {
      name,
      type: this.declaredType(node, `${ownerPath}/@${name}`, name),
      required: node.attributes.get('use') === 'required',
      annotations: parseAnnotations(node),
    };
  }

  /**
   * The `type` attribute of an element or attribute, else its inline type,
   * else text.
   */
  private declaredType(node: XmlElement, path: string, local: string): TypeRef {
    const typeName = node.attributes.get('type');
    if (typeName) return named(this.resolveTypeName(node, typeName));

    const complexType = xsChild(node, 'complexType');
    if (complexType) {
      return this.registry.defineInline(this.buildComplexType(complexType, path, path, local));
    }
    const simpleType = xsChild(node, 'simpleType');
    if (simpleType) {
      return this.registry.defineInline(this.buildSimpleType(simpleType, path, path, local));
    }
    return named(DEFAULT_TYPE_NAME);
  }

  private parseAttributes(node: XmlElement, ownerPath: string): AttributeDecl[] {
    const attributes: AttributeDecl[] = [];
    for (const child of node.children) {
      if (child.namespace !== XS_NS) continue;
      if (child.local === 'attribute') {
        const attribute = this.parseAttribute(child, ownerPath);
        if (attribute) attributes.push(attribute);
      } else if (child.local === 'attributeGroup' || child.local === 'anyAttribute') {
        this.logger.warn(`<xs:${child.local}> at [${child.path}] is not supported and was skipped`);
      }
    }
    return attributes;
  }

  // -------------------------------------------------------------------------
  // Types
  // -------------------------------------------------------------------------

  private buildComplexType(node: XmlElement, name: string, path: string, localName: string): ComplexTypeDef {
    const attributes = this.parseAttributes(node, path);
    const content = this.buildContent(node, path);
    const computed = content ? content.alone && attributes.length <= 1 : attributes.length === 1;
    return {
      kind: 'complex',
      name,
      path,
      localName,
      alone: computed || this.forceAlone.has(path),
      marked: false,
      annotations: parseAnnotations(node),
      attributes,
      content,
    };
  }

  private buildContent(node: XmlElement, path: string): ContentModel | undefined {
    const sequence = xsChild(node, 'sequence', 'all');
    if (sequence) return this.buildSequence(sequence, path);

    const wrapper = xsChild(node, 'simpleContent', 'complexContent');
    if (wrapper) {
      const extension = xsChild(wrapper, 'extension');
      if (extension) return this.buildExtension(extension, path);
      this.logger.warn(`<xs:${wrapper.local}> at [${wrapper.path}] without xs:extension is read as empty content`);
      return undefined;
    }

    const choice = xsChild(node, 'choice');
    if (choice) return this.buildChoice(choice, path);

    const group = xsChild(node, 'group');
    if (group) this.logger.warn(`<xs:group> at [${group.path}] is not supported and was skipped`);
    return undefined;
  }

  private buildSequence(node: XmlElement, path: string): SequenceModel {
    const children: (ElementDecl | ChoiceModel)[] = [];
    const wildcards: WildcardDecl[] = [];

    const collect = (container: XmlElement): void => {
      for (const child of container.children) {
        if (child.namespace !== XS_NS) continue;
        switch (child.local) {
          case 'element':
            children.push(this.parseElement(child, path, false));
            break;
          case 'choice':
            children.push(this.buildChoice(child, path));
            break;
          case 'sequence':
            collect(child);
            break;
          case 'any':
            wildcards.push({
              namespace: child.attributes.get('namespace') ?? '##any',
              minOccurs: parseMinOccurs(child.attributes.get('minOccurs')),
              maxOccurs: parseOccurs(child.attributes.get('maxOccurs')),
            });
            break;
          case 'annotation':
            break;
          default:
            this.logger.warn(`<xs:${child.local}> at [${child.path}] is not supported and was skipped`);
        }
      }
    };
    collect(node);

    if (wildcards.length > 1) {
      throw new XsdParseError(`Invalid XSD: sequence at [${node.path}] declares more than one xs:any`);
    }
    if (wildcards.length === 1 && children.length > 0) {
      throw new XsdParseError(`Invalid XSD: sequence at [${node.path}] mixes xs:any with named children`);
    }

    const names = new Map<string, ElementDecl>();
    for (const child of children) {
      if (child.kind === 'element') this.mergeName(names, child);
      else for (const element of child.names.values()) this.mergeName(names, element);
    }

    return {
      kind: 'sequence',
      children,
      names,
      wildcard: wildcards[0],
      alone: children.length <= 1,
    };
  }

  private buildChoice(node: XmlElement, path: string): ChoiceModel {
    const branches: (ElementDecl | SequenceModel | ChoiceModel)[] = [];
    for (const child of node.children) {
      if (child.namespace !== XS_NS) continue;
      switch (child.local) {
        case 'element':
          branches.push(this.parseElement(child, path, false));
          break;
        case 'sequence':
          branches.push(this.buildSequence(child, path));
          break;
        case 'choice':
          branches.push(this.buildChoice(child, path));
          break;
        case 'annotation':
          break;
        default:
          this.logger.warn(`<xs:${child.local}> in a choice at [${child.path}] is not supported and was skipped`);
      }
    }

    const names = new Map<string, ElementDecl>();
    for (const branch of branches) {
      if (branch.kind === 'element') this.mergeName(names, branch);
      else for (const element of branch.names.values()) this.mergeName(names, element);
    }
    return { kind: 'choice', branches, names, alone: false };
  }

  /**
   * Adds `element` to a name table. The same tag may appear again only when
   * it is bound to the same type.
   */
  private mergeName(names: Map<string, ElementDecl>, element: ElementDecl): void {
    const existing = names.get(element.qname);
    if (!existing) {
      names.set(element.qname, element);
      return;
    }
    if (!sameTypeRef(existing.type, element.type)) {
      throw new TypeConflictError(
        element.name,
        describeTypeRef(existing.type, this.registry),
        describeTypeRef(element.type, this.registry),
      );
    }
  }

  private buildExtension(node: XmlElement, path: string): ExtensionModel {
    const base = node.attributes.get('base');
    if (!base) {
      throw new XsdParseError(`Invalid XSD: xs:extension at [${node.path}] has no base`);
    }
    const compositor = xsChild(node, 'sequence', 'all', 'choice');
    if (compositor) {
      this.logger.warn(`Element content of the extension at [${node.path}] is ignored; only attributes are added`);
    }
    return {
      kind: 'extension',
      base: named(this.resolveTypeName(node, base)),
      attributes: this.parseAttributes(node, path),
      alone: false,
    };
  }

  private buildSimpleType(node: XmlElement, name: string, path: string, localName: string): SimpleTypeDef {
    const annotations = parseAnnotations(node);
    const restriction = xsChild(node, 'restriction');
    if (!restriction) {
      this.logger.debug(`Simple type "${path}" has no xs:restriction; its values are read as text`);
      return {
        kind: 'simple',
        name,
        path,
        localName,
        alone: false,
        marked: false,
        annotations,
        base: named(DEFAULT_TYPE_NAME),
        enumerations: new Map(),
      };
    }

    const baseName = restriction.attributes.get('base');
    const enumerations = new Map<string, EnumerationDef>();
    for (const facet of xsChildren(restriction, 'enumeration')) {
      const value = facet.attributes.get('value') ?? '';
      if (enumerations.has(value)) continue;
      const valueAnnotations = parseAnnotations(facet);
      const init = { type: localName, annotations: valueAnnotations, naming: this.options.naming };
      enumerations.set(value, {
        value,
        annotations: valueAnnotations,
        declaration: new Individual(value, init),
        reference: new Individual(value, { ...init, ignore: true }),
      });
    }

    return {
      kind: 'simple',
      name,
      path,
      localName,
      alone: false,
      marked: false,
      annotations,
      base: named(baseName ? this.resolveTypeName(restriction, baseName) : DEFAULT_TYPE_NAME),
      enumerations,
    };
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Compiles an XSD into a reusable type model and its prelude.
 *
 * @param source - XSD text, or an already parsed schema tree.
 * @throws `XsdParseError` if the XSD is malformed or structurally defective.
 * @throws `TypeConflictError` when choice branches bind one tag to two types.
 * @throws `ConfigValidationError` when `options.binding` is invalid.
 */
export function compileSchema(source: string | XmlElement, options: CompileOptions = {}): CompiledSchema {
  const binding = resolveBindingOptions(options.binding ?? {});
  const origin = options.source ?? 'schema';

  let root: XmlElement;
  if (typeof source === 'string') {
    try {
      root = parseXml(source, origin);
    } catch (err) {
      if (err instanceof DocumentParseError) {
        throw new XsdParseError(`Failed to parse XSD XML content from: ${origin}`, err);
      }
      throw err;
    }
  } else {
    root = source;
  }

  if (!isXs(root, 'schema')) {
    throw new XsdParseError(`Invalid XSD: root element <xs:schema> not found in ${origin}`);
  }

  return new SchemaCompiler(root, binding, options.logger ?? silentLogger).compile();
}

/**
 * Reads and compiles an XSD file.
 *
 * @throws `XsdParseError` if the file cannot be read.
 */
export async function compileSchemaFile(xsdPath: string, options: CompileOptions = {}): Promise<CompiledSchema> {
  const absolutePath = resolve(xsdPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new XsdParseError(`Failed to read XSD file: ${absolutePath}`, err);
  }
  return compileSchema(content, { ...options, source: options.source ?? absolutePath });
}
