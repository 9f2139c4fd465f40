import type { Individual, PreludeEntry } from '../owl/entities.js';
import type { LiteralRule } from '../owl/literal.js';
import type { BindingOptions } from '../config.js';
import type { TypeRegistry } from './registry.js';

/** Index of a type record in the registry arena. */
export type TypeHandle = number;

/**
 * Reference from a declaration to its type. Named references are resolved
 * through the registry on first use, which makes declaration order and
 * mutual references irrelevant.
 */
export type TypeRef =
  | { readonly kind: 'named'; readonly name: string }
  | { readonly kind: 'inline'; readonly handle: TypeHandle };

interface TypeRecordBase {
  /** Qualified name for named types, the type path for inline ones. */
  readonly name: string;
  /** Local name for named types, `Owner/element/...` for inline ones. */
  readonly path: string;
  /** Flattens into its owner instead of producing an individual. */
  readonly alone: boolean;
  /** Set once the type's class has been declared in the prelude. */
  marked: boolean;
  /** Documentation; grows during annotation push-down only. */
  readonly annotations: string[];
}

/**
 * A built-in XSD datatype.
 */
export interface LiteralTypeDef extends TypeRecordBase {
  readonly kind: 'literal';
  readonly rule: LiteralRule;
  /** Datatype IRI recorded on parsed text literals. */
  readonly datatype: string;
}

export interface EnumerationDef {
  readonly value: string;
  readonly annotations: string[];
  /** Declared once in the prelude. */
  readonly declaration: Individual;
  /** Returned by every lookup of `value`; never serialized itself. */
  readonly reference: Individual;
}

/**
 * xs:simpleType — a finite vocabulary. A restriction without enumerations
 * delegates to its base.
 */
export interface SimpleTypeDef extends TypeRecordBase {
  readonly kind: 'simple';
  /** Public name of the vocabulary's individuals and class. */
  readonly localName: string;
  readonly base?: TypeRef;
  readonly enumerations: ReadonlyMap<string, EnumerationDef>;
}

/**
 * xs:complexType
 */
export interface ComplexTypeDef extends TypeRecordBase {
  readonly kind: 'complex';
  readonly localName: string;
  readonly attributes: readonly AttributeDecl[];
  readonly content?: ContentModel;
}

export type SchemaType = LiteralTypeDef | SimpleTypeDef | ComplexTypeDef;

export interface ElementDecl {
  readonly kind: 'element';
  readonly name: string;
  /** Key matched against document tags. */
  readonly qname: string;
  readonly type: TypeRef;
  readonly minOccurs: number;
  readonly maxOccurs: number | 'unbounded';
  readonly annotations: string[];
}

export interface AttributeDecl {
  readonly name: string;
  readonly type: TypeRef;
  readonly required: boolean;
  readonly annotations: string[];
}

/**
 * xs:any. `namespace` keeps the raw constraint (`##any`, `##other`, a URI list...).
 */
export interface WildcardDecl {
  readonly namespace: string;
  readonly minOccurs: number;
  readonly maxOccurs: number | 'unbounded';
}

export interface SequenceModel {
  readonly kind: 'sequence';
  readonly children: readonly (ElementDecl | ChoiceModel)[];
  /** Tag → element, nested choices merged in. */
  readonly names: ReadonlyMap<string, ElementDecl>;
  /** Exclusive with `children`. */
  readonly wildcard?: WildcardDecl;
  readonly alone: boolean;
}

export interface ChoiceModel {
  readonly kind: 'choice';
  readonly branches: readonly (ElementDecl | SequenceModel | ChoiceModel)[];
  readonly names: ReadonlyMap<string, ElementDecl>;
  readonly alone: false;
}

export interface ExtensionModel {
  readonly kind: 'extension';
  readonly base: TypeRef;
  readonly attributes: readonly AttributeDecl[];
  readonly alone: false;
}

export type ContentModel = SequenceModel | ChoiceModel | ExtensionModel;

/**
 * The output of schema compilation. Read-only once returned.
 */
export interface CompiledSchema {
  readonly targetNamespace?: string;
  /** Top-level elements keyed by qualified name. */
  readonly elements: ReadonlyMap<string, ElementDecl>;
  readonly types: TypeRegistry;
  readonly prelude: readonly PreludeEntry[];
  readonly options: BindingOptions;
}
