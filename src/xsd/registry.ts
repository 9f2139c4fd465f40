import { XSD_DATE, XSD_INTEGER } from '../owl/literal.js';
import type { LiteralRule } from '../owl/literal.js';
import { qualify, toIri, XS_NS } from '../utils.js';
import { CompilationStateError, UnresolvedReferenceError } from '../validation/errors.js';
import type { SchemaType, TypeHandle, TypeRef } from './types.js';

// Built-in XSD datatypes, by local name.
const BUILTIN_RULES: Readonly<Record<string, LiteralRule>> = {
  string: 'text',
  normalizedString: 'text',
  token: 'text',
  anyURI: 'text',
  language: 'text',
  Name: 'text',
  NCName: 'text',
  NMTOKEN: 'text',
  ID: 'text',
  IDREF: 'text',
  boolean: 'text',
  decimal: 'text',
  double: 'text',
  float: 'text',
  time: 'text',
  dateTime: 'text',
  duration: 'text',
  date: 'date',
  integer: 'integer',
  int: 'integer',
  long: 'integer',
  short: 'integer',
  byte: 'integer',
  nonNegativeInteger: 'integer',
  positiveInteger: 'integer',
  negativeInteger: 'integer',
  nonPositiveInteger: 'integer',
  unsignedInt: 'integer',
  unsignedLong: 'integer',
  unsignedShort: 'integer',
  unsignedByte: 'integer',
  gYear: 'integer',
  gMonth: 'dateFragment',
  gDay: 'dateFragment',
};

/** Qualified name of the type used when a declaration names none. */
export const DEFAULT_TYPE_NAME = qualify(XS_NS, 'string');

function datatypeFor(local: string, rule: LiteralRule): string {
  switch (rule) {
    case 'text':
      return toIri(XS_NS, local);
    case 'date':
      return XSD_DATE;
    case 'integer':
    case 'dateFragment':
      return XSD_INTEGER;
  }
}

/**
 * Arena of every type of a schema, built-ins included. Named types are also
 * indexed by qualified name; inline types are only reachable by handle.
 *
 * The registry is sealed once compilation finishes and is read-only from then on.
 */
export class TypeRegistry {
  private readonly records: SchemaType[] = [];
  private readonly byName = new Map<string, TypeHandle>();
  private sealed = false;

  constructor() {
    for (const [local, rule] of Object.entries(BUILTIN_RULES)) {
      const name = qualify(XS_NS, local);
      this.byName.set(name, this.push({
        kind: 'literal',
        name,
        path: local,
        alone: false,
        marked: false,
        annotations: [],
        rule,
        datatype: datatypeFor(local, rule),
      }));
    }
  }

  /**
   * Registers a named type. Returns `false` (and keeps the existing type)
   * when the name is taken, which protects the built-ins.
   */
  define(type: SchemaType): boolean {
    this.assertOpen(type.name);
    if (this.byName.has(type.name)) return false;
    this.byName.set(type.name, this.push(type));
    return true;
  }

  /**
   * Registers an anonymous type and returns a reference to it.
   */
  defineInline(type: SchemaType): TypeRef {
    this.assertOpen(type.name);
    return { kind: 'inline', handle: this.push(type) };
  }

  lookup(name: string): SchemaType | undefined {
    const handle = this.byName.get(name);
    return handle === undefined ? undefined : this.records[handle];
  }

  tryResolve(ref: TypeRef): SchemaType | undefined {
    return ref.kind === 'named' ? this.lookup(ref.name) : this.records[ref.handle];
  }

  /**
   * @throws `UnresolvedReferenceError` when a named reference is not declared.
   */
  resolve(ref: TypeRef): SchemaType {
    const type = this.tryResolve(ref);
    if (!type) {
      throw new UnresolvedReferenceError(ref.kind === 'named' ? ref.name : `#${ref.handle}`);
    }
    return type;
  }

  /** Every type in registration order, built-ins first. */
  get all(): readonly SchemaType[] {
    return this.records;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  seal(): void {
    this.sealed = true;
  }

  private assertOpen(name: string): void {
    if (this.sealed) throw new CompilationStateError(name, 'registry is sealed');
  }

  private push(type: SchemaType): TypeHandle {
    this.records.push(type);
    return this.records.length - 1;
  }
}

/**
 * True when both references denote the same type.
 */
export function sameTypeRef(a: TypeRef, b: TypeRef): boolean {
  if (a.kind === 'named' && b.kind === 'named') return a.name === b.name;
  if (a.kind === 'inline' && b.kind === 'inline') return a.handle === b.handle;
  return false;
}

export function describeTypeRef(ref: TypeRef, registry: TypeRegistry): string {
  return ref.kind === 'named' ? ref.name : registry.tryResolve(ref)?.name ?? `#${ref.handle}`;
}
