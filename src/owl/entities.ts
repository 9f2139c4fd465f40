import { DEFAULT_NAMING } from '../config.js';
import type { NamingConfig } from '../config.js';
import { Literal } from './literal.js';
import { slugify } from './slug.js';

/**
 * Attribute of the assertion produced by extension and wildcard parsing; the
 * owning element replaces it with its own name when it flattens the value.
 */
export const VALUE_PLACEHOLDER = '@@value';

export type AssertionValue = Literal | Individual;

/**
 * An assertion whose subject is the individual holding it.
 */
export class Has {
  constructor(
    public readonly attribute: string,
    public readonly value: AssertionValue | readonly AssertionValue[],
  ) {}

  get values(): readonly AssertionValue[] {
    return this.value instanceof Literal || this.value instanceof Individual ? [this.value] : this.value;
  }

  get isPlaceholder(): boolean {
    return this.attribute === VALUE_PLACEHOLDER;
  }
}

export interface IndividualInit {
  assertions?: readonly Has[];
  type?: string;
  annotations?: readonly string[];
  /** Kept in the graph but never serialized. */
  ignore?: boolean;
  naming?: NamingConfig;
}

/**
 * A node of the entity graph.
 *
 * Its identity is resolved lazily, the first time `slug()` is called:
 * `<type alias>-<id>` when an id attribute is asserted, otherwise a slug of
 * the type and display name.
 */
export class Individual {
  readonly fallbackName: string;
  readonly type: string | undefined;
  readonly assertions: readonly Has[];
  readonly annotations: readonly string[];
  readonly ignore: boolean;
  private readonly naming: NamingConfig;
  private resolvedSlug: string | undefined;

  constructor(fallbackName: string, init: IndividualInit = {}) {
    this.fallbackName = fallbackName;
    this.type = init.type;
    this.assertions = init.assertions ?? [];
    this.annotations = init.annotations ?? [];
    this.ignore = init.ignore ?? false;
    this.naming = init.naming ?? DEFAULT_NAMING;
  }

  /** Lexical value of the highest-priority id attribute, if any. */
  get id(): string | undefined {
    for (const attribute of this.naming.idAttributes) {
      for (const assertion of this.assertions) {
        if (assertion.attribute === attribute && assertion.value instanceof Literal) {
          return assertion.value.lexical;
        }
      }
    }
    return undefined;
  }

  /** Human-readable name, also used as the `rdfs:label`. */
  get name(): string {
    for (const attribute of this.naming.nameAttributes) {
      for (const assertion of this.assertions) {
        if (assertion.attribute !== attribute) continue;
        if (assertion.value instanceof Literal) return assertion.value.lexical;
        if (assertion.value instanceof Individual) return assertion.value.name;
      }
    }
    return this.fallbackName;
  }

  slug(): string {
    if (this.resolvedSlug === undefined) {
      const id = this.id;
      if (id !== undefined) {
        const type = this.type ?? '';
        this.resolvedSlug = `${this.naming.typeAliases[type] ?? type}-${id}`;
      } else {
        this.resolvedSlug = slugify(`${this.type ?? ''}${this.name}`, 'individual');
      }
    }
    return this.resolvedSlug;
  }
}

/**
 * An OWL class declaration.
 */
export class OwlClass {
  constructor(
    public readonly name: string,
    public readonly annotations: readonly string[] = [],
  ) {}

  slug(): string {
    return slugify(this.name);
  }
}

/**
 * Documentation attached to a relation (object or data property).
 */
export class RelationAnnotation {
  constructor(
    public readonly relation: string,
    public readonly annotations: readonly string[],
  ) {}

  slug(): string {
    return slugify(this.relation, 'property');
  }
}

export type PreludeEntry = OwlClass | Individual | RelationAnnotation;

/** The value of a parsed document: an individual, a literal, or flattened assertions. */
export type DocumentValue = Individual | Literal | readonly Has[];

export type OntologyEntry = PreludeEntry | DocumentValue;
