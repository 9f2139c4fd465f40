import { publicName } from '../config.js';
import type { BindingOptions } from '../config.js';
import type { Logger } from '../logger.js';
import { OwlClass, RelationAnnotation } from '../owl/entities.js';
import type { PreludeEntry } from '../owl/entities.js';
import { CompilationStateError } from '../validation/errors.js';
import type { TypeRegistry } from './registry.js';
import type {
  AttributeDecl,
  ComplexTypeDef,
  ContentModel,
  ElementDecl,
  SchemaType,
} from './types.js';

export interface PreludeContext {
  registry: TypeRegistry;
  /** Top-level elements. */
  elements: ReadonlyMap<string, ElementDecl>;
  options: BindingOptions;
  logger: Logger;
}

/** Where documentation handed down by an alone wrapper lands. */
type PushTarget =
  | { kind: 'relation'; decl: ElementDecl | AttributeDecl }
  | { kind: 'type'; type: SchemaType };

function nestedElements(content: ContentModel | undefined, into: ElementDecl[]): void {
  if (!content) return;
  switch (content.kind) {
    case 'sequence':
      for (const child of content.children) {
        if (child.kind === 'element') into.push(child);
        else nestedElements(child, into);
      }
      break;
    case 'choice':
      for (const branch of content.branches) {
        if (branch.kind === 'element') into.push(branch);
        else nestedElements(branch, into);
      }
      break;
    case 'extension':
      break;
  }
}

function complexTypes(registry: TypeRegistry): ComplexTypeDef[] {
  return registry.all.filter((type): type is ComplexTypeDef => type.kind === 'complex');
}

class PreludeBuilder {
  private readonly entries: PreludeEntry[] = [];
  private readonly classNames = new Set<string>();
  private readonly skipPush: ReadonlySet<string>;

  constructor(private readonly context: PreludeContext) {
    this.skipPush = new Set(context.options.skipAnnotationPush);
  }

  build(): PreludeEntry[] {
    const { registry, elements } = this.context;
    const nested: ElementDecl[] = [];
    for (const type of complexTypes(registry)) nestedElements(type.content, nested);

    this.pushAnnotations();
    this.declareClasses([...elements.values()], nested);
    this.declareRelations(nested);
    return this.entries;
  }

  // -------------------------------------------------------------------------
  // Annotation push-down
  // -------------------------------------------------------------------------

  private pushAnnotations(): void {
    for (const type of complexTypes(this.context.registry)) {
      if (!type.alone || type.annotations.length === 0 || this.skipPush.has(type.path)) continue;
      const target = this.pushTarget(type);
      if (!target) continue;
      const annotations = type.annotations.splice(0);
      this.deliver(target, annotations, new Set([type]));
    }
  }

  /**
   * The single member of an alone type that survives flattening.
   */
  private pushTarget(type: ComplexTypeDef): PushTarget | undefined {
    const { content, attributes } = type;
    if (!content) {
      const attribute = attributes.length === 1 ? attributes[0] : undefined;
      return attribute ? { kind: 'relation', decl: attribute } : undefined;
    }
    if (attributes.length > 0 || content.kind !== 'sequence') return undefined;
    const only = content.children.length === 1 ? content.children[0] : undefined;
    if (!only || only.kind !== 'element') return undefined;

    const target = this.context.registry.tryResolve(only.type);
    if (!target) return undefined;
    // Only complex and enumerated types are emitted; anything else reads as text on the relation.
    if (target.kind === 'literal' || (target.kind === 'simple' && target.enumerations.size === 0)) {
      return { kind: 'relation', decl: only };
    }
    return { kind: 'type', type: target };
  }

  private deliver(target: PushTarget, annotations: string[], visited: Set<SchemaType>): void {
    if (target.kind === 'relation') {
      target.decl.annotations.push(...annotations);
      return;
    }
    const { type } = target;
    if (type.marked) {
      throw new CompilationStateError(type.name, 'annotations pushed after its class was declared');
    }
    if (type.kind === 'complex' && type.alone && !this.skipPush.has(type.path) && !visited.has(type)) {
      visited.add(type);
      const next = this.pushTarget(type);
      if (next) {
        this.deliver(next, annotations, visited);
        return;
      }
    }
    type.annotations.push(...annotations);
  }

  // -------------------------------------------------------------------------
  // Classes and vocabularies
  // -------------------------------------------------------------------------

  private declareClass(name: string, type: SchemaType, extra: readonly string[] = []): void {
    type.marked = true;
    if (this.classNames.has(name)) return;
    this.classNames.add(name);
    this.entries.push(new OwlClass(name, [...extra, ...type.annotations]));
  }

  private declareClasses(topLevel: readonly ElementDecl[], nested: readonly ElementDecl[]): void {
    const { registry, options } = this.context;

    for (const element of topLevel) {
      const type = registry.tryResolve(element.type);
      if (type?.kind === 'complex') {
        this.declareClass(publicName(options, element.name), type, element.annotations);
      }
    }
    for (const element of nested) {
      const type = registry.tryResolve(element.type);
      if (type?.kind === 'complex' && !type.alone) {
        this.declareClass(publicName(options, element.name), type);
      }
    }
    for (const type of complexTypes(registry)) {
      if (!type.alone && !type.marked) this.declareClass(type.localName, type);
    }

    for (const type of registry.all) {
      if (type.kind !== 'simple' || type.enumerations.size === 0) continue;
      this.declareClass(type.localName, type);
      for (const enumeration of type.enumerations.values()) {
        this.entries.push(enumeration.declaration);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Relation annotations
  // -------------------------------------------------------------------------

  private declareRelations(nested: readonly ElementDecl[]): void {
    const { registry, options } = this.context;
    const relations = new Map<string, string[]>();
    const add = (relation: string, annotations: readonly string[]): void => {
      if (annotations.length === 0) return;
      const list = relations.get(relation) ?? [];
      for (const annotation of annotations) {
        if (!list.includes(annotation)) list.push(annotation);
      }
      relations.set(relation, list);
    };

    for (const element of nested) {
      const type = registry.tryResolve(element.type);
      // Alone wrappers that kept their documentation describe the relation.
      const kept = type?.kind === 'complex' && type.alone ? type.annotations : [];
      add(publicName(options, element.name), [...element.annotations, ...kept]);
    }
    for (const type of complexTypes(registry)) {
      const attributes = type.content?.kind === 'extension'
        ? [...type.attributes, ...type.content.attributes]
        : type.attributes;
      for (const attribute of attributes) add(attribute.name, attribute.annotations);
    }

    for (const [relation, annotations] of relations) {
      this.entries.push(new RelationAnnotation(relation, annotations));
    }
    this.context.logger.debug(
      `Prelude: ${this.classNames.size} class(es), ${relations.size} annotated relation(s)`,
    );
  }
}

/**
 * Builds the entries shared by every document of a schema: pushes the
 * documentation of flattened types down to what survives them, declares one
 * class per class-bearing type, the vocabulary individuals, and the
 * documentation of relations. Marks every type that received a class.
 *
 * Runs once, before the registry is sealed.
 */
export function initializePrelude(context: PreludeContext): PreludeEntry[] {
  return new PreludeBuilder(context).build();
}
