import { localIri } from '../utils.js';

export interface ClassAtom {
  readonly kind: 'class';
  readonly variable: string;
  readonly class: string;
}

export interface ObjectPropertyAtom {
  readonly kind: 'object';
  readonly subject: string;
  readonly predicate: string;
  readonly object: string;
}

export interface DataPropertyAtom {
  readonly kind: 'data';
  readonly subject: string;
  readonly predicate: string;
  readonly object: string;
}

/** Every term of an atom is an IRI reference (`#local` or absolute). */
export type Atom = ClassAtom | ObjectPropertyAtom | DataPropertyAtom;

/**
 * A named implication. Rules are carried to the serializer as data and never
 * evaluated here.
 */
export interface Rule {
  readonly name: string;
  readonly body: readonly Atom[];
  readonly head: readonly Atom[];
}

export function classAtom(variable: string, className: string): ClassAtom {
  return { kind: 'class', variable: localIri(variable), class: localIri(className) };
}

export function objectAtom(subject: string, predicate: string, object: string): Atom {
  return propertyAtom('object', subject, predicate, object);
}

export function dataAtom(subject: string, predicate: string, object: string): Atom {
  return propertyAtom('data', subject, predicate, object);
}

function propertyAtom(kind: 'object' | 'data', subject: string, predicate: string, object: string): Atom {
  // `s a C` reads as a class membership, whichever property kind was asked for
  if (predicate === 'a') return classAtom(subject, object);
  return { kind, subject: localIri(subject), predicate: localIri(predicate), object: localIri(object) };
}

/**
 * Splits a `"subject predicate object"` triple on whitespace.
 */
export function splitTriple(triple: string): [string, string, string] | undefined {
  const parts = triple.trim().split(/\s+/);
  if (parts.length !== 3) return undefined;
  const [subject, predicate, object] = parts;
  return [subject, predicate, object];
}

/**
 * Builds an atom from a triple; see `splitTriple`.
 */
export function tripleAtom(kind: 'object' | 'data', triple: string): Atom {
  const parts = splitTriple(triple);
  if (!parts) {
    throw new Error(`Invalid rule triple "${triple}": expected "subject predicate object"`);
  }
  return propertyAtom(kind, ...parts);
}

function toAtoms(atoms: Atom | readonly Atom[]): readonly Atom[] {
  return 'kind' in atoms ? [atoms] : atoms;
}

export function defineRule(name: string, body: Atom | readonly Atom[], head: Atom | readonly Atom[]): Rule {
  return { name, body: toAtoms(body), head: toAtoms(head) };
}
