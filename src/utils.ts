/** Namespace of the XML Schema vocabulary. */
export const XS_NS = 'http://www.w3.org/2001/XMLSchema';
/** Namespace of XHTML, the default pass-through namespace for wildcard content. */
export const XHTML_NS = 'http://www.w3.org/1999/xhtml';

/**
 * Builds the `{namespace}local` key used for every tag and type lookup.
 * Names without a namespace stay bare.
 */
export function qualify(namespace: string | undefined, local: string): string {
  return namespace ? `{${namespace}}${local}` : local;
}

/**
 * Formats a qualified name as an IRI (`namespace#local`).
 */
export function toIri(namespace: string | undefined, local: string): string {
  return namespace ? `${namespace}#${local}` : local;
}

/**
 * Returns `term` unchanged when it is already an IRI reference, else makes it
 * a local one (`#term`).
 */
export function localIri(term: string): string {
  return term.includes('#') ? term : `#${term}`;
}

/** Upper-cases the first code point, astral letters included. */
export function capitalize(word: string): string {
  const first = word.codePointAt(0);
  if (first === undefined) return word;
  const head = String.fromCodePoint(first);
  return head.toUpperCase() + word.slice(head.length);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
