import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { profileRules } from './config.js';
import type { BindingOptionsInput, ProfileConfig } from './config.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { OntologyEntry } from './owl/entities.js';
import type { Rule } from './owl/rules.js';
import { DocumentParseError } from './validation/errors.js';
import { buildOntology } from './xml/builder.js';
import { compileSchema, compileSchemaFile } from './xsd/parser.js';
import type { CompiledSchema } from './xsd/types.js';
import { parseDocument } from './xsd/walker.js';

// Re-export for external typing convenience
export type { CompiledSchema } from './xsd/types.js';

export const DEFAULT_ONTOLOGY_IRI = 'http://example.org/ontology';

/**
 * Options for `convertXsdToOwl` and `convertFilesToOwl`.
 */
export interface ConverterOptions {
  /**
   * Dataset profile supplying binding options, ontology IRI and rules.
   * The explicit options below take precedence over it.
   */
  profile?: ProfileConfig;
  /** Binding options; replace the profile's when given. */
  binding?: BindingOptionsInput;
  /**
   * Ontology IRI, also written as `xml:base`.
   * @default the profile's IRI, else `DEFAULT_ONTOLOGY_IRI`
   */
  iri?: string;
  /** Rules appended after the profile's. */
  rules?: readonly Rule[];
  /**
   * Whether to pretty-print the output (indentation + newlines).
   * @default false
   */
  prettyPrint?: boolean;
  /**
   * Whether to include an XML declaration.
   * @default true
   */
  xmlDeclaration?: boolean;
  /** Receives compiler warnings and progress. Silent by default. */
  logger?: Logger;
}

/** A data document and the name used for it in error messages. */
export interface NamedDocument {
  source: string;
  content: string;
}

/**
 * The prelude of `schema` followed by the value of every document, in order.
 */
export function buildGraph(schema: CompiledSchema, documents: readonly NamedDocument[], logger: Logger = silentLogger): OntologyEntry[] {
  const entries: OntologyEntry[] = [...schema.prelude];
  for (const document of documents) {
    logger.debug(`Parsing ${document.source}`);
    entries.push(parseDocument(schema, document.content, document.source));
  }
  return entries;
}

function serialize(schema: CompiledSchema, documents: readonly NamedDocument[], options: ConverterOptions): string {
  const { profile, prettyPrint = false, xmlDeclaration = true, logger = silentLogger } = options;
  const rules = [...(profile ? profileRules(profile) : []), ...(options.rules ?? [])];
  const entries = buildGraph(schema, documents, logger);
  logger.debug(`Serializing ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'} and ${rules.length} rule(s)`);
  return buildOntology(
    { iri: options.iri ?? profile?.iri ?? DEFAULT_ONTOLOGY_IRI, entries, rules },
    { prettyPrint, xmlDeclaration },
  );
}

/**
 * Compiles an XSD, parses every document against it and returns the
 * resulting OWL/XML ontology.
 *
 * @param xsd        - The XSD text.
 * @param documents  - XML documents conforming to the schema.
 *
 * @throws `XsdParseError`      if the XSD cannot be parsed.
 * @throws `DocumentParseError` if a document is not well-formed.
 * @throws `XsdMappingError`    if a document does not match the schema.
 *
 * @example
 * ```typescript
 * import { convertXsdToOwl } from 'xsd2owl';
 *
 * const owl = convertXsdToOwl(xsd, ['<Item id="42"/>'], { prettyPrint: true });
 * ```
 */
export function convertXsdToOwl(xsd: string, documents: readonly string[], options: ConverterOptions = {}): string {
  const schema = compileSchema(xsd, { binding: options.binding ?? options.profile, logger: options.logger });
  return serialize(
    schema,
    documents.map((content, index) => ({ source: `document #${index + 1}`, content })),
    options,
  );
}

/**
 * File-based variant of `convertXsdToOwl`.
 *
 * @throws `XsdParseError`      if the XSD file cannot be read or parsed.
 * @throws `DocumentParseError` if a data file cannot be read or is malformed.
 */
export async function convertFilesToOwl(
  xsdPath: string,
  dataPaths: readonly string[],
  options: ConverterOptions = {},
): Promise<string> {
  const schema = await compileSchemaFile(xsdPath, {
    binding: options.binding ?? options.profile,
    logger: options.logger,
  });

  const documents: NamedDocument[] = [];
  for (const dataPath of dataPaths) {
    const absolutePath = resolve(dataPath);
    try {
      documents.push({ source: absolutePath, content: await readFile(absolutePath, 'utf-8') });
    } catch (err) {
      throw new DocumentParseError(`Failed to read data file: ${absolutePath}`, err);
    }
  }
  return serialize(schema, documents, options);
}
