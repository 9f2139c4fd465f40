export { convertXsdToOwl, convertFilesToOwl, buildGraph, DEFAULT_ONTOLOGY_IRI } from './converter.js';
export type { ConverterOptions, NamedDocument, CompiledSchema } from './converter.js';

export { compileSchema, compileSchemaFile } from './xsd/parser.js';
export type { CompileOptions } from './xsd/parser.js';
export { InstanceWalker, parse, parseDocument } from './xsd/walker.js';
export { TypeRegistry } from './xsd/registry.js';
export type * from './xsd/types.js';

export { Has, Individual, OwlClass, RelationAnnotation, VALUE_PLACEHOLDER } from './owl/entities.js';
export type { AssertionValue, DocumentValue, IndividualInit, OntologyEntry, PreludeEntry } from './owl/entities.js';
export { Literal, TextLiteral, DateLiteral, IntegerLiteral, parseLiteral } from './owl/literal.js';
export type { LiteralKind, LiteralRule, CalendarDate } from './owl/literal.js';
export { slugify } from './owl/slug.js';
export type { SlugRole } from './owl/slug.js';
export { classAtom, objectAtom, dataAtom, defineRule } from './owl/rules.js';
export type { Atom, ClassAtom, ObjectPropertyAtom, DataPropertyAtom, Rule } from './owl/rules.js';

export { buildOntology } from './xml/builder.js';
export type { OntologyInput, OntologyBuildOptions } from './xml/builder.js';
export { parseXml } from './xml/tree.js';
export type { XmlElement } from './xml/tree.js';

export { resolveBindingOptions, resolveProfile, profileRules } from './config.js';
export type { BindingOptions, BindingOptionsInput, NamingConfig, ProfileConfig, ProfileInput } from './config.js';
export { loadProfile, loadProfileFile, loadBindingOptionsFile, PROFILE_NAMES } from './profiles.js';
export type { ProfileName } from './profiles.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

export {
  CompilationStateError,
  ConfigValidationError,
  DocumentParseError,
  EmptyValueError,
  InvalidLiteralError,
  TypeConflictError,
  UnexpectedNamespaceError,
  UnknownVocabularyValueError,
  UnresolvedReferenceError,
  XsdMappingError,
  XsdParseError,
} from './validation/errors.js';
export type { ValidationIssue } from './validation/errors.js';
