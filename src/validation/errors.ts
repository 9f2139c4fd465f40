/**
 * Represents a single validation issue found in a configuration object.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Thrown when binding options or a dataset profile fail validation.
 */
export class ConfigValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => `  [${i.path}] ${i.message}`).join('\n');
    super(`Invalid xsd2owl configuration:\n${summary}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

/**
 * Thrown when a document node cannot be mapped onto the schema
 * (e.g. a child tag absent from its parent's content model).
 */
export class XsdMappingError extends Error {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`XSD mapping error at [${path}]: ${message}`);
    this.name = 'XsdMappingError';
    this.path = path;
    Object.setPrototypeOf(this, XsdMappingError.prototype);
  }
}

/**
 * Thrown when the XSD cannot be read or parsed, or declares a structure the
 * compiler rejects.
 */
export class XsdParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'XsdParseError';
    Object.setPrototypeOf(this, XsdParseError.prototype);
  }
}

/**
 * Thrown when a data document cannot be read or is not well-formed XML.
 */
export class DocumentParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DocumentParseError';
    Object.setPrototypeOf(this, DocumentParseError.prototype);
  }
}

/**
 * Thrown when a literal node carries no text. Extension parsing treats it as
 * "no base value"; everywhere else it aborts the document.
 */
export class EmptyValueError extends Error {
  public readonly path: string;

  constructor(path: string) {
    super(`Empty value at [${path}]`);
    this.name = 'EmptyValueError';
    this.path = path;
    Object.setPrototypeOf(this, EmptyValueError.prototype);
  }
}

/**
 * Thrown when a value does not belong to the enumeration of its simple type.
 */
export class UnknownVocabularyValueError extends Error {
  public readonly value: string;
  public readonly typeName: string;
  public readonly path: string;

  constructor(value: string, typeName: string, path: string) {
    super(`Value "${value}" at [${path}] is not part of the "${typeName}" vocabulary`);
    this.name = 'UnknownVocabularyValueError';
    this.value = value;
    this.typeName = typeName;
    this.path = path;
    Object.setPrototypeOf(this, UnknownVocabularyValueError.prototype);
  }
}

/**
 * Thrown at compile time when two choice branches bind the same tag to
 * different types.
 */
export class TypeConflictError extends Error {
  public readonly tag: string;

  constructor(tag: string, first: string, second: string) {
    super(`Choice branches bind <${tag}> to conflicting types "${first}" and "${second}"`);
    this.name = 'TypeConflictError';
    this.tag = tag;
    Object.setPrototypeOf(this, TypeConflictError.prototype);
  }
}

/**
 * Thrown when a type name is absent from the registry.
 */
export class UnresolvedReferenceError extends Error {
  public readonly reference: string;

  constructor(reference: string) {
    super(`Type "${reference}" is not declared in the schema`);
    this.name = 'UnresolvedReferenceError';
    this.reference = reference;
    Object.setPrototypeOf(this, UnresolvedReferenceError.prototype);
  }
}

/**
 * Thrown when wildcard content lives in a namespace the schema does not
 * accept or that cannot be passed through.
 */
export class UnexpectedNamespaceError extends Error {
  public readonly namespace: string | undefined;
  public readonly path: string;

  constructor(namespace: string | undefined, path: string, detail: string) {
    super(`Unexpected namespace "${namespace ?? ''}" at [${path}]: ${detail}`);
    this.name = 'UnexpectedNamespaceError';
    this.namespace = namespace;
    this.path = path;
    Object.setPrototypeOf(this, UnexpectedNamespaceError.prototype);
  }
}

/**
 * Thrown when a value does not match the lexical rule of its literal type.
 */
export class InvalidLiteralError extends Error {
  public readonly value: string;
  public readonly datatype: string;

  constructor(value: string, datatype: string, path?: string) {
    super(`Invalid ${datatype} literal "${value}"${path ? ` at [${path}]` : ''}`);
    this.name = 'InvalidLiteralError';
    this.value = value;
    this.datatype = datatype;
    Object.setPrototypeOf(this, InvalidLiteralError.prototype);
  }
}

/**
 * Thrown when compile-time bookkeeping touches a type that has already been
 * declared in the prelude.
 */
export class CompilationStateError extends Error {
  public readonly typeName: string;

  constructor(typeName: string, message: string) {
    super(`Type "${typeName}": ${message}`);
    this.name = 'CompilationStateError';
    this.typeName = typeName;
    Object.setPrototypeOf(this, CompilationStateError.prototype);
  }
}
