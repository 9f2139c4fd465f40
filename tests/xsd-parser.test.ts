import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import type { Logger } from '../src/logger.js';
import { compileSchema, compileSchemaFile } from '../src/xsd/parser.js';
import type { SchemaType } from '../src/xsd/types.js';
import { DocumentParseError, TypeConflictError, XsdParseError } from '../src/validation/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const fixturesDir = resolve(__dirname, 'fixtures');

const CAT = '{urn:example:catalog}';
const XS = '{http://www.w3.org/2001/XMLSchema}';

function xsd(body: string, attributes = ''): string {
  return `<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema" ${attributes}>${body}</xs:schema>`;
}

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: () => undefined,
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
  };
}

function complex(type: SchemaType | undefined) {
  if (type?.kind !== 'complex') throw new Error(`expected a complex type, got ${type?.kind}`);
  return type;
}

describe('compileSchemaFile', () => {
  it('indexes top-level elements by qualified name', async () => {
    const schema = await compileSchemaFile(resolve(fixturesDir, 'catalog.xsd'));

    expect(schema.targetNamespace).toBe('urn:example:catalog');
    expect([...schema.elements.keys()]).toEqual([`${CAT}Catalog`]);
    expect(schema.types.isSealed).toBe(true);
  });

  it('builds sequences with qualified local names and occurrence bounds', async () => {
    const schema = await compileSchemaFile(resolve(fixturesDir, 'catalog.xsd'));
    const entry = complex(schema.types.lookup(`${CAT}EntryType`));

    expect(entry.alone).toBe(false);
    expect(entry.attributes.map((attribute) => [attribute.name, attribute.required])).toEqual([
      ['ID', true],
      ['Name', true],
    ]);
    expect(entry.content?.kind).toBe('sequence');
    if (entry.content?.kind !== 'sequence') return;
    expect([...entry.content.names.keys()]).toEqual([
      `${CAT}Description`,
      `${CAT}Severity`,
      `${CAT}Published`,
      `${CAT}Related`,
      `${CAT}Reference`,
      `${CAT}Notes`,
    ]);
    const related = entry.content.names.get(`${CAT}Related`);
    expect(related?.minOccurs).toBe(0);
    expect(related?.maxOccurs).toBe('unbounded');
    expect(related?.annotations).toEqual(['Link to another entry.']);
    expect(related?.type).toEqual({ kind: 'named', name: `${CAT}RelatedType` });
  });

  it('flags flattening types', async () => {
    const schema = await compileSchemaFile(resolve(fixturesDir, 'catalog.xsd'));
    const alone = (name: string) => schema.types.lookup(`${CAT}${name}`)?.alone;

    expect(alone('EntriesType')).toBe(true);
    expect(alone('StructuredText')).toBe(true);
    expect(alone('NotesType')).toBe(true);
    expect(alone('RelatedType')).toBe(false);
    expect(alone('ReferenceType')).toBe(false);
  });

  it('reads enumerations and extensions', async () => {
    const schema = await compileSchemaFile(resolve(fixturesDir, 'catalog.xsd'));
    const severity = schema.types.lookup(`${CAT}SeverityEnumeration`);
    expect(severity?.kind).toBe('simple');
    if (severity?.kind !== 'simple') return;
    expect([...severity.enumerations.keys()]).toEqual(['Low', 'High']);
    expect(severity.enumerations.get('Low')?.annotations).toEqual(['Hardly exploitable.']);

    const reference = complex(schema.types.lookup(`${CAT}ReferenceType`));
    expect(reference.content).toMatchObject({
      kind: 'extension',
      base: { kind: 'named', name: `${XS}anyURI` },
    });
  });

  it('resolves unprefixed type references against the default namespace', async () => {
    const schema = await compileSchemaFile(resolve(fixturesDir, 'vulnerabilities.xsd'));
    const root = schema.elements.get('{urn:example:vulnerabilities}cve');
    const rootType = complex(root ? schema.types.resolve(root.type) : undefined);
    if (rootType.content?.kind !== 'sequence') throw new Error('expected a sequence');
    const item = rootType.content.names.get('{urn:example:vulnerabilities}item');
    expect(item?.type).toEqual({ kind: 'named', name: '{urn:example:vulnerabilities}itemType' });
  });

  it('throws XsdParseError for a missing file', async () => {
    await expect(compileSchemaFile(resolve(fixturesDir, 'missing.xsd'))).rejects.toThrow(XsdParseError);
  });
});

describe('compileSchema', () => {
  it('accepts the same text as the file variant', () => {
    const text = readFileSync(resolve(fixturesDir, 'catalog.xsd'), 'utf-8');
    expect(compileSchema(text).elements.size).toBe(1);
  });

  it('leaves local elements unqualified by default', () => {
    const schema = compileSchema(
      xsd(
        `<xs:element name="Root"><xs:complexType><xs:sequence>
           <xs:element name="Child" type="xs:string"/>
         </xs:sequence></xs:complexType></xs:element>`,
        'targetNamespace="urn:t"',
      ),
    );
    const root = schema.elements.get('{urn:t}Root');
    const type = complex(root ? schema.types.resolve(root.type) : undefined);
    if (type.content?.kind !== 'sequence') throw new Error('expected a sequence');
    expect([...type.content.names.keys()]).toEqual(['Child']);
  });

  it('names inline types after their path', () => {
    const schema = compileSchema(
      xsd(`<xs:complexType name="Flow"><xs:sequence>
             <xs:element name="Step"><xs:complexType><xs:sequence>
               <xs:element name="Technique"><xs:complexType>
                 <xs:attribute name="a"/><xs:attribute name="b"/>
               </xs:complexType></xs:element>
             </xs:sequence></xs:complexType></xs:element>
           </xs:sequence></xs:complexType>`),
      { binding: { forceAlone: ['Flow/Step/Technique'] } },
    );
    const technique = schema.types.all.find((type) => type.path === 'Flow/Step/Technique');
    expect(technique?.kind).toBe('complex');
    expect(technique?.alone).toBe(true);
  });

  it('merges nested choice tables into the sequence table', () => {
    const schema = compileSchema(
      xsd(`<xs:complexType name="T"><xs:sequence>
             <xs:element name="A" type="xs:string"/>
             <xs:choice><xs:element name="B" type="xs:string"/><xs:element name="C" type="xs:integer"/></xs:choice>
           </xs:sequence></xs:complexType>`),
    );
    const type = complex(schema.types.lookup('T'));
    if (type.content?.kind !== 'sequence') throw new Error('expected a sequence');
    expect([...type.content.names.keys()]).toEqual(['A', 'B', 'C']);
    expect(type.content.alone).toBe(false);
  });

  it('raises TypeConflict when choice branches disagree on a tag', () => {
    const text = xsd(`<xs:complexType name="T"><xs:choice>
        <xs:element name="A" type="xs:string"/>
        <xs:sequence><xs:element name="A" type="xs:integer"/></xs:sequence>
      </xs:choice></xs:complexType>`);
    expect(() => compileSchema(text)).toThrow(TypeConflictError);
  });

  it('allows a tag to repeat with the same type', () => {
    const text = xsd(`<xs:complexType name="T"><xs:choice>
        <xs:element name="A" type="xs:string"/>
        <xs:sequence><xs:element name="A" type="xs:string"/><xs:element name="B"/></xs:sequence>
      </xs:choice></xs:complexType>`);
    expect(() => compileSchema(text)).not.toThrow();
  });

  it('rejects a wildcard mixed with named children', () => {
    const text = xsd(`<xs:complexType name="T"><xs:sequence>
        <xs:element name="A"/><xs:any namespace="##any"/>
      </xs:sequence></xs:complexType>`);
    expect(() => compileSchema(text)).toThrow(/mixes xs:any with named children/);
  });

  it('rejects documents that are not schemas', () => {
    expect(() => compileSchema('<root/>')).toThrow('Invalid XSD: root element <xs:schema> not found in schema');
  });

  it('wraps malformed XML in XsdParseError', () => {
    try {
      compileSchema('<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">', { source: 'broken.xsd' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(XsdParseError);
      if (!(err instanceof XsdParseError)) return;
      expect(err.message).toBe('Failed to parse XSD XML content from: broken.xsd');
      expect(err.cause).toBeInstanceOf(DocumentParseError);
    }
  });

  it('warns about skipped constructs', () => {
    const logger = recordingLogger();
    compileSchema(xsd('<xs:import namespace="urn:other"/><xs:group name="G"/>'), { logger });
    expect(logger.lines).toEqual([
      'warn: <xs:import> is not supported and was skipped',
      'warn: <xs:group> is not supported and was skipped',
    ]);
  });

  it('keeps the first definition of a duplicated type', () => {
    const logger = recordingLogger();
    const schema = compileSchema(
      xsd('<xs:complexType name="T"><xs:attribute name="a"/></xs:complexType><xs:complexType name="T"/>'),
      { logger },
    );
    expect(complex(schema.types.lookup('T')).attributes).toHaveLength(1);
    expect(logger.lines).toEqual(['warn: Type "T" is already defined; keeping the first definition']);
  });
});
