import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { buildGraph, convertFilesToOwl, convertXsdToOwl, DEFAULT_ONTOLOGY_IRI } from '../src/converter.js';
import type { Logger } from '../src/logger.js';
import { Individual, OwlClass } from '../src/owl/entities.js';
import { classAtom, defineRule, objectAtom } from '../src/owl/rules.js';
import { loadProfile } from '../src/profiles.js';
import { DocumentParseError, XsdMappingError } from '../src/validation/errors.js';
import { parseXml } from '../src/xml/tree.js';
import type { XmlElement } from '../src/xml/tree.js';
import { compileSchema } from '../src/xsd/parser.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const fixturesDir = resolve(__dirname, 'fixtures');
const fixture = (name: string) => resolve(fixturesDir, name);
const catalogXsd = readFileSync(fixture('catalog.xsd'), 'utf-8');
const catalogXml = readFileSync(fixture('catalog.xml'), 'utf-8');

function declarations(root: XmlElement): string[] {
  return root.children
    .filter((child) => child.local === 'Declaration')
    .map((declaration) => {
      const [entity] = declaration.children;
      return `${entity.local} ${entity.attributes.get('IRI') ?? ''}`;
    });
}

function count(root: XmlElement, local: string): number {
  return root.children.filter((child) => child.local === local).length;
}

describe('convertFilesToOwl', () => {
  it('converts a dataset with its profile', async () => {
    const owl = await convertFilesToOwl(fixture('vulnerabilities.xsd'), [fixture('vulnerabilities.xml')], {
      profile: await loadProfile('cve'),
    });
    const root = parseXml(owl);

    expect(root.attributes.get('ontologyIRI')).toBe('https://ontology.example.org/cve');
    expect(declarations(root)).toEqual([
      'Class #Cve',
      'Class #Vulnerability',
      'NamedIndividual #indCvecve1',
      'NamedIndividual #CVE-1999-0001',
    ]);
    expect(count(root, 'DLSafeRule')).toBe(1);
  });

  it('lets an explicit IRI win over the profile', async () => {
    const owl = await convertFilesToOwl(fixture('vulnerabilities.xsd'), [fixture('vulnerabilities.xml')], {
      profile: await loadProfile('cve'),
      iri: 'urn:override',
    });
    expect(parseXml(owl).attributes.get('xml:base')).toBe('urn:override');
  });

  it('reports unreadable data files', async () => {
    await expect(convertFilesToOwl(fixture('catalog.xsd'), [fixture('missing.xml')])).rejects.toThrow(
      `Failed to read data file: ${fixture('missing.xml')}`,
    );
  });
});

describe('convertXsdToOwl', () => {
  it('writes the prelude before the documents', () => {
    const root = parseXml(convertXsdToOwl(catalogXsd, [catalogXml]));

    expect(root.attributes.get('ontologyIRI')).toBe(DEFAULT_ONTOLOGY_IRI);
    expect(declarations(root)).toEqual([
      'Class #Catalog',
      'Class #Entry',
      'Class #Related',
      'Class #Reference',
      'Class #SeverityEnumeration',
      'NamedIndividual #indSeverityEnumerationLow',
      'NamedIndividual #indSeverityEnumerationHigh',
      'Class #NatureEnumeration',
      'NamedIndividual #indNatureEnumerationChildOf',
      'NamedIndividual #indNatureEnumerationPeerOf',
      'NamedIndividual #indCatalogTestCatalog',
      'NamedIndividual #Entry-79',
      'NamedIndividual #indRelatedRelated9',
      'NamedIndividual #indReferenceReference10',
      'NamedIndividual #Entry-20',
    ]);
  });

  it('appends extra rules after the profile rules', async () => {
    const extra = defineRule('typedEntry', classAtom('x', 'Entry'), objectAtom('x', 'a', 'Entry'));
    const owl = convertXsdToOwl(catalogXsd, [catalogXml], { profile: await loadProfile('cwe'), rules: [extra] });
    const labels = parseXml(owl)
      .children.filter((child) => child.local === 'DLSafeRule')
      .map((rule) => rule.children[1].children[1].content.join(''));
    expect(labels).toHaveLength(11);
    expect(labels[0]).toBe('hasCAPEC');
    expect(labels[10]).toBe('typedEntry');
  });

  it('names documents by position in errors', () => {
    expect(() => convertXsdToOwl(catalogXsd, [catalogXml, '<Catalog'])).toThrow(/document #2/);
    expect(() => convertXsdToOwl(catalogXsd, ['<Other/>'])).toThrow(XsdMappingError);
  });

  it('honours the output options', () => {
    const owl = convertXsdToOwl(catalogXsd, [], { xmlDeclaration: false, prettyPrint: true });
    expect(owl.startsWith('<Ontology ')).toBe(true);
    expect(owl).toContain('\n  <Declaration>');
  });
});

describe('buildGraph', () => {
  it('returns the prelude followed by one value per document', () => {
    const lines: string[] = [];
    const logger: Logger = {
      debug: (message) => lines.push(message),
      info: () => undefined,
      warn: () => undefined,
    };
    const schema = compileSchema(catalogXsd);
    const graph = buildGraph(
      schema,
      [
        { source: 'a.xml', content: catalogXml },
        { source: 'b.xml', content: catalogXml },
      ],
      logger,
    );

    expect(graph).toHaveLength(schema.prelude.length + 2);
    expect(graph[0]).toBeInstanceOf(OwlClass);
    expect(graph[graph.length - 1]).toBeInstanceOf(Individual);
    expect(lines).toEqual(['Parsing a.xml', 'Parsing b.xml']);
  });

  it('rejects malformed documents', () => {
    const schema = compileSchema(catalogXsd);
    expect(() => buildGraph(schema, [{ source: 'bad.xml', content: '<Catalog>' }])).toThrow(DocumentParseError);
  });
});
