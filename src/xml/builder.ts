import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces.js';
import { Has, Individual, OwlClass, RelationAnnotation } from '../owl/entities.js';
import type { OntologyEntry } from '../owl/entities.js';
import { Literal } from '../owl/literal.js';
import type { Atom, Rule } from '../owl/rules.js';
import { slugify } from '../owl/slug.js';

export const OWL_NS = 'http://www.w3.org/2002/07/owl#';
const XML_NS = 'http://www.w3.org/XML/1998/namespace';
const XMLNS_NS = 'http://www.w3.org/2000/xmlns/';
const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';

const RDFS_LABEL = `${RDFS_NS}label`;
const RDFS_COMMENT = `${RDFS_NS}comment`;
const RULE_ENABLED = 'http://swrl.stanford.edu/ontologies/3.3/swrla.owl#isRuleEnabled';

const PREFIXES: readonly (readonly [string, string])[] = [
  ['owl', OWL_NS],
  ['rdf', RDF_NS],
  ['xml', XML_NS],
  ['xsd', XSD_NS],
  ['rdfs', RDFS_NS],
];

export interface OntologyInput {
  /** Ontology IRI, also used as `xml:base`. */
  iri: string;
  entries: readonly OntologyEntry[];
  rules?: readonly Rule[];
}

export interface OntologyBuildOptions {
  prettyPrint?: boolean;
  xmlDeclaration?: boolean;
}

// Every OWL/XML element lives in the OWL namespace.
function ele(parent: XMLBuilder, name: string, attributes: Record<string, string> = {}): XMLBuilder {
  const node = parent.ele(OWL_NS, name);
  for (const [key, value] of Object.entries(attributes)) node.att(key, value);
  return node;
}

function iri(slug: string): string {
  return `#${slug}`;
}

class OntologyWriter {
  private readonly emitted = new Set<Individual>();

  constructor(private readonly root: XMLBuilder) {}

  writeEntry(entry: OntologyEntry): void {
    if (entry instanceof Individual) {
      this.writeIndividual(entry);
    } else if (entry instanceof OwlClass) {
      this.writeClass(entry);
    } else if (entry instanceof RelationAnnotation) {
      this.writeRelation(entry);
    } else if (entry instanceof Literal) {
      // A bare literal has no subject to hang on.
    } else {
      for (const assertion of entry) this.writeReferenced(assertion);
    }
  }

  writeRule(rule: Rule): void {
    const node = ele(this.root, 'DLSafeRule');
    const enabled = ele(node, 'Annotation');
    ele(enabled, 'AnnotationProperty', { IRI: RULE_ENABLED });
    ele(enabled, 'Literal', { datatypeIRI: `${XSD_NS}boolean` }).txt('true');
    const label = ele(node, 'Annotation');
    ele(label, 'AnnotationProperty', { abbreviatedIRI: 'rdfs:label' });
    ele(label, 'Literal').txt(rule.name);

    const body = ele(node, 'Body');
    for (const atom of rule.body) this.writeAtom(body, atom);
    const head = ele(node, 'Head');
    for (const atom of rule.head) this.writeAtom(head, atom);
  }

  private writeAtom(parent: XMLBuilder, atom: Atom): void {
    switch (atom.kind) {
      case 'class': {
        const node = ele(parent, 'ClassAtom');
        ele(node, 'Class', { IRI: atom.class });
        ele(node, 'Variable', { IRI: atom.variable });
        break;
      }
      case 'object': {
        const node = ele(parent, 'ObjectPropertyAtom');
        ele(node, 'ObjectProperty', { IRI: atom.predicate });
        ele(node, 'Variable', { IRI: atom.subject });
        ele(node, 'Variable', { IRI: atom.object });
        break;
      }
      case 'data': {
        const node = ele(parent, 'DataPropertyAtom');
        ele(node, 'DataProperty', { IRI: atom.predicate });
        ele(node, 'Variable', { IRI: atom.subject });
        ele(node, 'Variable', { IRI: atom.object });
        break;
      }
    }
  }

  private annotate(subject: string, property: string, text: string): void {
    const node = ele(this.root, 'AnnotationAssertion');
    ele(node, 'AnnotationProperty', { IRI: property });
    ele(node, 'IRI').txt(subject);
    ele(node, 'Literal').txt(text);
  }

  private writeClass(entry: OwlClass): void {
    const subject = iri(entry.slug());
    ele(ele(this.root, 'Declaration'), 'Class', { IRI: subject });
    for (const annotation of entry.annotations) this.annotate(subject, RDFS_COMMENT, annotation);
  }

  private writeRelation(entry: RelationAnnotation): void {
    const subject = iri(entry.slug());
    for (const annotation of entry.annotations) this.annotate(subject, RDFS_COMMENT, annotation);
  }

  private writeIndividual(individual: Individual): void {
    if (individual.ignore || this.emitted.has(individual)) return;
    this.emitted.add(individual);

    const subject = iri(individual.slug());
    ele(ele(this.root, 'Declaration'), 'NamedIndividual', { IRI: subject });
    this.annotate(subject, RDFS_LABEL, individual.name);
    for (const annotation of individual.annotations) this.annotate(subject, RDFS_COMMENT, annotation);

    if (individual.type !== undefined) {
      const node = ele(this.root, 'ClassAssertion');
      ele(node, 'Class', { IRI: iri(slugify(individual.type)) });
      ele(node, 'NamedIndividual', { IRI: subject });
    }
    for (const assertion of individual.assertions) this.writeAssertion(subject, assertion);
  }

  private writeAssertion(subject: string, assertion: Has): void {
    const property = iri(slugify(assertion.attribute, 'property'));
    for (const value of assertion.values) {
      if (value instanceof Literal) {
        const node = ele(this.root, 'DataPropertyAssertion');
        ele(node, 'DataProperty', { IRI: property });
        ele(node, 'NamedIndividual', { IRI: subject });
        ele(node, 'Literal', { datatypeIRI: value.datatype }).txt(value.lexical);
      } else {
        const node = ele(this.root, 'ObjectPropertyAssertion');
        ele(node, 'ObjectProperty', { IRI: property });
        ele(node, 'NamedIndividual', { IRI: subject });
        ele(node, 'NamedIndividual', { IRI: iri(value.slug()) });
        this.writeIndividual(value);
      }
    }
  }

  private writeReferenced(assertion: Has): void {
    for (const value of assertion.values) {
      if (value instanceof Individual) this.writeIndividual(value);
    }
  }
}

/**
 * Serializes entries and rules as an OWL 2 ontology in the OWL/XML syntax.
 * Individuals reachable through object assertions are written once each;
 * `ignore` individuals are referenced but never declared.
 */
export function buildOntology(input: OntologyInput, options: OntologyBuildOptions = {}): string {
  const { prettyPrint = false, xmlDeclaration = true } = options;

  // create() always produces at least a minimal <?xml version="1.0"?> node.
  // Pass headless:true to end() when the caller doesn't want the declaration.
  const doc = create({ version: '1.0' });
  const root = doc.ele(OWL_NS, 'Ontology');
  root.att(XML_NS, 'xml:base', input.iri);
  for (const [prefix, namespace] of PREFIXES) {
    if (prefix !== 'xml' && prefix !== 'owl') root.att(XMLNS_NS, `xmlns:${prefix}`, namespace);
  }
  root.att('ontologyIRI', input.iri);

  ele(root, 'Prefix', { name: '', IRI: input.iri });
  for (const [prefix, namespace] of PREFIXES) ele(root, 'Prefix', { name: prefix, IRI: namespace });

  const writer = new OntologyWriter(root);
  for (const entry of input.entries) writer.writeEntry(entry);
  for (const rule of input.rules ?? []) writer.writeRule(rule);

  return doc.end({ prettyPrint, headless: !xmlDeclaration });
}
