import { describe, expect, it } from 'vitest';
import { resolveBindingOptions } from '../src/config.js';
import { Has, Individual, OwlClass, RelationAnnotation, VALUE_PLACEHOLDER } from '../src/owl/entities.js';
import { IntegerLiteral, TextLiteral } from '../src/owl/literal.js';

const naming = resolveBindingOptions({
  naming: {
    idAttributes: ['ID', 'seq'],
    nameAttributes: ['Name', 'Title'],
    typeAliases: { Weakness: 'CWE' },
  },
}).naming;

describe('Has', () => {
  it('exposes single and multiple values uniformly', () => {
    const one = new TextLiteral('a');
    const two = new TextLiteral('b');
    expect(new Has('x', one).values).toEqual([one]);
    expect(new Has('x', [one, two]).values).toEqual([one, two]);
  });

  it('recognizes the value placeholder', () => {
    expect(new Has(VALUE_PLACEHOLDER, new TextLiteral('a')).isPlaceholder).toBe(true);
    expect(new Has('Name', new TextLiteral('a')).isPlaceholder).toBe(false);
  });
});

describe('Individual', () => {
  it('builds id-based identities with the type alias', () => {
    const individual = new Individual('Weakness_3', {
      type: 'Weakness',
      assertions: [new Has('ID', new IntegerLiteral(79n)), new Has('Name', new TextLiteral('Input'))],
      naming,
    });
    expect(individual.id).toBe('79');
    expect(individual.slug()).toBe('CWE-79');
  });

  it('follows the id attribute priority, not assertion order', () => {
    const individual = new Individual('Item_1', {
      type: 'Item',
      assertions: [new Has('seq', new TextLiteral('later')), new Has('ID', new TextLiteral('first'))],
      naming,
    });
    expect(individual.id).toBe('first');
    expect(individual.slug()).toBe('Item-first');
  });

  it('falls back to a slug of type and display name', () => {
    const individual = new Individual('Item_4', {
      type: 'Item',
      assertions: [new Has('Title', new TextLiteral('Read/Write (legacy)'))],
      naming,
    });
    expect(individual.id).toBeUndefined();
    expect(individual.name).toBe('Read/Write (legacy)');
    expect(individual.slug()).toBe('indItemReadOrWrite');
  });

  it('uses the fallback name when no name attribute is asserted', () => {
    const individual = new Individual('Item_4', { type: 'Item', naming });
    expect(individual.name).toBe('Item_4');
    expect(individual.slug()).toBe('indItemItem4');
  });

  it('takes the display name of an individual-valued name attribute', () => {
    const named = new Individual('High', { type: 'Severity', naming });
    const individual = new Individual('Rating_2', {
      type: 'Rating',
      assertions: [new Has('Name', named)],
      naming,
    });
    expect(individual.name).toBe('High');
  });

  it('memoizes its identity', () => {
    const individual = new Individual('Item_1', { type: 'Item' });
    expect(individual.slug()).toBe(individual.slug());
    expect(individual.ignore).toBe(false);
  });
});

describe('OwlClass / RelationAnnotation', () => {
  it('slug their names', () => {
    expect(new OwlClass('Attack_Pattern').slug()).toBe('AttackPattern');
    expect(new RelationAnnotation('Related_Weakness', ['doc']).slug()).toBe('hasRelatedWeakness');
  });
});
