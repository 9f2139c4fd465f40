import { InvalidLiteralError } from '../validation/errors.js';
import { toIri, XS_NS } from '../utils.js';

export const XSD_STRING = toIri(XS_NS, 'string');
export const XSD_DATE = toIri(XS_NS, 'date');
export const XSD_INTEGER = toIri(XS_NS, 'integer');

export type LiteralKind = 'text' | 'date' | 'integer';

/**
 * How a raw string becomes a literal. `dateFragment` covers the gMonth/gDay
 * forms (`--05`, `---15`), which are kept as plain integers.
 */
export type LiteralRule = 'text' | 'date' | 'integer' | 'dateFragment';

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * An immutable scalar value with an XSD datatype.
 */
export abstract class Literal {
  abstract readonly kind: LiteralKind;

  protected constructor(public readonly datatype: string) {}

  /** Lexical form written to the ontology. */
  abstract get lexical(): string;

  toString(): string {
    return this.lexical;
  }
}

export class TextLiteral extends Literal {
  readonly kind = 'text';

  constructor(
    public readonly value: string,
    datatype: string = XSD_STRING,
  ) {
    super(datatype);
  }

  get lexical(): string {
    return this.value;
  }
}

export class DateLiteral extends Literal {
  readonly kind = 'date';

  constructor(public readonly value: CalendarDate) {
    super(XSD_DATE);
  }

  get lexical(): string {
    const { year, month, day } = this.value;
    return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  }
}

export class IntegerLiteral extends Literal {
  readonly kind = 'integer';

  constructor(public readonly value: bigint) {
    super(XSD_INTEGER);
  }

  get lexical(): string {
    return this.value.toString();
  }
}

const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:Z|[+-]\d{2}:\d{2})?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

function parseDate(text: string, path?: string): DateLiteral {
  const match = DATE_PATTERN.exec(text);
  if (!match) throw new InvalidLiteralError(text, XSD_DATE, path);
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(0);
  probe.setUTCFullYear(year, month - 1, day);
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw new InvalidLiteralError(text, XSD_DATE, path);
  }
  return new DateLiteral({ year, month, day });
}

function parseInteger(text: string, path?: string): IntegerLiteral {
  if (!INTEGER_PATTERN.test(text)) throw new InvalidLiteralError(text, XSD_INTEGER, path);
  return new IntegerLiteral(BigInt(text));
}

/**
 * Parses a trimmed raw value according to `rule`.
 *
 * @param datatype - Datatype IRI recorded on text literals.
 * @throws `InvalidLiteralError` when the value does not match the rule.
 */
export function parseLiteral(rule: LiteralRule, text: string, datatype: string, path?: string): Literal {
  switch (rule) {
    case 'text':
      return new TextLiteral(text, datatype);
    case 'date':
      return parseDate(text, path);
    case 'integer':
      return parseInteger(text, path);
    case 'dateFragment':
      return parseInteger(text.split('-').join(''), path);
  }
}
