import { capitalize } from '../utils.js';

/**
 * `property` slugs are prefixed with `has`, `individual` slugs with `ind`.
 */
export type SlugRole = 'plain' | 'property' | 'individual';

type ReplacementTable = ReadonlyArray<readonly [string, string]>;

const PARENTHETICAL = /\s*\([^\n]*?\)/g;
const QUOTED_SEGMENT = /:\s*'([^']*?)'/g;
const DELIMITERS = /[ \u00a0\n\t,_-]+/;

// Applied inside a quoted segment, before the main table.
const INNER_REPLACEMENTS: ReplacementTable = [
  ['/', 'Slash'],
  [':', 'Colon'],
];

// Order matters: later entries see the output of earlier ones.
const REPLACEMENTS: ReplacementTable = [
  ['#', 'Sharp'],
  ['+', 'Plus'],
  ['.', 'Dot'],
  ['\\', 'Backslash'],
  ['&', 'And'],
  ["'", ''],
  ['/', 'Or'],
  [':', ''],
  ['*', 'Wildcard'],
  ['=', 'Equal'],
  ['"', ''],
  ['%', 'Percent'],
  ['<', 'Below'],
  ['>', 'Above'],
  ['^', ''],
];

function replaceAll(text: string, table: ReplacementTable): string {
  let result = text;
  for (const [from, to] of table) {
    result = result.split(from).join(` ${to} `);
  }
  return result;
}

/**
 * Normalizes a name into a camel-cased identifier.
 *
 * The output is the join key between generated entities and the names used
 * by rule configuration, so it must not change for a given input.
 *
 * @example
 * slugify('Related_Weakness', 'property'); // 'hasRelatedWeakness'
 * slugify('C#');                           // 'CSharp'
 */
export function slugify(input: string, role: SlugRole = 'plain'): string {
  let text = role === 'property' ? input.split('@').join('') : input;
  text = text.replace(PARENTHETICAL, '');
  text = text.replace(QUOTED_SEGMENT, (_match, inner: string) => ` ${replaceAll(inner, INNER_REPLACEMENTS)} `);
  text = replaceAll(text, REPLACEMENTS);

  const [first = '', ...rest] = text.trim().split(DELIMITERS);
  let head = capitalize(first);
  if (role === 'property') head = `has${head}`;
  if (role === 'individual') head = `ind${head}`;
  return head + rest.filter((word) => word.length > 0).map(capitalize).join('');
}
