import { z } from 'zod';
import { defineRule, splitTriple, classAtom, tripleAtom } from './owl/rules.js';
import type { Atom, Rule } from './owl/rules.js';
import { XHTML_NS } from './utils.js';
import { ConfigValidationError } from './validation/errors.js';
import type { ValidationIssue } from './validation/errors.js';

export const NamingConfigSchema = z.object({
  /** Attributes whose value becomes the individual's id, in priority order. */
  idAttributes: z.array(z.string().min(1)).default(['ID', 'id']),
  /** Attributes whose value becomes the display name, in priority order. */
  nameAttributes: z.array(z.string().min(1)).default(['Name', 'name', 'Title']),
  /** Public type name → prefix used in id-based identities. */
  typeAliases: z.record(z.string().min(1)).default({}),
});

export type NamingConfig = z.infer<typeof NamingConfigSchema>;

export const BindingOptionsSchema = z.object({
  naming: NamingConfigSchema.default({}),
  /** Document tag → public name used for relations and individual types. */
  nameOverrides: z.record(z.string().min(1)).default({}),
  /**
   * Type paths forced to flatten into their owner. Named types are addressed
   * by local name, inline types by `Owner/element/...`.
   */
  forceAlone: z.array(z.string().min(1)).default([]),
  /** Type paths whose documentation stays on the relation instead of moving down. */
  skipAnnotationPush: z.array(z.string().min(1)).default([]),
  /** Namespaces whose unknown wildcard content is kept as raw markup. */
  passThroughNamespaces: z.array(z.string().min(1)).default([XHTML_NS]),
});

export type BindingOptions = z.infer<typeof BindingOptionsSchema>;
export type BindingOptionsInput = z.input<typeof BindingOptionsSchema>;

const TripleSchema = z
  .string()
  .refine((value) => splitTriple(value) !== undefined, 'expected "subject predicate object"');

const AtomSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('class'), variable: z.string().min(1), class: z.string().min(1) }),
  z.object({ kind: z.literal('object'), triple: TripleSchema }),
  z.object({ kind: z.literal('data'), triple: TripleSchema }),
]);

const RuleSchema = z.object({
  name: z.string().min(1),
  body: z.array(AtomSchema).min(1),
  head: z.array(AtomSchema).min(1),
});

export const ProfileSchema = BindingOptionsSchema.extend({
  name: z.string().min(1),
  /** Ontology IRI; also the `xml:base` of the output. */
  iri: z.string().min(1),
  rules: z.array(RuleSchema).default([]),
});

export type ProfileConfig = z.infer<typeof ProfileSchema>;
export type ProfileInput = z.input<typeof ProfileSchema>;

export const DEFAULT_NAMING: NamingConfig = NamingConfigSchema.parse({});

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? `$.${issue.path.join('.')}` : '$',
    message: issue.message,
  }));
}

/**
 * Validates binding options and fills in defaults.
 *
 * @throws `ConfigValidationError` listing every invalid field.
 */
export function resolveBindingOptions(input: unknown = {}): BindingOptions {
  const result = BindingOptionsSchema.safeParse(input);
  if (!result.success) throw new ConfigValidationError(toIssues(result.error));
  return result.data;
}

/**
 * Validates a dataset profile and fills in defaults.
 *
 * @throws `ConfigValidationError` listing every invalid field.
 */
export function resolveProfile(input: unknown): ProfileConfig {
  const result = ProfileSchema.safeParse(input);
  if (!result.success) throw new ConfigValidationError(toIssues(result.error));
  return result.data;
}

type AtomConfig = z.infer<typeof AtomSchema>;

function toAtom(config: AtomConfig): Atom {
  if (config.kind === 'class') return classAtom(config.variable, config.class);
  return tripleAtom(config.kind, config.triple);
}

export function profileRules(profile: ProfileConfig): Rule[] {
  return profile.rules.map((rule) => defineRule(rule.name, rule.body.map(toAtom), rule.head.map(toAtom)));
}

/** Public name of a document tag: its override, if any, else the tag itself. */
export function publicName(options: BindingOptions, tag: string): string {
  return options.nameOverrides[tag] ?? tag;
}
