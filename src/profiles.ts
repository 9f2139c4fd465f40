import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { resolveBindingOptions, resolveProfile } from './config.js';
import type { BindingOptions, ProfileConfig } from './config.js';
import { ConfigValidationError } from './validation/errors.js';

/** Dataset profiles shipped in `profiles/`. */
export const PROFILE_NAMES = ['cwe', 'capec', 'cve'] as const;

export type ProfileName = (typeof PROFILE_NAMES)[number];

export function isProfileName(value: string): value is ProfileName {
  return PROFILE_NAMES.some((name) => name === value);
}

async function readJson(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([{ path: '$', message: `Cannot read ${path}: ${reason}` }]);
  }
  try {
    return JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([{ path: '$', message: `Invalid JSON in ${path}: ${reason}` }]);
  }
}

/**
 * Path of a bundled profile. Resolves from both `src/` and `dist/`.
 */
export function profilePath(name: ProfileName): string {
  return fileURLToPath(new URL(`../profiles/${name}.json`, import.meta.url));
}

/**
 * Loads and validates a bundled dataset profile.
 */
export async function loadProfile(name: ProfileName): Promise<ProfileConfig> {
  return resolveProfile(await readJson(profilePath(name)));
}

/**
 * Loads and validates a profile from any JSON file.
 */
export async function loadProfileFile(path: string): Promise<ProfileConfig> {
  return resolveProfile(await readJson(path));
}

/**
 * Loads binding options (no name, IRI or rules) from a JSON file.
 */
export async function loadBindingOptionsFile(path: string): Promise<BindingOptions> {
  return resolveBindingOptions(await readJson(path));
}
