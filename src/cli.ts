#!/usr/bin/env node
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { pathToFileURL } from 'node:url';

import { Command, CommanderError } from 'commander';

import type { BindingOptions, ProfileConfig } from './config.js';
import { convertFilesToOwl } from './converter.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { isProfileName, loadBindingOptionsFile, loadProfile, PROFILE_NAMES } from './profiles.js';

export interface ConvertCommandOptions {
  schemaPath: string;
  dataPaths: string[];
  profile?: string;
  configPath?: string;
  iri?: string;
  outPath?: string;
  pretty?: boolean;
  logger?: Logger;
}

interface CliFlags {
  schema: string;
  data?: string[];
  profile?: string;
  config?: string;
  iri?: string;
  out?: string;
  pretty?: boolean;
  verbose?: boolean;
}

/**
 * Converts the schema and data files and returns the ontology, writing it
 * to `outPath` as well when one is given.
 */
export async function runConvertCommand(options: ConvertCommandOptions): Promise<string> {
  let profile: ProfileConfig | undefined;
  if (options.profile !== undefined) {
    if (!isProfileName(options.profile)) {
      throw new Error(`Unknown profile "${options.profile}". Expected one of ${PROFILE_NAMES.join(', ')}.`);
    }
    profile = await loadProfile(options.profile);
  }
  let binding: BindingOptions | undefined;
  if (options.configPath !== undefined) {
    binding = await loadBindingOptionsFile(options.configPath);
  }

  const owl = await convertFilesToOwl(options.schemaPath, options.dataPaths, {
    profile,
    binding,
    iri: options.iri,
    prettyPrint: options.pretty ?? false,
    logger: options.logger,
  });

  if (options.outPath !== undefined) {
    const target = path.resolve(options.outPath);
    await writeFile(target, owl, 'utf8');
    options.logger?.info(`Wrote ${target}`);
  }
  return owl;
}

function isCommanderHelpDisplayed(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
  );
}

function createProgram(): Command {
  const program = new Command();
  program
    .exitOverride()
    .name('xsd2owl')
    .description('Compile an XML Schema and turn conforming XML documents into an OWL/XML ontology')
    .requiredOption('--schema <path>', 'Path to the XSD file')
    .option('--data <paths...>', 'XML documents to convert', [])
    .option('--profile <name>', `Dataset profile (${PROFILE_NAMES.join(', ')})`)
    .option('--config <path>', 'JSON file with binding options (overrides the profile)')
    .option('--iri <iri>', 'Ontology IRI (defaults to the profile IRI)')
    .option('--out <path>', 'Write the ontology to this file instead of stdout')
    .option('--pretty', 'Pretty-print the output', false)
    .option('--verbose', 'Log progress to stderr', false)
    .action(async () => {
      const flags = program.opts<CliFlags>();
      const logger = createLogger({ verbose: flags.verbose });
      const owl = await runConvertCommand({
        schemaPath: flags.schema,
        dataPaths: flags.data ?? [],
        profile: flags.profile,
        configPath: flags.config,
        iri: flags.iri,
        outPath: flags.out,
        pretty: flags.pretty,
        logger,
      });
      if (flags.out === undefined) process.stdout.write(`${owl}\n`);
    });
  return program;
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isCommanderHelpDisplayed(error)) {
      return;
    }
    throw error;
  }
}

const entryUrl = process.argv[1]
  ? pathToFileURL(process.argv[1]).href
  : undefined;
if (entryUrl && import.meta.url === entryUrl) {
  runCli(process.argv).catch((error: unknown) => {
    // Commander has already printed its own usage errors.
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
