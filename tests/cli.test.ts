import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { runCli, runConvertCommand } from '../src/cli.js';
import type { Logger } from '../src/logger.js';

const fixturesDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');
const schemaPath = path.join(fixturesDir, 'vulnerabilities.xsd');
const dataPath = path.join(fixturesDir, 'vulnerabilities.xml');

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(tmpdir(), 'xsd2owl-cli-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: () => undefined,
    info: (message) => lines.push(message),
    warn: (message) => lines.push(message),
  };
}

describe('runConvertCommand', () => {
  it('writes the ontology to the output file', async () => {
    const outPath = path.join(tempDir, 'cve.owl');
    const logger = recordingLogger();
    const owl = await runConvertCommand({
      schemaPath,
      dataPaths: [dataPath],
      profile: 'cve',
      outPath,
      logger,
    });

    expect(await readFile(outPath, 'utf8')).toBe(owl);
    expect(owl).toContain('<NamedIndividual IRI="#CVE-1999-0001"/>');
    expect(logger.lines).toEqual([`Wrote ${outPath}`]);
  });

  it('reads binding options from a config file', async () => {
    const configPath = path.join(tempDir, 'binding.json');
    await writeFile(configPath, JSON.stringify({ nameOverrides: { item: 'Entry' } }), 'utf8');
    const owl = await runConvertCommand({ schemaPath, dataPaths: [dataPath], configPath });

    expect(owl).toContain('<Class IRI="#Entry"/>');
    expect(owl).toContain('<NamedIndividual IRI="#indEntryCVE19990001"/>');
  });

  it('rejects unknown profiles', async () => {
    await expect(runConvertCommand({ schemaPath, dataPaths: [], profile: 'nvd' })).rejects.toThrow(
      'Unknown profile "nvd". Expected one of cwe, capec, cve.',
    );
  });
});

describe('runCli', () => {
  it('streams the ontology to stdout without --out', async () => {
    const chunks: string[] = [];
    const spy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(String(chunk));
      return true;
    });
    try {
      await runCli(['node', 'xsd2owl', '--schema', schemaPath, '--data', dataPath, '--profile', 'cve']);
    } finally {
      spy.mockRestore();
    }
    expect(chunks.join('')).toContain('ontologyIRI="https://ontology.example.org/cve"');
  });

  it('writes to --out and logs to stderr', async () => {
    const outPath = path.join(tempDir, 'out.owl');
    const messages: string[] = [];
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      messages.push(String(chunk));
      return true;
    });
    try {
      await runCli(['node', 'xsd2owl', '--schema', schemaPath, '--data', dataPath, '--out', outPath]);
    } finally {
      spy.mockRestore();
    }
    expect(await readFile(outPath, 'utf8')).toContain('<Class IRI="#Item"/>');
    expect(messages).toContain(`[xsd2owl] info: Wrote ${outPath}\n`);
  });

  it('prints help and resolves on --help', async () => {
    const chunks: string[] = [];
    const spy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(String(chunk));
      return true;
    });
    try {
      await expect(runCli(['node', 'xsd2owl', '--help'])).resolves.toBeUndefined();
    } finally {
      spy.mockRestore();
    }
    expect(chunks.join('')).toContain('--schema <path>');
  });

  it('rejects with a commander error when --schema is missing', async () => {
    const messages: string[] = [];
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      messages.push(String(chunk));
      return true;
    });
    try {
      await expect(runCli(['node', 'xsd2owl', '--data', dataPath])).rejects.toMatchObject({
        code: 'commander.missingMandatoryOptionValue',
        exitCode: 1,
      });
    } finally {
      spy.mockRestore();
    }
    expect(messages.join('')).toContain("required option '--schema <path>' not specified");
  });
});
