/**
 * Contract CLI Tool
 *
 * Command-line tool for chunking parsed contracts and extracting definitions and
 * entitlements into per-document output directories.
 *
 * Usage:
 *   tsx src/server/scripts/contract-cli.ts <command> [paths...] [options]
 *
 * Commands:
 *   chunk <document.json...> [--out=dir] [--page-start=N] [--page-end=N]
 *                                          Chunk parsed documents (chunks.json + chunks.md)
 *   extract <chunks.json...> [--definitions] [--entitlements] [--no-search] [--out=dir]
 *                                          Extract definitions and/or entitlements
 *   check <dir...>                         Golden-set check on output directories
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import type { ChunkSet, PageRange } from '../contracts/types.js';
import { getEnv } from '../config/env.js';
import { chunk } from '../chunking/ContractChunkingService.js';
import { renderChunkDebugMarkdown } from '../chunking/chunkDebugReport.js';
import { extractDefinitions } from '../services/extraction/definitions/DefinitionExtractor.js';
import { extractEntitlements } from '../services/extraction/entitlements/EntitlementExtractor.js';
import type { ExtractionOptions } from '../services/extraction/extractionOptions.js';
import { ReviewPackExporter } from '../services/export/ReviewPackExporter.js';
import { KeywordSearchService } from '../services/search/KeywordSearchService.js';
import { InputDefectError, isAppError } from '../types/errors.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { createChildLogger, runContext } from '../utils/logger.js';
import { chunkSetSchema } from '../validation/parsedDocumentSchemas.js';

const cliLogger = createChildLogger({ component: 'contract-cli' });
const exporter = new ReviewPackExporter();

const CHUNKS_FILE = 'chunks.json';
const REVIEW_PACK_FILE = 'review_pack.md';

export interface CliOptions {
  paths: string[];
  flags: Set<string>;
  values: Map<string, string>;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const paths: string[] = [];
  const flags = new Set<string>();
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      paths.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    if (eq !== -1) {
      values.set(arg.substring(2, eq), arg.substring(eq + 1));
      continue;
    }
    // `--out dir` form
    const name = arg.substring(2);
    const next = argv[i + 1];
    if ((name === 'out' || name === 'page-start' || name === 'page-end') && next !== undefined && !next.startsWith('--')) {
      values.set(name, next);
      i++;
      continue;
    }
    flags.add(name);
  }

  return { paths, flags, values };
}

function parsePageOption(options: CliOptions, name: string): number | undefined {
  const raw = options.values.get(name);
  if (raw === undefined) return undefined;
  const page = parseInt(raw, 10);
  if (isNaN(page) || page < 1) {
    throw new InputDefectError(`--${name} must be a positive page number, got "${raw}"`);
  }
  return page;
}

/**
 * Output directory for a document: --out/<docId>, or the input file's directory
 */
function outputDir(options: CliOptions, inputPath: string, docId: string): string {
  const out = options.values.get('out');
  return out ? path.join(out, docId) : path.dirname(inputPath);
}

async function readJson(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new InputDefectError(`${filePath} is not valid JSON`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

async function readChunkSet(filePath: string): Promise<ChunkSet> {
  const result = chunkSetSchema.safeParse(await readJson(filePath));
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InputDefectError(`${filePath} is not a valid chunk set: ${details.join('; ')}`);
  }
  return result.data;
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}

async function updateReviewPack(dir: string, section: string): Promise<void> {
  const packPath = path.join(dir, REVIEW_PACK_FILE);
  const existing = await readOptional(packPath);
  await writeFile(packPath, exporter.updateReviewPack(existing, section), 'utf-8');
}

async function chunkCommand(inputPath: string, options: CliOptions): Promise<void> {
  const start = parsePageOption(options, 'page-start');
  const end = parsePageOption(options, 'page-end');
  const pageRange: PageRange | undefined = start !== undefined || end !== undefined ? { start, end } : undefined;

  const chunkSet = chunk(await readJson(inputPath), pageRange ? { pageRange } : {});
  const dir = outputDir(options, inputPath, chunkSet.docId);
  await mkdir(dir, { recursive: true });
  await writeFile(path.join(dir, CHUNKS_FILE), `${JSON.stringify(chunkSet, null, 2)}\n`, 'utf-8');
  await writeFile(path.join(dir, 'chunks.md'), renderChunkDebugMarkdown(chunkSet), 'utf-8');

  console.log(`\n📄 ${chunkSet.docId}`);
  console.log('─'.repeat(50));
  console.log(`   Chunks:   ${chunkSet.chunks.length}`);
  console.log(`   Excluded: ${chunkSet.excludedBlocks.length}`);
  console.log(`   Output:   ${dir}`);
}

/**
 * In-process keyword search widens the candidate set unless --no-search is given
 */
export function extractionOptionsFor(chunkSet: ChunkSet, options: CliOptions): ExtractionOptions {
  return options.flags.has('no-search') ? {} : { search: new KeywordSearchService(chunkSet) };
}

async function extractCommand(inputPath: string, options: CliOptions): Promise<void> {
  const chunkSet = await readChunkSet(inputPath);
  const dir = outputDir(options, inputPath, chunkSet.docId);
  await mkdir(dir, { recursive: true });
  const extractionOptions = extractionOptionsFor(chunkSet, options);

  // Neither flag means both
  const runDefinitions = options.flags.has('definitions') || !options.flags.has('entitlements');
  const runEntitlements = options.flags.has('entitlements') || !options.flags.has('definitions');

  console.log(`\n🔎 ${chunkSet.docId}`);
  console.log('─'.repeat(50));

  if (runDefinitions) {
    const result = await extractDefinitions(chunkSet, extractionOptions);
    await writeFile(path.join(dir, 'definitions.json'), `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
    await writeFile(path.join(dir, 'definitions.csv'), exporter.definitionsCsv(result), 'utf-8');
    await updateReviewPack(dir, exporter.definitionsSection(result));
    console.log(`   Definitions:  ${result.definitions.length} (${result.stats.droppedForEvidence} dropped)`);
    result.warnings.forEach((warning) => console.log(`   ⚠️  ${warning}`));
  }

  if (runEntitlements) {
    const result = await extractEntitlements(chunkSet, extractionOptions);
    await writeFile(path.join(dir, 'entitlements.json'), `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
    await writeFile(path.join(dir, 'entitlements.csv'), exporter.entitlementsCsv(result), 'utf-8');
    await updateReviewPack(dir, exporter.entitlementsSection(result));
    const { status, products, references } = result.entitlements;
    console.log(`   Entitlements: ${status} (${products.length} products, ${references.length} references)`);
    result.warnings.forEach((warning) => console.log(`   ⚠️  ${warning}`));
  }

  console.log(`   Output:       ${dir}`);
}

/**
 * Golden-set check: the chunk set is non-empty and every chunk carries a page range
 */
export function checkChunkSet(chunkSet: ChunkSet): string[] {
  const problems: string[] = [];
  if (chunkSet.chunks.length === 0) {
    problems.push('chunk set is empty');
  }
  for (const entry of chunkSet.chunks) {
    if (!Number.isInteger(entry.pageStart) || !Number.isInteger(entry.pageEnd) || entry.pageStart < 1 || entry.pageEnd < entry.pageStart) {
      problems.push(`${entry.chunkId}: missing or invalid page range`);
    }
  }
  return problems;
}

async function checkCommand(dir: string): Promise<boolean> {
  const chunkSet = await readChunkSet(path.join(dir, CHUNKS_FILE));
  const problems = checkChunkSet(chunkSet);
  if (problems.length === 0) {
    console.log(`✅ ${dir}: ${chunkSet.chunks.length} chunks`);
    return true;
  }
  console.log(`❌ ${dir}`);
  problems.forEach((problem) => console.log(`   - ${problem}`));
  return false;
}

function printUsage(): void {
  console.error('Usage: tsx src/server/scripts/contract-cli.ts <command> [paths...] [options]');
  console.error('\nCommands:');
  console.error('  chunk <document.json...>                  Chunk parsed documents');
  console.error('  extract <chunks.json...>                  Extract definitions and entitlements');
  console.error('  check <dir...>                            Golden-set check on output directories');
  console.error('\nOptions:');
  console.error('  --out=<dir>                               Write outputs under <dir>/<docId>');
  console.error('  --page-start=<N> --page-end=<N>           Chunk only the given page range');
  console.error('  --definitions | --entitlements            Restrict extraction (default: both)');
  console.error('  --no-search                               Skip the keyword search fallback');
}

async function main(): Promise<void> {
  const command = process.argv[2];
  const options = parseArgs(process.argv.slice(3));

  if (!command || options.paths.length === 0) {
    printUsage();
    process.exit(1);
  }

  const concurrency = getEnv().EXTRACTION_CONCURRENCY;
  const run = async (target: string, fn: () => Promise<boolean>): Promise<boolean> =>
    runContext.run({ command, target }, async () => {
      try {
        return await fn();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        cliLogger.error({ target, code: isAppError(error) ? error.code : undefined }, message);
        console.error(`❌ ${target}: ${message}`);
        return false;
      }
    });

  let results: boolean[];
  switch (command) {
    case 'chunk':
      results = await mapWithConcurrency(options.paths, concurrency, (target) =>
        run(target, async () => {
          await chunkCommand(target, options);
          return true;
        })
      );
      break;
    case 'extract':
      results = await mapWithConcurrency(options.paths, concurrency, (target) =>
        run(target, async () => {
          await extractCommand(target, options);
          return true;
        })
      );
      break;
    case 'check':
      results = await mapWithConcurrency(options.paths, concurrency, (target) => run(target, () => checkCommand(target)));
      break;
    default:
      console.error(`❌ Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }

  const failed = results.filter((ok) => !ok).length;
  console.log(`\n${failed === 0 ? '✅' : '⚠️'} ${results.length - failed}/${results.length} succeeded`);
  if (failed > 0) {
    process.exit(1);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('❌ Error:', error);
    process.exit(1);
  });
}
