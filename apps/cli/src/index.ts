#!/usr/bin/env -S node --import tsx
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { resolve, dirname, join, basename, extname } from 'path';
import { TableExtractor, type ExtractionStage } from '@gridscan/grid-extract';
import {
  LocatorChain,
  StaticLocator,
  createLocators,
  loadLocatorConfig,
  loadImageSource,
  scanDirectoryForImages,
  validateDirectory,
  type TokenLocator,
} from '@gridscan/locators';
import { saveXlsx, exportCsv, toResultDocument, renderPreview } from '@gridscan/output';
import {
  GRIDSCAN_VERSION,
  isBackendUnavailableError,
  parseTokenList,
  validateResultDocumentOrThrow,
  type ExtractionResult,
  type ImageSource,
} from '@gridscan/types';

const AVAILABLE_FORMATS = ['xlsx', 'csv', 'json'] as const;
type OutputFormat = typeof AVAILABLE_FORMATS[number];

/** Exit code for an extraction that ran but found no table */
const EXIT_EXTRACTION_FAILED = 2;

interface CliOptions {
  inputDir?: string;
  out?: string;
  format: string;
  tokens?: string;
  backends?: string;
  presort: boolean;
  retries?: string;
  sheetName: string;
  verbose: boolean;
  pretty: boolean;
}

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

function isOutputFormat(value: string): value is OutputFormat {
  return AVAILABLE_FORMATS.some(format => format === value);
}

function resolveFormat(options: CliOptions): OutputFormat {
  const format = options.format.toLowerCase();
  if (!isOutputFormat(format)) {
    throw new Error(`Invalid format "${options.format}". Available: ${AVAILABLE_FORMATS.join(', ')}`);
  }
  return format;
}

interface LocatorSetup {
  locators: TokenLocator[];
  retries: number;
}

/**
 * Locators for this run: a tokens file when given, otherwise every configured
 * backend. Missing credentials surface here as BackendUnavailableError.
 */
async function buildLocators(options: CliOptions): Promise<LocatorSetup> {
  if (options.tokens !== undefined) {
    const content = await readFile(resolve(options.tokens), 'utf-8');
    const tokens = parseTokenList(JSON.parse(content));
    return { locators: [new StaticLocator(tokens, 'TOKENS_FILE')], retries: 0 };
  }

  const env = { ...process.env };
  if (options.retries !== undefined) {
    env['GRIDSCAN_RETRIES'] = options.retries;
  }
  const config = loadLocatorConfig(env, { backends: options.backends });
  return { locators: createLocators(config), retries: config.retries };
}

function createExtractor({ locators, retries }: LocatorSetup, options: CliOptions): TableExtractor {
  const chain = new LocatorChain(locators, {
    retry: {
      maxRetries: retries,
      onRetry: (attempt, error, delayMs) => {
        console.error(`[WARN] Attempt ${attempt} failed (${error.message}); retrying in ${Math.round(delayMs)}ms`);
      },
    },
    onFailure: ({ locator, error }) => {
      console.error(`[WARN] ${locator} failed: ${error.message}`);
    },
    onEmpty: (locator) => {
      console.error(`[WARN] ${locator} returned no text`);
    },
  });

  if (options.verbose) {
    console.error(`[DEBUG] Backends in order: ${chain.locatorNames.join(', ')}`);
  }

  return new TableExtractor(chain, {
    presortByY: options.presort,
    onStage: (stage: ExtractionStage, count: number) => {
      if (options.verbose) {
        console.error(`[DEBUG] ${stage}: ${count}`);
      }
    },
  });
}

async function writeResult(
  result: ExtractionResult,
  fileName: string,
  format: OutputFormat,
  outPath: string | undefined,
  options: CliOptions
): Promise<void> {
  if (format === 'json') {
    const preview = result.table !== undefined ? renderPreview(result.table) : undefined;
    const document = toResultDocument(result, fileName, { preview });
    validateResultDocumentOrThrow(document);
    const json = options.pretty ? JSON.stringify(document, null, 2) : JSON.stringify(document);
    await emit(json, outPath);
    return;
  }

  if (result.table === undefined) {
    return;
  }

  if (format === 'csv') {
    await emit(exportCsv(result.table), outPath);
    return;
  }

  if (outPath === undefined) {
    throw new Error('--out is required for xlsx output');
  }
  await mkdir(dirname(outPath), { recursive: true });
  await saveXlsx(result.table, outPath, { sheetName: options.sheetName });
  console.error(`[INFO] Wrote ${outPath}`);
}

async function emit(content: string, outPath: string | undefined): Promise<void> {
  if (outPath === undefined) {
    console.log(content);
    return;
  }
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, content + '\n', 'utf-8');
  console.error(`[INFO] Wrote ${outPath}`);
}

function reportResult(result: ExtractionResult, label: string, verbose: boolean): void {
  if (!result.success) {
    console.error(`[ERROR] ${label}: ${result.error ?? 'Extraction failed'} (${result.elapsedTime}s, ${result.backendName})`);
    return;
  }

  console.error(
    `[INFO] ${label}: ${result.rowsExtracted} row(s) × ${result.columnsDetected} column(s), ` +
    `confidence ${result.confidence}, ${result.elapsedTime}s via ${result.backendName}`
  );
  if (verbose && result.table !== undefined) {
    console.error(renderPreview(result.table));
  }
}

/**
 * Image bytes for a run. In tokens-file mode there may be no image at all.
 */
async function loadInput(imageFile: string | undefined): Promise<ImageSource> {
  if (imageFile === undefined) {
    return { data: new Uint8Array(), mimeType: 'application/octet-stream' };
  }
  return loadImageSource(resolve(imageFile));
}

async function processSingle(imageFile: string | undefined, options: CliOptions): Promise<boolean> {
  const format = resolveFormat(options);
  const extractor = createExtractor(await buildLocators(options), options);

  const image = await loadInput(imageFile);
  const label = imageFile ?? options.tokens ?? 'input';
  const result = await extractor.extract(image);

  reportResult(result, basename(label), options.verbose);
  await writeResult(result, basename(label), format, singleOutputPath(label, format, options.out), options);
  return result.success;
}

/**
 * csv and json go to stdout unless --out is given; xlsx defaults to
 * `<image name>.xlsx` in the working directory.
 */
function singleOutputPath(label: string, format: OutputFormat, out: string | undefined): string | undefined {
  if (out !== undefined) return resolve(out);
  if (format !== 'xlsx') return undefined;
  return resolve(`${basename(label, extname(label))}.xlsx`);
}

async function processDirectory(inputDir: string, options: CliOptions): Promise<boolean> {
  const format = resolveFormat(options);

  const validation = await validateDirectory(inputDir);
  if (!validation.valid) {
    throw new Error(validation.error ?? `Cannot access directory: ${inputDir}`);
  }

  const scan = await scanDirectoryForImages(inputDir);
  for (const skipped of scan.skipped) {
    console.error(`[WARN] Skipped ${skipped.fileName}: ${skipped.reason}`);
  }
  if (scan.files.length === 0) {
    throw new Error(`No images found in ${scan.directoryPath}`);
  }

  const extractor = createExtractor(await buildLocators(options), options);
  const outDir = resolve(options.out ?? scan.directoryPath);

  console.error(`[INFO] Processing ${scan.files.length} image(s) from ${scan.directoryPath}`);

  let failed = 0;
  for (const [index, file] of scan.files.entries()) {
    console.error(`[INFO] (${index + 1}/${scan.files.length}) ${file.fileName}`);
    const result = await extractor.extract(await loadImageSource(file.filePath));
    reportResult(result, file.fileName, options.verbose);

    const stem = basename(file.fileName, extname(file.fileName));
    await writeResult(result, file.fileName, format, join(outDir, `${stem}.${format}`), options);

    if (!result.success) failed++;
  }

  console.error(`[INFO] Done: ${scan.files.length - failed} succeeded, ${failed} failed`);
  return failed === 0;
}

program
  .name('gridscan')
  .description('Extract tables from scanned document images into spreadsheets')
  .version(GRIDSCAN_VERSION)
  .argument('[image]', 'Path to the document image (png, jpg, webp, gif, bmp, tiff)')
  .option('-d, --input-dir <directory>', 'Directory of images to process one by one', process.env['GRIDSCAN_INPUT_DIR'])
  .option('-o, --out <path>', 'Output file (or directory with --input-dir); csv/json go to stdout when omitted', process.env['GRIDSCAN_OUTPUT'])
  .option(
    '-f, --format <format>',
    `Output format (${AVAILABLE_FORMATS.join(', ')})`,
    process.env['GRIDSCAN_FORMAT'] ?? 'xlsx'
  )
  .option('--tokens <file>', 'Reconstruct from a JSON token list instead of running OCR')
  .option('--backends <list>', 'Comma-separated backend order (vision, gemini)', process.env['GRIDSCAN_BACKENDS'])
  .option('--presort', 'Sort tokens top to bottom before row clustering', envBool('GRIDSCAN_PRESORT', false))
  .option('--retries <number>', 'Retries per backend on transient errors')
  .option('--sheet-name <name>', 'Worksheet name for xlsx output', process.env['GRIDSCAN_SHEET_NAME'] ?? 'Table')
  .option('-v, --verbose', 'Enable verbose output', envBool('GRIDSCAN_VERBOSE', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('GRIDSCAN_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .action(async (imageFile: string | undefined, options: CliOptions) => {
    try {
      let succeeded: boolean;
      if (options.inputDir !== undefined) {
        succeeded = await processDirectory(options.inputDir, options);
      } else if (imageFile !== undefined || options.tokens !== undefined) {
        succeeded = await processSingle(imageFile, options);
      } else {
        console.error('[ERROR] Either an image file, --tokens or --input-dir must be specified');
        process.exit(1);
      }

      if (!succeeded) {
        process.exit(EXIT_EXTRACTION_FAILED);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (isBackendUnavailableError(error) && error.missing.length > 0) {
        console.error('Add the missing credentials to your .env file, e.g.:');
        for (const name of error.missing) {
          console.error(`  ${name}=...`);
        }
      }
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`[ERROR] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
