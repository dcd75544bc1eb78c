/**
 * Claims CLI commands
 *
 * Argument handling and the single-file and batch flows. The entry point
 * only wires process I/O to run().
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import {
  config,
  getMetrics,
  logger,
  processClaimBatch,
  processClaimText,
  type ClaimDocument,
  type ClaimResult,
} from '@claim-triage/core';
import { formatReport } from './report';
import { listDocuments, loadDocument, resultPathFor } from './loader';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

export const USAGE = `Usage: claim-cli (--file <path> | --process-all [dir]) [options]

Options:
  --file <path>         Process one FNOL document (.txt or .pdf)
  --process-all [dir]   Process every document in dir (default: ${config.documentsDir})
  --output <path>       Write the single-file result to a JSON file
  --output-dir <dir>    Directory for batch results (default: ${config.outputDir})
  --json-only           Print JSON only, no readable report
  --metrics             Print Prometheus metrics after processing
  -h, --help            Show this message`;

export interface CliOptions {
  file?: string;
  processAll?: string;
  output?: string;
  outputDir: string;
  jsonOnly: boolean;
  metrics: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        file: { type: 'string' },
        'process-all': { type: 'boolean' },
        output: { type: 'string' },
        'output-dir': { type: 'string' },
        'json-only': { type: 'boolean' },
        metrics: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse CLI arguments. --process-all takes an optional directory, given as
 * the first positional argument.
 *
 * @returns null when help was requested
 * @throws UsageError on unknown options or an invalid combination
 */
export function parseCliArgs(argv: readonly string[]): CliOptions | null {
  const { values, positionals } = readArgs(argv);
  if (values.help) return null;

  const processAll = values['process-all'] === true;
  if (!values.file && !processAll) {
    throw new UsageError('Must specify either --file or --process-all');
  }
  if (values.file && processAll) {
    throw new UsageError('--file and --process-all cannot be combined');
  }
  if (positionals.length > (processAll ? 1 : 0)) {
    throw new UsageError(`Unexpected argument: ${positionals[positionals.length - 1]}`);
  }
  if (values.output && processAll) {
    throw new UsageError('--output applies to --file; use --output-dir with --process-all');
  }

  return {
    file: values.file,
    processAll: processAll ? positionals[0] ?? config.documentsDir : undefined,
    output: values.output,
    outputDir: values['output-dir'] ?? config.outputDir,
    jsonOnly: values['json-only'] === true,
    metrics: values.metrics === true,
  };
}

async function writeResult(result: ClaimResult, outputPath: string): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
  logger.info('Result saved', { output_path: outputPath });
}

async function processFile(options: CliOptions & { file: string }, io: CliIO): Promise<number> {
  let text: string;
  try {
    ({ text } = await loadDocument(options.file));
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const result = processClaimText(text, {
    documentId: path.basename(options.file),
    sourceFile: options.file,
  });

  if (options.output) {
    await writeResult(result, options.output);
  }

  io.stdout(options.jsonOnly ? JSON.stringify(result, null, 2) : formatReport(result));
  return 0;
}

async function processDirectory(options: CliOptions & { processAll: string }, io: CliIO): Promise<number> {
  let files: string[];
  try {
    files = await listDocuments(options.processAll);
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  if (files.length === 0) {
    io.stderr(`Error: No FNOL documents found in ${options.processAll}`);
    return 1;
  }

  logger.info('Processing documents', { directory: options.processAll, count: files.length });

  const documents: ClaimDocument[] = [];
  for (const file of files) {
    try {
      const { text } = await loadDocument(file);
      documents.push({ documentId: path.basename(file), text, sourceFile: file });
    } catch (error) {
      io.stderr(`Error processing ${path.basename(file)}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const summary: Array<{ document: string; recommendedRoute: string; outputPath: string }> = [];

  for (const outcome of processClaimBatch(documents)) {
    if (outcome.status === 'failed') {
      io.stderr(`Error processing ${outcome.documentId}: ${outcome.error.message}`);
      continue;
    }

    const outputPath = resultPathFor(outcome.documentId, options.outputDir);
    await writeResult(outcome.result, outputPath);
    summary.push({ document: outcome.documentId, recommendedRoute: outcome.result.recommendedRoute, outputPath });

    if (!options.jsonOnly) {
      io.stdout(formatReport(outcome.result, outcome.documentId));
    }
  }

  if (options.jsonOnly) {
    io.stdout(JSON.stringify(summary, null, 2));
  } else {
    io.stdout(`Processing complete: ${summary.length} of ${files.length} documents. Results saved to: ${options.outputDir}`);
  }
  return 0;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  let options: CliOptions | null;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${USAGE}\n\nError: ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (options === null) {
    io.stdout(USAGE);
    return 0;
  }

  const { file, processAll } = options;
  const exitCode =
    file !== undefined
      ? await processFile({ ...options, file }, io)
      : processAll !== undefined
        ? await processDirectory({ ...options, processAll }, io)
        : 1;

  if (options.metrics) {
    const metrics = await getMetrics();
    // Keep stdout parseable as JSON
    (options.jsonOnly ? io.stderr : io.stdout)(metrics);
  }

  return exitCode;
}
