/**
 * SIP Pipeline CLI
 *
 * Commands:
 *   sip-pipeline run <path...> [--no-verify]   Run every step, print the run summary
 *   sip-pipeline watch [directory]             Poll a directory, run each new document
 *
 * CRITICAL: NEVER use console.log() for diagnostics - stdout carries the JSON
 * output only. Use console.error() for all logging.
 *
 * @module cli
 */

import { Command } from 'commander';
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { FileWatchSensor } from './services/pipeline/sensor.js';
import { runPipeline } from './services/pipeline/runner.js';
import { formatStepFailure, PipelineStepError } from './services/pipeline/errors.js';
import { applyEnvConfig, getConfig } from './utils/config.js';

export const CLI_NAME = 'sip-pipeline';
export const CLI_VERSION = '1.0.0';

interface RunCommandOptions {
  readonly verify: boolean;
}

/**
 * Load .env from the first candidate that exists:
 * 1. SIP_PIPELINE_ENV_FILE (explicit override)
 * 2. CWD/.env
 *
 * @returns The file loaded, or null
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): string | null {
  const candidates = [env.SIP_PIPELINE_ENV_FILE, path.resolve(process.cwd(), '.env')].filter(
    (candidate): candidate is string => typeof candidate === 'string' && candidate.length > 0
  );

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}

function writeJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function reportFailure(error: unknown): void {
  const stepError =
    error instanceof PipelineStepError ? error : PipelineStepError.fromUnknown('parse_sip', error);
  console.error(JSON.stringify(formatStepFailure(stepError), null, 2));
}

async function executeRun(paths: string[], options: RunCommandOptions): Promise<void> {
  try {
    const result = await runPipeline(paths, {
      verifyContent: options.verify ? undefined : false,
    });
    writeJson(result.summary);
  } catch (error) {
    reportFailure(error);
    process.exitCode = 1;
  }
}

async function executeWatch(directory: string | undefined): Promise<void> {
  const config = getConfig();
  const sensor = new FileWatchSensor({
    directory: directory ?? config.watchDirectory,
    extension: config.fileExtension,
    intervalMs: config.pollIntervalMs,
    keepAlive: true,
    onRunRequest: async (request) => {
      const result = await runPipeline(request.paths);
      writeJson({ run_key: request.runKey, ...result.summary });
    },
  });

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string): void => {
      console.error(`[CLI] Received ${signal}, stopping`);
      sensor.stop();
      resolve();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    sensor.start();
  });
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name(CLI_NAME)
    .version(CLI_VERSION)
    .description('Parse METS submission packages and validate their fixity');

  program
    .command('run')
    .description('Run every pipeline step over one or more METS documents')
    .argument('<paths...>', 'METS XML documents forming one package')
    .option('--no-verify', 'Skip recomputing checksums from file content')
    .action(async (paths: string[], options: RunCommandOptions) => {
      await executeRun(paths, options);
    });

  program
    .command('watch')
    .description('Poll a directory and run the pipeline for each new METS document')
    .argument('[directory]', 'Directory to watch (default: SIP_WATCH_DIR or ./incoming)')
    .action(async (directory: string | undefined) => {
      await executeWatch(directory);
    });

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const envFile = loadEnvironment();
  if (envFile !== null) {
    console.error(`[CLI] Loaded environment from ${envFile}`);
  }
  applyEnvConfig();
  await createProgram().parseAsync([...argv]);
}
