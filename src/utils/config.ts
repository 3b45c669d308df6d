/**
 * Pipeline Configuration
 *
 * Process-wide configuration with environment overrides.
 * FAIL FAST: invalid values throw ValidationError, they are never clamped.
 *
 * CRITICAL: NEVER use console.log() - stdout carries the CLI's JSON output.
 *
 * @module utils/config
 */

import path from 'path';
import {
  EnvConfigInput,
  PipelineConfigSchema,
  validateInput,
  type PipelineConfig,
} from './validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_POLL_INTERVAL_MS = 30_000;

const defaultConfig: PipelineConfig = {
  watchDirectory: path.resolve(process.cwd(), 'incoming'),
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  fileExtension: '.xml',
  verifyContent: true,
};

let config: PipelineConfig = { ...defaultConfig };

// ═══════════════════════════════════════════════════════════════════════════════
// ACCESSORS
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): Readonly<PipelineConfig> {
  return config;
}

/**
 * Merge a partial update into the current configuration
 * @throws ValidationError if the merged configuration is invalid
 */
export function updateConfig(updates: Partial<PipelineConfig>): Readonly<PipelineConfig> {
  config = validateInput(PipelineConfigSchema, { ...config, ...updates });
  return config;
}

export function resetConfig(): void {
  config = { ...defaultConfig };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Translate SIP_* environment variables into configuration overrides.
 *
 * @param env - Environment to read, process.env by default
 * @returns Only the keys that were set
 * @throws ValidationError naming every invalid variable
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<PipelineConfig> {
  const parsed = validateInput(EnvConfigInput, {
    SIP_WATCH_DIR: env.SIP_WATCH_DIR,
    SIP_POLL_INTERVAL_SECONDS: env.SIP_POLL_INTERVAL_SECONDS,
    SIP_FILE_EXTENSION: env.SIP_FILE_EXTENSION,
    SIP_VERIFY_CONTENT: env.SIP_VERIFY_CONTENT,
  });

  const overrides: Partial<PipelineConfig> = {};
  if (parsed.SIP_WATCH_DIR !== undefined) {
    overrides.watchDirectory = path.resolve(parsed.SIP_WATCH_DIR);
  }
  if (parsed.SIP_POLL_INTERVAL_SECONDS !== undefined) {
    overrides.pollIntervalMs = parsed.SIP_POLL_INTERVAL_SECONDS * 1000;
  }
  if (parsed.SIP_FILE_EXTENSION !== undefined) {
    overrides.fileExtension = parsed.SIP_FILE_EXTENSION;
  }
  if (parsed.SIP_VERIFY_CONTENT !== undefined) {
    overrides.verifyContent = parsed.SIP_VERIFY_CONTENT;
  }
  return overrides;
}

/**
 * Apply environment overrides to the process-wide configuration
 */
export function applyEnvConfig(env: NodeJS.ProcessEnv = process.env): Readonly<PipelineConfig> {
  const overrides = readEnvConfig(env);
  for (const [key, value] of Object.entries(overrides)) {
    console.error(`[Config] ${key}=${String(value)}`);
  }
  return updateConfig(overrides);
}
