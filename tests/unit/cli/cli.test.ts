/**
 * Unit tests for the command line interface
 *
 * @see src/cli.ts
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { CLI_NAME, CLI_VERSION, createProgram, loadEnvironment } from '../../../src/cli.js';
import { resetConfig } from '../../../src/utils/config.js';
import { createTempDir, removeTempDir, stagePackage } from '../../fixtures/builders.js';

/** First JSON document among the first arguments of the spied calls */
function jsonOutput(calls: ReadonlyArray<readonly unknown[]>): unknown {
  const line = calls.map((call) => String(call[0])).find((text) => text.startsWith('{'));
  return line === undefined ? undefined : JSON.parse(line);
}

describe('createProgram', () => {
  it('should register the run and watch commands', () => {
    const program = createProgram();
    expect(program.name()).toBe(CLI_NAME);
    expect(program.version()).toBe(CLI_VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(['run', 'watch']);
  });
});

describe('loadEnvironment', () => {
  let envDir: string;

  beforeAll(() => {
    envDir = createTempDir('cli-env');
  });

  afterAll(() => {
    removeTempDir(envDir);
  });

  afterEach(() => {
    delete process.env.SIP_TEST_PLACEHOLDER;
    vi.restoreAllMocks();
  });

  it('should load the file named by SIP_PIPELINE_ENV_FILE', () => {
    const envFile = path.join(envDir, 'custom.env');
    fs.writeFileSync(envFile, 'SIP_TEST_PLACEHOLDER=test-secret\n');

    expect(loadEnvironment({ SIP_PIPELINE_ENV_FILE: envFile })).toBe(envFile);
    expect(process.env.SIP_TEST_PLACEHOLDER).toBe('test-secret');
  });

  it('should return null when no candidate exists', () => {
    vi.spyOn(process, 'cwd').mockReturnValue(path.join(envDir, 'empty'));
    expect(loadEnvironment({ SIP_PIPELINE_ENV_FILE: path.join(envDir, 'missing.env') })).toBeNull();
  });
});

describe('run command', () => {
  let testDir: string;
  let metsPath: string;

  beforeAll(() => {
    testDir = createTempDir('cli-run');
    metsPath = stagePackage(testDir);
  });

  afterAll(() => {
    removeTempDir(testDir);
  });

  afterEach(() => {
    process.exitCode = undefined;
    resetConfig();
    vi.restoreAllMocks();
  });

  it('should print the run summary as JSON on stdout', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await createProgram().parseAsync(['node', CLI_NAME, 'run', metsPath]);

    expect(jsonOutput(writeSpy.mock.calls)).toMatchObject({
      sip: { sip_id: 'SIP-0001' },
      fixities: { status_counts: { verified: 2, unverified: 1 } },
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('should skip content verification with --no-verify', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await createProgram().parseAsync(['node', CLI_NAME, 'run', metsPath, '--no-verify']);

    expect(jsonOutput(writeSpy.mock.calls)).toMatchObject({
      fixities: { status_counts: { unverified: 3 } },
    });
  });

  it('should report failures on stderr and set the exit code', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await createProgram().parseAsync(['node', CLI_NAME, 'run', path.join(testDir, 'missing.xml')]);

    expect(jsonOutput(writeSpy.mock.calls)).toBeUndefined();
    expect(process.exitCode).toBe(1);
    expect(jsonOutput(errorSpy.mock.calls)).toMatchObject({
      success: false,
      error: { step: 'parse_sip', kind: 'PARSE_ERROR' },
    });
  });
});
