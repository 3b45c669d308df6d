/**
 * Unit Tests for Validation Schemas
 *
 * @see src/utils/validation.ts
 */

import { describe, it, expect } from 'vitest';
import {
  EnvConfigInput,
  ParseSipInput,
  PipelineConfigSchema,
  RunPipelineInput,
  validateInput,
} from '../../../src/utils/validation.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('validateInput', () => {
  it('should return validated data for valid input', () => {
    const result = validateInput(ParseSipInput, { paths: ['mets.xml'] });
    expect(result.paths).toEqual(['mets.xml']);
  });

  it('should throw ValidationError for invalid input', () => {
    expect(() => validateInput(ParseSipInput, { paths: [] })).toThrow(ValidationError);
  });

  it('should include field path in error message', () => {
    expect(() => validateInput(ParseSipInput, { paths: [] })).toThrow(
      'paths: At least one METS XML file path must be provided'
    );
  });

  it('should include the array index for element errors', () => {
    expect(() => validateInput(ParseSipInput, { paths: ['a.xml', '   '] })).toThrow(
      'paths.1: File path must not be empty'
    );
  });
});

describe('ParseSipInput', () => {
  it('should trim paths', () => {
    expect(ParseSipInput.parse({ paths: ['  mets.xml '] }).paths).toEqual(['mets.xml']);
  });

  it('should reject a missing paths field', () => {
    expect(ParseSipInput.safeParse({}).success).toBe(false);
  });
});

describe('RunPipelineInput', () => {
  it('should accept an optional verifyContent flag', () => {
    expect(RunPipelineInput.parse({ paths: ['a.xml'] }).verifyContent).toBeUndefined();
    expect(RunPipelineInput.parse({ paths: ['a.xml'], verifyContent: false }).verifyContent).toBe(false);
  });

  it('should reject a non-boolean verifyContent', () => {
    expect(RunPipelineInput.safeParse({ paths: ['a.xml'], verifyContent: 'no' }).success).toBe(false);
  });
});

describe('PipelineConfigSchema', () => {
  const valid = {
    watchDirectory: '/srv/incoming',
    pollIntervalMs: 30000,
    fileExtension: '.xml',
    verifyContent: true,
  };

  it('should accept a complete configuration', () => {
    expect(PipelineConfigSchema.parse(valid)).toEqual(valid);
  });

  it.each([
    ['pollIntervalMs', 0],
    ['pollIntervalMs', 1.5],
    ['fileExtension', 'xml'],
    ['fileExtension', '.x ml'],
    ['watchDirectory', ''],
  ])('should reject %s=%j', (key, value) => {
    expect(PipelineConfigSchema.safeParse({ ...valid, [key]: value }).success).toBe(false);
  });
});

describe('EnvConfigInput', () => {
  it('should accept an empty environment', () => {
    expect(EnvConfigInput.parse({})).toEqual({});
  });

  it('should coerce the poll interval', () => {
    expect(EnvConfigInput.parse({ SIP_POLL_INTERVAL_SECONDS: '15' }).SIP_POLL_INTERVAL_SECONDS).toBe(15);
  });

  it.each([
    ['true', true],
    ['1', true],
    ['yes', true],
    ['false', false],
    ['0', false],
    ['no', false],
  ])('should read SIP_VERIFY_CONTENT=%s as %s', (raw, expected) => {
    expect(EnvConfigInput.parse({ SIP_VERIFY_CONTENT: raw }).SIP_VERIFY_CONTENT).toBe(expected);
  });

  it('should reject a fractional poll interval', () => {
    expect(() => validateInput(EnvConfigInput, { SIP_POLL_INTERVAL_SECONDS: '1.5' })).toThrow(
      'SIP_POLL_INTERVAL_SECONDS: SIP_POLL_INTERVAL_SECONDS must be an integer'
    );
  });

  it('should reject an unknown boolean spelling', () => {
    expect(() => validateInput(EnvConfigInput, { SIP_VERIFY_CONTENT: 'maybe' })).toThrow('SIP_VERIFY_CONTENT:');
  });
});
