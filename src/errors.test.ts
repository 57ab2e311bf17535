/**
 * Tests for discovery errors and formatCliError.
 */
import { describe, it, expect } from 'vitest';
import {
  AddressLookupError,
  DiscoveryError,
  HardFailure,
  NoRecordsError,
  PromptFailure,
  ServerConnectError,
  classifyClientFailure,
  formatCliError,
} from './errors.js';
import { z } from 'zod';

describe('DiscoveryError', () => {
  it('creates error with message, type, and fix', () => {
    const error = new DiscoveryError('Test error', 'testType', 'Fix: do something');

    expect(error.message).toBe('Test error');
    expect(error.name).toBe('DiscoveryError');
    expect(error.type).toBe('testType');
    expect(error.fix).toBe('Fix: do something');
  });

  it('keeps the cause', () => {
    const cause = new Error('root');
    const error = new DiscoveryError('Wrapped', 'wrapped', 'none', { cause });

    expect(error.cause).toBe(cause);
  });
});

describe('ServerConnectError', () => {
  it('names the server and keeps the transport error', () => {
    const cause = new Error('connect ECONNREFUSED');
    const error = new ServerConnectError('example.test', cause);

    expect(error).toBeInstanceOf(DiscoveryError);
    expect(error.name).toBe('ServerConnectError');
    expect(error.type).toBe('connectFailed');
    expect(error.serverName).toBe('example.test');
    expect(error.cause).toBe(cause);
  });
});

describe('HardFailure', () => {
  it('creates a url failure', () => {
    const error = HardFailure.invalidUrl('not a url');

    expect(error.reason).toBe('url');
    expect(error.type).toBe('invalidUrl');
    expect(error.message).toBe('Invalid base URL: not a url');
  });

  it('creates a validation failure', () => {
    const error = HardFailure.validation('https://matrix.example.test/_matrix/client/versions', 'HTTP 502');

    expect(error.reason).toBe('http');
    expect(error.type).toBe('validationFailed');
    expect(error.message).toBe(
      'Validation of https://matrix.example.test/_matrix/client/versions failed: HTTP 502'
    );
  });
});

describe('address errors', () => {
  it('creates NoRecordsError for a host', () => {
    const error = new NoRecordsError('missing.test');

    expect(error.message).toBe('No address records for missing.test');
    expect(error.type).toBe('noRecords');
  });

  it('creates AddressLookupError with cause', () => {
    const cause = new Error('ESERVFAIL');
    const error = new AddressLookupError('broken.test', cause);

    expect(error.type).toBe('lookupFailed');
    expect(error.cause).toBe(cause);
  });
});

describe('classifyClientFailure', () => {
  it('maps PromptFailure to prompt', () => {
    expect(classifyClientFailure(new PromptFailure('example.test', 'unreachable'))).toBe('prompt');
  });

  it('maps HardFailure to fail', () => {
    expect(classifyClientFailure(HardFailure.invalidUrl('::'))).toBe('fail');
  });

  it('returns null for anything else', () => {
    expect(classifyClientFailure(new ServerConnectError('example.test'))).toBeNull();
    expect(classifyClientFailure('string')).toBeNull();
  });
});

describe('formatCliError', () => {
  it('formats Zod validation errors', () => {
    const result = z.object({ WELL_KNOWN_SCHEME: z.enum(['https', 'http']) }).safeParse({
      WELL_KNOWN_SCHEME: 'ftp',
    });
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    const formatted = formatCliError(result.error);

    expect(formatted.split('\n')[0]).toBe('Configuration validation failed:');
    expect(formatted).toContain('  WELL_KNOWN_SCHEME: ');
    expect(formatted).toContain('Fix: Check your environment variables.');
  });

  it('formats discovery errors with their fix', () => {
    const error = new NoRecordsError('missing.test');

    expect(formatCliError(error)).toBe(
      [
        'No address records for missing.test',
        '',
        'Fix: Add an A or AAAA record for missing.test, or check the delegation that points at it.',
      ].join('\n')
    );
  });

  it('formats unexpected errors with the subject', () => {
    expect(formatCliError(new Error('boom'), 'example.test')).toBe(
      [
        'Unexpected error while resolving example.test: boom',
        '',
        'Fix: Check your configuration and try again.',
      ].join('\n')
    );
  });

  it('formats unexpected errors without a subject', () => {
    expect(formatCliError(new Error('boom')).split('\n')[0]).toBe('Unexpected error: boom');
  });
});
