/**
 * Tests for resolver wiring
 */

import { describe, it, expect, vi } from 'vitest';
import { createResolvers } from './orchestrator.js';
import { ServerResolver } from './server.js';
import { ClientResolver } from './client.js';
import { MemoryBackend } from '../transport/memory.js';
import { NodeBackend } from '../transport/backend.js';
import type { Config } from '../config/schema.js';
import type { Logger } from '../config/logger.js';

const mockLogger = {
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
  level: 'info',
} as unknown as Logger;

const mockConfig: Config = {
  LOG_LEVEL: 'info',
  HTTP_TIMEOUT_MS: 10000,
  DNS_TIMEOUT_MS: 3000,
  WELL_KNOWN_SCHEME: 'https',
  WELL_KNOWN_PORT: undefined,
};

describe('createResolvers', () => {
  it('builds both resolvers over a NodeBackend by default', () => {
    const resolvers = createResolvers(mockConfig, mockLogger);

    expect(resolvers.server).toBeInstanceOf(ServerResolver);
    expect(resolvers.client).toBeInstanceOf(ClientResolver);
    expect(resolvers.backend).toBeInstanceOf(NodeBackend);
  });

  it('passes the configured scheme and port to the server resolver', async () => {
    const backend = new MemoryBackend().respond(
      'http://example.test:8080/.well-known/matrix/server',
      200,
      { 'm.server': '1.2.3.4' }
    );
    const resolvers = createResolvers(
      { ...mockConfig, WELL_KNOWN_SCHEME: 'http', WELL_KNOWN_PORT: 8080 },
      mockLogger,
      backend
    );

    expect(await resolvers.server.resolve('example.test')).toEqual({ kind: 'ip', ip: '1.2.3.4' });
  });

  it('passes the configured scheme to the client resolver', async () => {
    const backend = new MemoryBackend();
    const resolvers = createResolvers({ ...mockConfig, WELL_KNOWN_SCHEME: 'http' }, mockLogger, backend);

    const url = await resolvers.client.resolve('example.test');

    expect(url.href).toBe('http://example.test/');
    expect(backend.requested('get')).toEqual(['http://example.test/.well-known/matrix/client']);
  });

  it('shares one backend between both resolvers', async () => {
    const backend = new MemoryBackend();
    const resolvers = createResolvers(mockConfig, mockLogger, backend);

    await resolvers.server.resolve('example.test');
    await resolvers.client.resolve('example.test');

    expect(resolvers.backend).toBe(backend);
    expect(backend.requested('get')).toEqual([
      'https://example.test/.well-known/matrix/server',
      'https://example.test/.well-known/matrix/client',
    ]);
  });
});
