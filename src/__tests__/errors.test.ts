import { describe, it, expect, vi, afterEach } from 'vitest';
import { ChunkerError, ConfigError, ChunkingError } from '../errors.js';
import { parseConfig, DEFAULT_CHUNKER_CONFIG } from '../config.js';
import { CodeChunker } from '../core/chunker.js';
import { toFileRecord } from '../core/file-record.js';
import { FakeSplitter } from '../__test__/fake-splitter.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ConfigError', () => {
  it('is raised for invalid configuration and names the offending key', () => {
    const attempt = () => parseConfig({ smallMaxChars: 100 });
    expect(attempt).toThrow(ConfigError);
    expect(attempt).toThrow(ChunkerError);
    expect(attempt).toThrow(
      'Invalid configuration:\n  smallMaxChars: tier thresholds must be strictly ascending (tiny < small < medium)',
    );
  });
});

describe('ChunkingError', () => {
  it('keeps the wrapped error as its cause', () => {
    const cause = new Error('root cause');
    const err = new ChunkingError('wrapper', cause);
    expect(err).toBeInstanceOf(ChunkerError);
    expect(err.name).toBe('ChunkingError');
    expect(err.cause).toBe(cause);
  });

  it('wraps a splitter failure and logs its cause', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const chunker = new CodeChunker({
      config: DEFAULT_CHUNKER_CONFIG,
      splitter: new FakeSplitter(() => {
        throw new Error('boom');
      }),
    });

    const chunks = await chunker.chunkFile(toFileRecord('err.txt', 'e'.repeat(800), 'unknown'), 1);

    expect(chunks).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith(
      'Chunking failed for "err.txt", falling back to a single chunk: '
      + 'ChunkingError: Generic splitter failed on small file "err.txt" (cause: Error: boom)',
    );
  });
});
