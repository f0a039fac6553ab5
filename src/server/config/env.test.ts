import { describe, it, expect, vi, afterEach } from 'vitest';
import { getEnv, resetEnv } from './env.js';

describe('getEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
  });

  it('falls back to defaults for unset values', () => {
    vi.stubEnv('CHUNK_MAX_CHARS', '');
    vi.stubEnv('CANDIDATE_CAP', '');
    vi.stubEnv('CHUNK_HEADING_INFERENCE', '');
    resetEnv();

    const env = getEnv();

    expect(env.CHUNK_MAX_CHARS).toBe(2000);
    expect(env.CANDIDATE_CAP).toBe(250);
    expect(env.CHUNK_HEADING_INFERENCE).toBe('auto');
  });

  it('parses configured values', () => {
    vi.stubEnv('CHUNK_MAX_CHARS', '1500');
    vi.stubEnv('CHUNK_RETAIN_NOISE', 'true');
    vi.stubEnv('CHUNK_PAGE_BREAK_FILL_RATIO', '0.5');
    resetEnv();

    const env = getEnv();

    expect(env.CHUNK_MAX_CHARS).toBe(1500);
    expect(env.CHUNK_RETAIN_NOISE).toBe(true);
    expect(env.CHUNK_PAGE_BREAK_FILL_RATIO).toBe(0.5);
  });

  it('caches until reset', () => {
    vi.stubEnv('CHUNK_MAX_CHARS', '1500');
    resetEnv();
    expect(getEnv().CHUNK_MAX_CHARS).toBe(1500);

    vi.stubEnv('CHUNK_MAX_CHARS', '1800');
    expect(getEnv().CHUNK_MAX_CHARS).toBe(1500);

    resetEnv();
    expect(getEnv().CHUNK_MAX_CHARS).toBe(1800);
  });

  it('rejects invalid values', () => {
    vi.stubEnv('CHUNK_MAX_CHARS', '50');
    resetEnv();
    expect(() => getEnv()).toThrow(/CHUNK_MAX_CHARS: Invalid value "50"/);

    vi.stubEnv('CHUNK_MAX_CHARS', '');
    vi.stubEnv('CHUNK_HEADING_INFERENCE', 'sometimes');
    resetEnv();
    expect(() => getEnv()).toThrow(/CHUNK_HEADING_INFERENCE/);
  });
});
