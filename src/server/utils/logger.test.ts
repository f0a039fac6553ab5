import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, runContext } from './logger.js';

function captureLogger(): { lines: Array<Record<string, unknown>>; log: ReturnType<typeof createLogger> } {
  const lines: Array<Record<string, unknown>> = [];
  const log = createLogger({
    write: (msg: string) => {
      lines.push(JSON.parse(msg));
    },
  });
  return { lines, log };
}

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('adds the active run context to every line', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const { lines, log } = captureLogger();
    const child = log.child({ component: 'contract-cli' });

    runContext.run({ command: 'extract', target: 'contract.json' }, () => {
      child.info('inside');
    });
    child.info('outside');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      level: 'info',
      component: 'contract-cli',
      command: 'extract',
      target: 'contract.json',
      msg: 'inside',
    });
    expect(lines[1].msg).toBe('outside');
    expect(lines[1].command).toBeUndefined();
  });

  it('is silent under test by default', () => {
    vi.stubEnv('LOG_LEVEL', '');
    const { lines, log } = captureLogger();

    log.error('hidden');

    expect(lines).toEqual([]);
  });
});
