import { describe, expect, it } from 'vitest';

import { createLogger, formatLogLine } from '../logger.js';

describe('logger', () => {
  it('formats level, message and data', () => {
    expect(formatLogLine('warn', 'disk low', { free: 1 })).toBe('[warn] disk low {"free":1}');
    expect(formatLogLine('info', 'ready')).toBe('[info] ready');
  });

  it('drops messages below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('info', (line) => lines.push(line));
    logger.debug('hidden');
    logger.info('shown');
    logger.error('also shown');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('[info] shown');
    expect(lines[1]).toContain('[error] also shown');
  });

  it('stays quiet when silent', () => {
    const lines: string[] = [];
    const logger = createLogger('silent', (line) => lines.push(line));
    logger.error('nope');
    expect(lines).toEqual([]);
  });
});
