import { createLogger, isLogLevel } from '../logger';

describe('createLogger', () => {
  it('writes prefixed lines at or above the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('info', (line) => lines.push(line));
    logger.debug('hidden');
    logger.info('loaded 3 entries');
    logger.error('boom');
    expect(lines).toEqual(['[ql] info: loaded 3 entries', '[ql] error: boom']);
  });

  it('writes nothing when silent', () => {
    const lines: string[] = [];
    const logger = createLogger('silent', (line) => lines.push(line));
    logger.error('boom');
    expect(lines).toEqual([]);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
