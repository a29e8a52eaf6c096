import { describe, it, expect, beforeEach } from 'vitest';
import { Logger, isLogLevel } from '../../../src/utils/logger';

describe('Logger', () => {
  let lines: Array<Record<string, unknown>>;
  const destination = {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };

  beforeEach(() => {
    lines = [];
  });

  it('should write structured entries', () => {
    const logger = Logger.create({ name: 'gate-test', level: 'info', destination });

    logger.info('Loaded policy table', { rules: 4 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ name: 'gate-test', msg: 'Loaded policy table', rules: 4, level: 30 });
  });

  it('should drop entries below the configured level', () => {
    const logger = Logger.create({ level: 'warn', destination });

    logger.debug('decision');
    logger.info('loaded');
    logger.warn('denied', { role: 'any' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ msg: 'denied', role: 'any' });
  });

  it('should serialize errors under err', () => {
    const logger = Logger.create({ destination });

    logger.error('error enforcing', new Error('adapter offline'));

    expect(lines[0].msg).toBe('error enforcing');
    expect(lines[0].err).toMatchObject({ type: 'Error', message: 'adapter offline' });
  });

  it('should carry child bindings', () => {
    const logger = Logger.create({ destination }).child({ component: 'policy' });

    logger.info('reloaded');

    expect(lines[0]).toMatchObject({ component: 'policy', msg: 'reloaded' });
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
