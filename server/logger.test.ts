import { describe, expect, it, vi } from 'vitest';
import { createLogger, formatLine } from './logger.js';

describe('logger', () => {
  it('prefixes the scope, time and level', () => {
    const line = formatLine('server', 'warn', 'Disk almost full', new Date('2024-05-01T12:00:00.000Z'));
    expect(line).toBe('[server] 2024-05-01T12:00:00.000Z WARN Disk almost full');
  });

  it('drops lines below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('server', 'info');

    logger.debug('hidden');
    logger.info('shown');
    logger.error('broken');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[server\] \S+ INFO shown$/);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/^\[server\] \S+ ERROR broken$/);
  });

  it('nests child scopes', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('server', 'debug').child('whisper').debug('loading model');

    expect(log.mock.calls[0][0]).toMatch(/^\[server\/whisper\] \S+ DEBUG loading model$/);
  });
});
