import { describe, it, expect, vi } from 'vitest';
import { createStderrLogger, silentLogger } from './logger.js';
import { StringSink } from './dot/emitter.js';

describe('createStderrLogger', () => {
  it('prefixes each line with its level', () => {
    const sink = new StringSink();
    const logger = createStderrLogger({ stream: sink });

    logger.info('reading listing');
    logger.warning('Skipping malformed line: Line 2');
    logger.error('failed');

    expect(sink.toString()).toBe(
      '[info] reading listing\n[warning] Skipping malformed line: Line 2\n[error] failed\n',
    );
  });

  it('drops debug lines unless verbose', () => {
    const quiet = new StringSink();
    const verbose = new StringSink();

    createStderrLogger({ stream: quiet }).debug('details');
    createStderrLogger({ stream: verbose, verbose: true }).debug('details');

    expect(quiet.toString()).toBe('');
    expect(verbose.toString()).toBe('[debug] details\n');
  });

  it('writes to process.stderr by default', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createStderrLogger().info('hello');

    expect(write).toHaveBeenCalledWith('[info] hello\n');
    write.mockRestore();
  });
});

describe('silentLogger', () => {
  it('accepts every level without output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    silentLogger.info('x');
    silentLogger.debug('x');

    expect(log).not.toHaveBeenCalled();
    log.mockRestore();
  });
});
