import { ConsoleLogger } from './consoleLogger';
import type { RunStarted } from '../types/events';

const event: RunStarted = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'RunStarted',
  payload: { task: 'reverse a string' },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('summarizes events with their type and payload', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.log(event);
    expect(logSpy).toHaveBeenCalledWith('[RunStarted] {"task":"reverse a string"}');

    logger.trace(event, 'hello');
    expect(logSpy).toHaveBeenCalledWith('hello', '[RunStarted] {"task":"reverse a string"}');
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('drops events and debug output when not verbose', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

    const logger = new ConsoleLogger(false);
    logger.log(event);
    logger.trace(event, 'hidden');
    logger.debug('hidden');
    logger.info('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).toHaveBeenCalledWith('shown');
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ stage: 'code' }).child({ attempt: 2 }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[stage=code attempt=2] hello');

    logger.child({ runId: 'r1' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[runId=r1] warn');
  });

  it('writes everything to stderr when asked to', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger(true, {}, 'stderr');
    logger.trace(event, 'hello');
    logger.child({ stage: 'code' }).info('child');

    expect(logSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('hello', '[RunStarted] {"task":"reverse a string"}');
    expect(errorSpy).toHaveBeenCalledWith('[stage=code] child');
  });

  it('keeps verbosity in child loggers', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const child = new ConsoleLogger(false).child({ stage: 'repair' });
    child.debug('hidden');
    const error = new Error('boom');
    child.error(error, 'failed');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('[stage=repair] failed', error);
  });
});
