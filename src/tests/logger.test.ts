import { Logger } from '../shared/logger';

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('1. writes level, message and JSON context', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.useFakeTimers().setSystemTime(new Date('2025-01-15T12:00:00.000Z'));

    new Logger('info').info('Account registered', { username: 'alice' });

    expect(log).toHaveBeenCalledWith('[2025-01-15T12:00:00.000Z] [INFO] Account registered {"username":"alice"}');
    jest.useRealTimers();
  });

  test('2. drops messages below the configured level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('3. silent suppresses errors too', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger('silent');

    logger.error('hidden', new Error('boom'));
    logger.setLevel('error');
    logger.error('shown', new Error('boom'));

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toContain('[ERROR] shown {"error":"boom"');
  });
});
