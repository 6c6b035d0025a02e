import { ConsoleLogger } from '../../../src/adapters/sys/ConsoleLogger';

describe('ConsoleLogger', () => {
  let debugSpy: jest.SpyInstance;
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('debug is silent unless enabled', () => {
    new ConsoleLogger().debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ debug: true }).debug('hello', { a: 1 });
    expect(debugSpy).toHaveBeenCalledWith('hello {"a":1}');
  });

  test('info logs message only when no meta', () => {
    new ConsoleLogger().info('world');
    expect(infoSpy).toHaveBeenCalledWith('world');
  });

  test('warn prepends the prefix', () => {
    new ConsoleLogger({ prefix: '[timers]' }).warn('careful');
    expect(warnSpy).toHaveBeenCalledWith('[timers] careful');
  });

  test('error logs with meta when provided', () => {
    new ConsoleLogger().error('oops', { reason: 'bad' });
    expect(errorSpy).toHaveBeenCalledWith('oops {"reason":"bad"}');
  });

  test('empty meta is omitted', () => {
    new ConsoleLogger().info('plain', {});
    expect(infoSpy).toHaveBeenCalledWith('plain');
  });
});
