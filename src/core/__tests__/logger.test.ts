import { LogManager, getLogger } from '../logger';

describe('LogManager', () => {
  const manager = LogManager.getInstance();

  afterEach(() => {
    manager.setLogLevel('info');
    jest.restoreAllMocks();
  });

  it('prefixes messages with their source', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);

    getLogger('Test').info('hello');

    expect(info).toHaveBeenCalledWith('[Test] hello');
  });

  it('passes context through as a second argument', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    getLogger('Test').error('failed', { path: 'a.dxf' });

    expect(error).toHaveBeenCalledWith('[Test] failed', { path: 'a.dxf' });
  });

  it('drops messages below the current level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    manager.setLogLevel('warn');
    const log = getLogger('Test');
    log.debug('hidden');
    log.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('hands out one logger per source', () => {
    expect(manager.getLogger('Same')).toBe(manager.getLogger('Same'));
    expect(manager.getLogLevel()).toBe('info');
  });
});
