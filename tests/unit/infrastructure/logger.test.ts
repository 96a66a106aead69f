/**
 * @fileoverview Unit tests for the console loggers
 */

import { createConsoleLogger, silentLogger } from '../../../src';

describe('Console logger', () => {
  let debug: jest.SpyInstance;
  let info: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should drop messages below the threshold', () => {
    const logger = createConsoleLogger({ level: 'info' });

    logger.debug('hidden');
    logger.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('[INFO] shown');
  });

  it('should prefix messages and pass extra arguments', () => {
    const logger = createConsoleLogger({ level: 'debug', prefix: 'state-invoker' });

    logger.debug('Dispatching', { id: 'app.create_user' });

    expect(debug).toHaveBeenCalledWith('[state-invoker] [DEBUG] Dispatching', { id: 'app.create_user' });
  });

  it('should write nothing when silent', () => {
    silentLogger.warn('hidden');
    silentLogger.info('hidden');

    expect(warn).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });
});
