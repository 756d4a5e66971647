import logger, { Logger } from '../../src/utils/logger.js';

describe('Logger', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.VERBOSE;
  });

  it('should log info messages when level allows', () => {
    logger.info('Information message');

    expect(consoleSpy).toHaveBeenCalledWith(
      expect.stringContaining('[INFO]'),
      'Information message'
    );
  });

  it('should log errors through console.error', () => {
    logger.error('Error message');

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('[ERROR]'),
      'Error message'
    );
  });

  it('should log warnings through console.warn', () => {
    logger.warn('Careful', 42);

    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('[WARN]'),
      'Careful',
      42
    );
  });

  it('should skip debug messages at info level', () => {
    const infoLogger = new Logger('info');
    infoLogger.debug('Hidden');

    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it('should pick debug level when VERBOSE is set', () => {
    process.env.VERBOSE = '1';
    const verboseLogger = new Logger();
    verboseLogger.debug('Shown');

    expect(consoleSpy).toHaveBeenCalledWith(
      expect.stringContaining('[DEBUG]'),
      'Shown'
    );
  });

  it('should only log errors at error level', () => {
    const quiet = new Logger('info');
    quiet.setLevel('error');
    quiet.warn('Dropped');
    quiet.info('Dropped');
    quiet.error('Kept');

    expect(console.warn).not.toHaveBeenCalled();
    expect(consoleSpy).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
