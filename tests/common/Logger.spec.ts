import Logger from '../../lib/common/Logger';
import MockLogger from '../mocks/MockLogger';

describe('Logger', () => {
  it('should route all log levels to the custom logger given.', () => {
    const customLogger = new MockLogger();
    Logger.initialize(customLogger);

    Logger.info('info message');
    Logger.warn('warning message');
    Logger.error('error message');

    expect(customLogger.infos).toEqual(['info message']);
    expect(customLogger.warnings).toEqual(['warning message']);
    expect(customLogger.errors).toEqual(['error message']);
  });

  it('should keep the current logger if no custom logger is given.', () => {
    const customLogger = new MockLogger();
    Logger.initialize(customLogger);
    Logger.initialize(undefined);

    Logger.info('still captured');

    expect(customLogger.infos).toEqual(['still captured']);
  });
});
