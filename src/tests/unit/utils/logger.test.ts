import { Logger, createLogger, LogContext } from '../../../utils';
import * as winston from 'winston';
jest.mock('winston', () => ({
  createLogger: jest.fn(() => ({
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
  })),
  format: {
    combine: jest.fn((...formats) => formats),
    timestamp: jest.fn(() => 'timestamp-format'),
    colorize: jest.fn(() => 'colorize-format'),
    printf: jest.fn(callback => callback),
    json: jest.fn(() => 'json-format'),
  },
  transports: {
    Console: jest.fn(),
    File: jest.fn(),
  },
}));

interface MockWinstonLogger {
  error: jest.Mock;
  warn: jest.Mock;
  info: jest.Mock;
  debug: jest.Mock;
}

describe('Logger', () => {
  let mockWinstonLogger: MockWinstonLogger;
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    mockWinstonLogger = {
      error: jest.fn(),
      warn: jest.fn(),
      info: jest.fn(),
      debug: jest.fn(),
    };
    (winston.createLogger as jest.Mock).mockReturnValue(mockWinstonLogger);
  });
  afterEach(() => {
    process.env.LOG_LEVEL = originalLevel;
    jest.clearAllMocks();
  });

  describe('Logger class', () => {
    it('should create logger with console transport only when no logFile provided', () => {
      process.env.LOG_LEVEL = 'debug';
      new Logger('test-service');
      expect(winston.createLogger).toHaveBeenCalledWith({
        level: 'debug',
        defaultMeta: { service: 'test-service' },
        transports: [expect.any(winston.transports.Console)],
        exitOnError: false,
      });
    });
    it('should create logger with console and file transports when logFile provided', () => {
      process.env.LOG_LEVEL = 'warn';
      new Logger('test-service', 'test.log');
      expect(winston.createLogger).toHaveBeenCalledWith({
        level: 'warn',
        defaultMeta: { service: 'test-service' },
        transports: [
          expect.any(winston.transports.Console),
          expect.any(winston.transports.File),
          expect.any(winston.transports.File),
        ],
        exitOnError: false,
      });
    });
    it('should fall back to info for an unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';
      new Logger('test-service');
      expect(winston.createLogger).toHaveBeenCalledWith(expect.objectContaining({ level: 'info' }));
    });
    it('should create error file transport with correct filename', () => {
      new Logger('test-service', 'path/to/application.log');
      expect(winston.transports.File).toHaveBeenCalledWith({
        filename: 'path/to/application.log',
        format: expect.any(Array),
      });
      expect(winston.transports.File).toHaveBeenCalledWith({
        filename: 'path/to/application-error.log',
        level: 'error',
        format: expect.any(Array),
      });
    });

    describe('console format', () => {
      type Printer = (info: Record<string, unknown>) => string;

      const consolePrinter = (): Printer => {
        new Logger('grid-bot');
        const calls = (winston.format.printf as jest.Mock).mock.calls;
        return calls[calls.length - 1][0];
      };

      it('should print bigint context values as strings', () => {
        const print = consolePrinter();
        expect(
          print({ timestamp: '12:00:00', level: 'info', message: 'Deposited', service: 'grid-bot', amount: 5n })
        ).toBe('12:00:00 [grid-bot] info: Deposited {"amount":"5"}');
      });

      it('should omit an empty context', () => {
        const print = consolePrinter();
        expect(print({ timestamp: '12:00:00', level: 'warn', message: 'Bot paused', service: 'grid-bot' })).toBe(
          '12:00:00 [grid-bot] warn: Bot paused'
        );
      });
    });

    describe('logging methods', () => {
      let testLogger: Logger;
      beforeEach(() => {
        testLogger = new Logger('test-service');
      });
      it('should forward each level with its context', () => {
        const context: LogContext = { level: 4, side: 'sell' };
        testLogger.error('Test error message', context);
        testLogger.warn('Test warning message', context);
        testLogger.info('Test info message', context);
        testLogger.debug('Test debug message');
        expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', context);
        expect(mockWinstonLogger.warn).toHaveBeenCalledWith('Test warning message', context);
        expect(mockWinstonLogger.info).toHaveBeenCalledWith('Test info message', context);
        expect(mockWinstonLogger.debug).toHaveBeenCalledWith('Test debug message', undefined);
      });
    });
  });

  describe('createLogger function', () => {
    it('should create a Logger instance', () => {
      expect(createLogger('test-service', 'app.log')).toBeInstanceOf(Logger);
      expect(winston.createLogger).toHaveBeenCalledWith(
        expect.objectContaining({ defaultMeta: { service: 'test-service' } })
      );
    });
  });
});
