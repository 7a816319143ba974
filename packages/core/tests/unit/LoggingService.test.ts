import { LogLevel, LoggingService, parseLogLevel } from '../../src/utils/LoggingService.js';

const TIMESTAMP = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /;

function capture(level: LogLevel, name = 'engine'): { logger: LoggingService; lines: string[] } {
  const lines: string[] = [];
  return { logger: new LoggingService(name, level, { write: line => lines.push(line) }), lines };
}

function withoutTimestamps(lines: string[]): string[] {
  return lines.map(line => line.replace(TIMESTAMP, ''));
}

describe('LoggingService', () => {
  it('should prefix lines with timestamp, level and name', () => {
    const { logger, lines } = capture(LogLevel.DEBUG);

    logger.info('Indexed 3 entries');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(TIMESTAMP);
    expect(withoutTimestamps(lines)).toEqual(['[INFO] [engine] Indexed 3 entries']);
  });

  it('should drop messages below the configured level', () => {
    const { logger, lines } = capture(LogLevel.WARN);

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(withoutTimestamps(lines)).toEqual(['[WARN] [engine] w', '[ERROR] [engine] e']);
  });

  it('should write nothing when silent', () => {
    const { logger, lines } = capture(LogLevel.SILENT);

    logger.error('e', new Error('boom'));

    expect(lines).toEqual([]);
  });

  it('should print extra arguments on their own lines', () => {
    const { logger, lines } = capture(LogLevel.DEBUG);

    logger.debug('details', { keys: 2 }, 'plain');

    expect(withoutTimestamps(lines)).toEqual(['[DEBUG] [engine] details', '  {\n  "keys": 2\n}', '  plain']);
  });

  it('should add the error stack after an error line', () => {
    const { logger, lines } = capture(LogLevel.DEBUG);
    const error = new Error('boom');
    error.stack = 'Error: boom\n    at test';

    logger.error('Run failed', error);

    expect(withoutTimestamps(lines)).toEqual(['[ERROR] [engine] Run failed', '  Stack: Error: boom\n    at test']);
  });

  it('should log state changes at info level', () => {
    const { logger, lines } = capture(LogLevel.INFO);

    logger.stateChange('run abc', 'Idle', 'BuildingBibliography');

    expect(withoutTimestamps(lines)).toEqual(['[INFO] [engine] run abc: Idle -> BuildingBibliography']);
  });

  it('should derive child loggers sharing level and sink', () => {
    const { logger, lines } = capture(LogLevel.INFO);
    const child = logger.child('merger');

    child.debug('hidden');
    child.info('shown');

    expect(child.getLevel()).toBe(LogLevel.INFO);
    expect(withoutTimestamps(lines)).toEqual(['[INFO] [engine:merger] shown']);
  });

  describe('parseLogLevel()', () => {
    it.each([
      ['debug', LogLevel.DEBUG],
      ['INFO', LogLevel.INFO],
      [' warning ', LogLevel.WARN],
      ['error', LogLevel.ERROR],
      ['none', LogLevel.SILENT],
    ])('should parse %p', (value, expected) => {
      expect(parseLogLevel(value)).toBe(expected);
    });

    it('should return null for unknown names', () => {
      expect(parseLogLevel('verbose')).toBeNull();
    });
  });
});
