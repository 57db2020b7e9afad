import { afterEach, describe, it, expect, vi } from 'vitest';
import { formatTime, LogLevel, logger, parseLogLevel } from '../src/utils/logger.js';

describe('Logger', () => {
  const initialLevel = logger.getLevel();

  afterEach(() => {
    logger.setLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('should parse level names and shorthands', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.NORMAL);
    expect(parseLogLevel('quiet')).toBe(LogLevel.QUIET);
    expect(parseLogLevel('V')).toBe(LogLevel.VERBOSE);
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('loud')).toBe(LogLevel.NORMAL);
  });

  it('should prefix messages with their context', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.setLevel(LogLevel.VERBOSE);

    logger.createContext('http-scraper').verbose('fetched');

    expect(spy).toHaveBeenCalledWith('[http-scraper] fetched');
  });

  it('should drop messages above the current level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.setLevel(LogLevel.NORMAL);

    logger.createContext('engine').debug('hidden');

    expect(spy).not.toHaveBeenCalled();
  });

  it('should silence errors in quiet mode', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setLevel(LogLevel.QUIET);

    logger.createContext('browser').error('gone');

    expect(spy).not.toHaveBeenCalled();
  });

  it('should format durations', () => {
    expect(formatTime(250.4)).toBe('250ms');
    expect(formatTime(1500)).toBe('1.5s');
    expect(formatTime(125000)).toBe('2m 5s');
  });
});
