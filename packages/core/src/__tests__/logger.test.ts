import { afterEach, describe, expect, it, vi } from 'vitest';
import { resolveConfig } from '../config.js';
import { convert } from '../converter.js';
import { type LogEntry, getLogLevel, levelFromEnv, onLog, setLogLevel } from '../logger.js';

describe('logger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('maps HINTPACK_DEBUG values to levels', () => {
    expect(levelFromEnv('1')).toBe('debug');
    expect(levelFromEnv('warn')).toBe('warn');
    expect(levelFromEnv(undefined)).toBe('info');
  });

  it('reports conversions at debug level', () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    setLogLevel('debug');
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));
    convert({ a: 1 });
    off();

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('debug');
    expect(entries[0].message.startsWith('convert: ')).toBe(true);
    expect(entries[0].data).toMatchObject({ bytes: 4 });
  });

  it('stays quiet at info level', () => {
    setLogLevel('info');
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));
    convert({ a: 1 });
    off();
    expect(entries).toHaveLength(0);
  });

  it('warns about an unrecognized environment switch', () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    setLogLevel('info');
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));
    const config = resolveConfig({}, { HINTPACK_STRICT_NUMERIC: 'yes', HINTPACK_FIXED_WIDTH: '0' });
    off();

    expect(config.strictNumeric).toBe(false);
    expect(config.fixedWidthIntegers).toBe(false);
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('warn');
    expect(entries[0].message).toBe('ignoring unrecognized HINTPACK_STRICT_NUMERIC value');
    expect(entries[0].data).toEqual({ value: 'yes' });
  });
});
