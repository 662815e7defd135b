/**
 * Tests for the build logger
 */

import { Writable } from 'stream';
import { LogLevel } from '../../types';
import { Logger, ProgressReporter, formatDuration } from '../logger';

class LineSink extends Writable {
  readonly lines: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.lines.push(String(chunk));
    callback();
  }
}

describe('Logger', () => {
  let sink: LineSink;
  let log: Logger;

  beforeEach(() => {
    sink = new LineSink();
    log = new Logger({ level: LogLevel.Info, colors: false, timestamps: false, output: sink });
  });

  test('should format level and message', () => {
    log.info('Starting build');

    expect(sink.lines).toEqual(['ℹ️ INFO  Starting build\n']);
  });

  test('should filter messages below the configured level', () => {
    log.debug('hidden');
    log.warn('shown');

    expect(sink.lines).toEqual(['⚠️ WARN  shown\n']);
  });

  test('should report which levels are enabled', () => {
    expect(log.isEnabled(LogLevel.Error)).toBe(true);
    expect(log.isEnabled(LogLevel.Info)).toBe(true);
    expect(log.isEnabled(LogLevel.Debug)).toBe(false);
  });

  test('should prefix scoped children', () => {
    log.child('compile').child('arm64').error('failed');

    expect(sink.lines).toEqual(['[compile:arm64] 🚨 ERROR failed\n']);
  });

  test('should share configuration with children', () => {
    const child = log.child('cache');
    log.setLevel(LogLevel.Debug);

    child.debug('lookup');

    expect(child.level).toBe(LogLevel.Debug);
    expect(sink.lines).toEqual(['[cache] 🔍 DEBUG lookup\n']);
  });

  test('should append extra arguments', () => {
    log.info('Settings', { mode: 'zip' }, 3);

    expect(sink.lines).toEqual(['ℹ️ INFO  Settings {\n  "mode": "zip"\n} 3\n']);
  });

  test('should use symbols for outcome messages', () => {
    log.success('done');
    log.failure('broken');

    expect(sink.lines).toEqual(['✅ INFO  done\n', '❌ ERROR broken\n']);
  });

  test('should wrap colored output in escape codes', () => {
    log.configure({ colors: true });
    log.warn('careful');

    expect(sink.lines).toEqual(['\x1b[33m⚠️ WARN  careful\x1b[0m\n']);
  });

  test('should add timestamps when enabled', () => {
    log.configure({ timestamps: true });
    log.info('stamped');

    expect(sink.lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[\+\d+\.\d{3}s\] ℹ️ INFO {2}stamped\n$/);
  });
});

describe('ProgressReporter', () => {
  test('should report steps with a bar and percentage', () => {
    const sink = new LineSink();
    const log = new Logger({ level: LogLevel.Info, colors: false, timestamps: false, output: sink });

    const progress = new ProgressReporter('Building Example', 4, log);
    progress.update(1, 'Compiling arm64');

    expect(sink.lines).toEqual([
      '🔄 INFO  Starting Building Example (4 steps)\n',
      `🔄 INFO  Building Example: [${'█'.repeat(5)}${' '.repeat(15)}] 25% - Compiling arm64\n`
    ]);
  });

  test('should not go past the total', () => {
    const sink = new LineSink();
    const log = new Logger({ level: LogLevel.Info, colors: false, timestamps: false, output: sink });

    const progress = new ProgressReporter('Merge', 1, log);
    progress.update(3);

    expect(sink.lines[1]).toBe(`🔄 INFO  Merge: [${'█'.repeat(20)}] 100%\n`);
  });
});

describe('formatDuration', () => {
  test('should format milliseconds, seconds and minutes', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(42000)).toBe('42s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});
