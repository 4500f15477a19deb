import { describe, it, expect } from 'vitest';
import { NullLogger, PinoLogger } from '../src/logger';

function capture(): { lines: string[]; write(line: string): void } {
  const lines: string[] = [];
  return {
    lines,
    write(line: string) {
      lines.push(line);
    },
  };
}

describe('PinoLogger', () => {
  it('should write JSON lines with child bindings', () => {
    const out = capture();
    const logger = new PinoLogger({ level: 'debug', destination: out });
    logger.child({ component: 'test' }).info('hello', { n: 1 });

    expect(out.lines).toHaveLength(1);
    const entry = JSON.parse(out.lines[0]);
    expect(entry.level).toBe(30);
    expect(entry.msg).toBe('hello');
    expect(entry.n).toBe(1);
    expect(entry.component).toBe('test');
  });

  it('should drop entries below the level', () => {
    const out = capture();
    const logger = new PinoLogger({ level: 'debug', destination: out });
    logger.trace('hidden');
    logger.debug('shown');

    expect(logger.level).toBe('debug');
    expect(out.lines).toHaveLength(1);
    expect(JSON.parse(out.lines[0]).msg).toBe('shown');
  });

  it('should serialize errors with their cause', () => {
    const out = capture();
    const logger = new PinoLogger({ destination: out });
    logger.error('failed', { err: new Error('boom', { cause: new Error('root') }) });

    const entry = JSON.parse(out.lines[0]);
    expect(entry.err.type).toBe('Error');
    expect(entry.err.message).toBe('boom');
    expect(entry.err.cause.message).toBe('root');
  });
});

describe('NullLogger', () => {
  it('should return itself as a child', () => {
    const logger = new NullLogger();
    expect(logger.child()).toBe(logger);
    expect(() => logger.info()).not.toThrow();
  });
});
