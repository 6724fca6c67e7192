// tests/logger.test.ts
import { LogSink, createLogger, safeStringify } from '../src/logger';

function capture(): { sink: LogSink; lines: string[] } {
  const lines: string[] = [];
  const sink: LogSink = {
    error: (msg) => lines.push(`error ${msg}`),
    warn: (msg) => lines.push(`warn ${msg}`),
    info: (msg) => lines.push(`info ${msg}`),
    debug: (msg) => lines.push(`debug ${msg}`),
  };
  return { sink, lines };
}

describe('calcline Logger', () => {
  it('should filter by level and route to the sink', () => {
    const { sink, lines } = capture();
    const log = createLogger({ level: 'info', sink, timestamp: false });
    log.debug('hidden');
    log.info('shown', { a: 1 });
    log.error('failed');
    expect(lines).toEqual([
      'info [calcline] INFO: shown {"a":1}',
      'error [calcline] ERROR: failed',
    ]);
  });

  it('should send trace to the debug sink', () => {
    const { sink, lines } = capture();
    const log = createLogger({ level: 'trace', sink, timestamp: false });
    log.trace('item');
    expect(lines).toEqual(['debug [calcline] TRACE: item']);
  });

  it('should omit payloads when asked', () => {
    const { sink, lines } = capture();
    const log = createLogger({
      level: 'warn',
      sink,
      timestamp: false,
      includePayload: false,
    });
    log.warn('careful', { a: 1 });
    expect(lines).toEqual(['warn [calcline] WARN: careful']);
  });

  it('should name children with a dotted prefix and keep the level', () => {
    const { sink, lines } = capture();
    const log = createLogger({ level: 'warn', sink, timestamp: false });
    const child = log.child('parser');
    child.info('quiet');
    child.warn('odd');
    expect(lines).toEqual(['warn [calcline.parser] WARN: odd']);
  });

  it('should drop everything when silent', () => {
    const { sink, lines } = capture();
    const log = createLogger({ level: 'silent', sink });
    log.error('gone');
    expect(lines).toEqual([]);
  });

  it('should prefix a timestamp by default', () => {
    const { sink, lines } = capture();
    createLogger({ sink }).warn('x');
    expect(lines[0]).toMatch(
      /^warn \d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z \[calcline\] WARN: x$/
    );
  });

  it('should time a section at debug level', () => {
    const { sink, lines } = capture();
    const log = createLogger({ level: 'debug', sink, timestamp: false });
    log.time('work').end({ n: 2 });
    expect(lines[0]).toBe('debug [calcline] DEBUG: start work');
    expect(lines[1]).toMatch(
      /^debug \[calcline\] DEBUG: end work \(\d+\.\d{2}ms\) \{"n":2\}$/
    );
  });

  it('should stringify anything', () => {
    const loop: { self?: unknown } = {};
    loop.self = loop;
    expect(safeStringify(loop)).toBe('[unserializable]');
    expect(safeStringify(undefined)).toBe('undefined');
    expect(safeStringify([1, 'a'])).toBe('[1,"a"]');
  });
});
