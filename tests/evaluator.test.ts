// tests/evaluator.test.ts
import { Evaluator } from '../src/evaluator';
import { parse } from '../src/parser';
import { calculate } from '../src/session';
import { MemoryProfileStore, ProfileStore, decodeProfile } from '../src/profiles';
import { createLogger } from '../src/logger';
import { ExecResult } from '../src/types';

const silent = createLogger({ level: 'silent' });

function newEvaluator(store: ProfileStore = new MemoryProfileStore()): Evaluator {
  return new Evaluator({ store, logger: silent });
}

function run(evaluator: Evaluator, line: string): ExecResult {
  return calculate(evaluator, line, true, silent);
}

function value(line: string): string {
  const { result, error } = run(newEvaluator(), line);
  expect(error).toBeNull();
  return result;
}

describe('calcline Evaluator', () => {
  it('should return literals verbatim', () => {
    expect(value('0xff')).toBe('0xff');
    expect(value('0755')).toBe('0755');
    expect(value('b101')).toBe('b101');
    expect(value('1.50')).toBe('1.50');
  });

  it('should evaluate empty and whitespace-only lines to nothing', () => {
    expect(run(newEvaluator(), '')).toEqual({ result: '', error: null });
    expect(run(newEvaluator(), '   \t ')).toEqual({ result: '', error: null });
    expect(value('      1     ')).toBe('1');
  });

  it('should evaluate each operator', () => {
    expect(value('1 + 2')).toBe('3');
    expect(value('-1 - -2')).toBe('1');
    expect(value('6 * 7')).toBe('42');
    expect(value('10 ** 2')).toBe('100');
    expect(value('7 / 2')).toBe('3.5');
    expect(value('10 // 3')).toBe('3');
    expect(value('-7 // 2')).toBe('-4');
    expect(value('5%2')).toBe('1');
    expect(value('1 << 10')).toBe('1024');
    expect(value('1024 >> 2')).toBe('256');
  });

  it('should still subtract for the bitwise operators', () => {
    expect(value('151451 ^ 2')).toBe('151449');
    expect(value('5 ~ 3')).toBe('2');
    expect(value('6 & 2')).toBe('4');
    expect(value('7 | 1')).toBe('6');
  });

  it('should take the modulo with the sign of the divisor', () => {
    expect(value('-7 % 3')).toBe('2');
    expect(value('7 % -3')).toBe('-2');
  });

  it('should apply precedence leftmost first within a level', () => {
    expect(value('2 + 3 * 4')).toBe('14');
    expect(value('10 - 4 - 3')).toBe('3');
    expect(value('2 ** 3 ** 2')).toBe('64');
    expect(value('2 ** (1+1)')).toBe('4');
    expect(value('(1+2)*((3-4)*5)')).toBe('-15');
  });

  it('should mix radixes and take absolute values', () => {
    expect(value('0x10 + b11')).toBe('19');
    expect(value('0x10 + 010')).toBe('24');
    expect(value('abs(-10)')).toBe('10');
    expect(value('abs(3 - 0x1f)')).toBe('28');
    expect(value('hex(abs(-0xff))')).toBe('0xff');
  });

  it('should print small results without exponents', () => {
    expect(value('1 / 10000000000000000000000')).toBe(
      '0.0000000000000000000001'
    );
  });

  it('should convert to the requested output format', () => {
    expect(value('dec(0xff)')).toBe('255');
    expect(value('dec(0755)')).toBe('493');
    expect(value('bin(2)')).toBe('b10');
    expect(value('hex(255)')).toBe('0xff');
    expect(value('oct(8)')).toBe('010');
    expect(value('oct(0)')).toBe('00');
    expect(value('hex(-255)')).toBe('-0xff');
    expect(value('bin(-b11 + 1)')).toBe('-b10');
    expect(value('hex(0x1F)')).toBe('0x1f');
  });

  it('should refuse to show fractions in other radixes', () => {
    expect(run(newEvaluator(), 'hex(1.5)')).toEqual({
      result: '',
      error: { type: 'runtime', message: 'cannot show non-integer 1.5 as hex' },
    });
  });

  it('should shift 64-bit integers', () => {
    expect(value('-8 >> 1')).toBe('-4');
    expect(value('1 << 64')).toBe('0');
    expect(value('-1 >> 64')).toBe('-1');
    expect(run(newEvaluator(), '1 << -1').error?.message).toBe(
      'negative shift count -1'
    );
  });

  it('should report results that are not finite', () => {
    expect(run(newEvaluator(), '1/0')).toEqual({
      result: '',
      error: {
        type: 'runtime',
        message: 'result of 1 / 0 is not a finite number',
        text: '1 / 0',
      },
    });
  });

  it('should report malformed literals used in arithmetic', () => {
    expect(run(newEvaluator(), '089 + 1').error).toEqual({
      type: 'runtime',
      message: 'malformed number 089',
      text: '089',
    });
  });

  it('should reject a lone malformed literal without assigning it', () => {
    const ev = newEvaluator();
    expect(run(ev, '$x = 089')).toEqual({
      result: '',
      error: { type: 'runtime', message: 'malformed number 089', text: '089' },
    });
    expect(run(ev, '$x = 0x').error?.message).toBe('malformed number 0x');
    expect(run(ev, '(089)').error?.message).toBe('malformed number 089');
    expect(ev.getVariable('$x')).toBeUndefined();
  });

  it('should assign and read variables', () => {
    const ev = newEvaluator();
    expect(run(ev, '$foo = 5').result).toBe('5');
    expect(run(ev, '$foo + 1').result).toBe('6');
    expect(run(ev, '$foo').result).toBe('5');
    expect(run(ev, '$y = $foo * 2').result).toBe('10');
    expect(ev.getVariable('$y')).toEqual({
      kind: 'number',
      position: 5,
      value: '10',
      system: 'dec',
    });
  });

  it('should keep the radix of a stored literal', () => {
    const ev = newEvaluator();
    run(ev, '$x = 0xff');
    expect(run(ev, '$x').result).toBe('0xff');
    expect(run(ev, 'dec($x)').result).toBe('255');
  });

  it('should report unknown variables', () => {
    expect(run(newEvaluator(), '$fo')).toEqual({
      result: '',
      error: { type: 'runtime', message: 'unknown variable $fo', text: '$fo' },
    });
  });

  it('should not assign when not committing', () => {
    const ev = newEvaluator();
    const { nodes } = parse('$a = 1 + 1');
    expect(ev.exec(nodes, false)).toEqual({ result: '2', error: null });
    expect(ev.getVariable('$a')).toBeUndefined();
  });

  it('should refuse a sequence that failed to parse', () => {
    const { nodes } = parse('1 +');
    expect(newEvaluator().exec(nodes, true)).toEqual({
      result: '',
      error: {
        type: 'runtime',
        message:
          'cannot evaluate a line that failed to parse: unexpected end of input',
      },
    });
    expect(newEvaluator().exec([], true)).toEqual({ result: '', error: null });
  });

  it('should clear the variable store', () => {
    const ev = newEvaluator();
    run(ev, '$a = 1');
    expect(ev.snapshot().size).toBe(1);
    expect(run(ev, 'clear()')).toEqual({ result: 'Cleared state', error: null });
    expect(ev.snapshot().size).toBe(0);
    expect(run(ev, 'clear()')).toEqual({ result: 'Cleared state', error: null });
    expect(ev.snapshot().size).toBe(0);
  });

  it('should save and load profiles', () => {
    const store = new MemoryProfileStore();
    const saved: string[] = [];
    const ev = new Evaluator({
      store,
      logger: silent,
      onSave: (profile) => saved.push(profile),
    });
    run(ev, '$a = 0xff');
    run(ev, '$b = 2');

    expect(run(ev, 'save(work)')).toEqual({ result: 'Saved work', error: null });
    expect(saved).toEqual(['work']);
    expect(ev.hasProfile('work')).toBe(true);
    expect(decodeProfile(store.read('work')).get('$a')?.value).toBe('0xff');

    run(ev, 'clear()');
    expect(run(ev, 'load(work)')).toEqual({ result: 'Loaded work', error: null });
    expect(ev.getVariable('$a')).toEqual({
      kind: 'number',
      position: -1,
      value: '0xff',
      system: 'hex',
    });
    expect(run(ev, 'dec($a + $b)').result).toBe('257');
  });

  it('should load every variable a session saved', () => {
    const store = new MemoryProfileStore();
    const first = newEvaluator(store);
    run(first, '$a = 1');
    run(first, '$x = 089');
    run(first, '$half = 1 / 2');
    expect(run(first, 'save(p)').result).toBe('Saved p');

    const second = newEvaluator(store);
    expect(run(second, 'load(p)')).toEqual({ result: 'Loaded p', error: null });
    expect(run(second, '$a + $half').result).toBe('1.5');
    expect(second.getVariable('$x')).toBeUndefined();
  });

  it('should merge a loaded profile over current variables', () => {
    const store = new MemoryProfileStore();
    store.write('base', 'variables:\n  $a: "1"\n');
    const ev = newEvaluator(store);
    run(ev, '$a = 5');
    run(ev, '$keep = 7');
    run(ev, 'load(base)');
    expect(run(ev, '$a + $keep').result).toBe('8');
  });

  it('should report storage failures', () => {
    expect(run(newEvaluator(), 'load(nope)')).toEqual({
      result: '',
      error: {
        type: 'storage',
        message: 'could not load nope: no profile named nope',
        text: 'nope',
      },
    });

    const saved: string[] = [];
    const broken: ProfileStore = {
      read: () => '',
      write: () => {
        throw new Error('disk full');
      },
      exists: () => false,
    };
    const ev = new Evaluator({
      store: broken,
      logger: silent,
      onSave: (profile) => saved.push(profile),
    });
    expect(run(ev, 'save(x)').error?.message).toBe('could not save x: disk full');
    expect(saved).toEqual([]);
  });
});
