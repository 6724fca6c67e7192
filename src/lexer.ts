// src/lexer.ts - calcline scanner
//
// A state machine: every state function scans one item, hands it over
// through a single slot and returns the next state. `lex` is a generator, so
// the parser pulls items one at a time and the scanner never runs more than
// one item ahead.
//
// Every character that can start a valid item is ASCII and scanning halts at
// the first other character, so string indices double as byte offsets.
import { Item, ItemType, KeywordKind, keywordKinds } from './types';
import { Logger, rootLogger } from './logger';

type StateFn = (l: Lexer) => StateFn | null;

const whitespaceChars = ' \t\r\n';
const letters = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const digits = '0123456789';
const hexadecimal = digits + 'abcdefABCDEF';
const binary = '01';

// Multi-character operators come before their single-character prefixes
const fixedTokens: ReadonlyArray<readonly [string, ItemType]> = [
  ['(', 'lparen'],
  [')', 'rparen'],
  ['=', 'equals'],
  ['+', 'add'],
  ['-', 'sub'],
  ['**', 'exp'],
  ['*', 'mult'],
  ['//', 'fdiv'],
  ['/', 'div'],
  ['&', 'and'],
  ['|', 'or'],
  ['^', 'xor'],
  ['~', 'inv'],
  ['%', 'mod'],
  ['<<', 'lshift'],
  ['>>', 'rshift'],
];

class Lexer {
  readonly input: string;
  pos = 0; // current position
  start = 0; // start of the pending item
  private slot: Item | null = null;

  constructor(input: string) {
    this.input = input;
  }

  atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  rest(): string {
    return this.input.slice(this.pos);
  }

  /** Consumes the next character if it is in `valid`. */
  accept(valid: string): boolean {
    const c = this.input.charAt(this.pos);
    if (c !== '' && valid.includes(c)) {
      this.pos++;
      return true;
    }
    return false;
  }

  /** Consumes a run of characters from `valid`, returning its length. */
  acceptRun(valid: string): number {
    const from = this.pos;
    while (this.accept(valid)) {
      // consume
    }
    return this.pos - from;
  }

  /** Hands the pending text over as an item of the given type. */
  emit(type: ItemType): Item {
    return this.emitItem({
      type,
      value: this.input.slice(this.start, this.pos),
      pos: this.start,
    });
  }

  emitItem(item: Item): Item {
    if (this.slot) {
      throw new Error(`lexer slot still holds ${this.slot.type}`);
    }
    this.slot = item;
    this.start = this.pos;
    return item;
  }

  /** Emits an error item; the returned null state halts the scan. */
  errorf(message: string): null {
    this.emitItem({ type: 'error', value: message, pos: this.start });
    this.pos = this.input.length;
    return null;
  }

  take(): Item | null {
    const item = this.slot;
    this.slot = null;
    return item;
  }
}

function lexBase(l: Lexer): StateFn | null {
  // Leading whitespace condenses to one item
  if (l.acceptRun(whitespaceChars) > 0) {
    l.emitItem({ type: 'space', value: ' ', pos: l.start });
    return lexBase;
  }

  if (l.atEnd()) {
    l.emit('eof');
    return null;
  }

  const rest = l.rest();
  if (rest.startsWith('$')) return lexVariable;
  for (const [text, type] of fixedTokens) {
    if (rest.startsWith(text)) return lexFixed(text, type);
  }

  if (/^b[01]/.test(rest)) return lexNumber;
  if (digits.includes(rest.charAt(0))) return lexNumber;
  if (letters.includes(rest.charAt(0))) return lexText;

  const codePoint = rest.codePointAt(0) ?? 0;
  return l.errorf(`Unexpected ${String.fromCodePoint(codePoint)}`);
}

function lexFixed(text: string, type: ItemType): StateFn {
  return (l) => {
    l.pos += text.length;
    l.emit(type);
    return lexBase;
  };
}

function lexVariable(l: Lexer): StateFn | null {
  l.accept('$');
  if (l.acceptRun(letters + '_') === 0) {
    return l.errorf('Expected a variable name after $');
  }
  l.emit('variable');
  return lexBase;
}

function isKeyword(text: string): text is KeywordKind {
  return (keywordKinds as readonly string[]).includes(text);
}

function lexText(l: Lexer): StateFn {
  l.accept(letters);
  l.acceptRun(letters + '_');
  const text = l.input.slice(l.start, l.pos);
  l.emit(isKeyword(text) ? text : 'text');
  return lexBase;
}

function lexNumber(l: Lexer): StateFn {
  if (l.accept('b')) {
    l.acceptRun(binary);
  } else if (/^0[xX]/.test(l.rest())) {
    l.pos += 2;
    l.acceptRun(hexadecimal);
  } else {
    l.acceptRun(digits);
    if (l.accept('.')) {
      l.acceptRun(digits);
    }
  }
  l.emit('number');
  return lexBase;
}

/**
 * Scans `input` lazily. The sequence always ends with exactly one `eof` or
 * `error` item and cannot be restarted.
 */
export function* lex(
  input: string,
  logger: Logger = rootLogger
): Generator<Item, void, undefined> {
  const l = new Lexer(input);
  let state: StateFn | null = lexBase;
  while (state) {
    state = state(l);
    const item = l.take();
    if (item) {
      logger.trace(`lex ${item.type}`, { value: item.value, pos: item.pos });
      yield item;
    }
  }
}

/** Collects every item of `input`. */
export function lexAll(input: string): Item[] {
  return Array.from(lex(input));
}
