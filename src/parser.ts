// src/parser.ts - calcline single-pass validating parser
//
// Each item is checked against the node already built to its left and
// appended as one node. No tree is built: the output is a flat sequence
// ending in an `end` marker, or in a `parsingStopped` marker on failure.
import {
  CalcError,
  Item,
  Node,
  NodeKind,
  OperatorKind,
  ParseResult,
} from './types';
import { lex } from './lexer';
import { Logger, rootLogger } from './logger';
import {
  isNodeKind,
  newAssign,
  newDiskOperation,
  newMarker,
  newNumber,
  newOperator,
  newParsingStopped,
  newSetOutput,
  newVariable,
  nodeToString,
  operatorNodes,
  prefixNodes,
  valueNodes,
} from './nodes';
import { parseNumberSystem } from './radix';
import { lexicalError, syntaxError, unexpectedEof } from './errors';

export interface ParseOptions {
  logger?: Logger;
}

// Unwinds the parse loop; converted to a ParseResult in Parser.parse
class StopParsing extends Error {
  constructor(readonly error: CalcError) {
    super(error.message);
  }
}

const afterValue: readonly NodeKind[] = [...valueNodes, 'rparen'];
const beforeValue: readonly NodeKind[] = [...operatorNodes, ...prefixNodes];

class Parser {
  private readonly input: string;
  private readonly logger: Logger;
  private readonly source: Iterator<Item, void>;
  private readonly items: Item[] = []; // every non-space item read so far
  private readonly nodes: Node[] = [];
  private cursor = 0; // items consumed; lower than items.length after a peek
  private parenthesis = 0;
  private lastEnd = 0;
  private exhausted = false;

  constructor(input: string, logger: Logger) {
    this.input = input;
    this.logger = logger;
    this.source = lex(input, logger);
  }

  parse(): ParseResult {
    try {
      this.readNodes();
      return { nodes: this.nodes, error: null };
    } catch (e) {
      if (!(e instanceof StopParsing)) throw e;
      this.logger.debug('parsing stopped', {
        message: e.error.message,
        at: this.lastEnd,
      });
      this.nodes.push(newParsingStopped(this.lastEnd, e.error.message));
      return { nodes: this.nodes, error: e.error };
    }
  }

  private readNodes(): void {
    for (;;) {
      const item = this.nextItem();
      if (!item) {
        this.finish();
        return;
      }
      this.lastEnd = item.pos + item.value.length;

      switch (item.type) {
        case 'equals':
          this.parseEquals(item);
          break;
        case 'variable':
          this.parseVariable(item);
          break;
        case 'dec':
        case 'bin':
        case 'hex':
        case 'oct':
          if (this.left()) {
            throw new StopParsing(
              syntaxError(
                item.value,
                item.pos,
                'setting output type must be the first thing you do'
              )
            );
          }
          this.append(newSetOutput(item.pos, item.type));
          break;
        case 'number':
          this.parseNumber(item);
          break;
        case 'clear':
          this.parseClear(item);
          return;
        case 'save':
        case 'load':
          this.parseDiskOperation(item, item.type);
          return;
        case 'lparen':
          this.parseLParen(item);
          break;
        case 'rparen':
          this.parseRParen(item);
          break;
        case 'abs':
          this.parseAbs(item);
          break;
        case 'text':
        case 'space': // filtered by nextItem, as are eof and error
        case 'eof':
        case 'error':
          throw new StopParsing(syntaxError(item.value, item.pos));
        default:
          this.parseOperator(item, item.type);
      }
    }
  }

  /**
   * Next non-space item, or null at end of input. Lexical errors and an
   * end of input with open parenthesis stop parsing.
   */
  private nextItem(): Item | null {
    // Re-deliver an item that has been peeked at
    if (this.cursor < this.items.length) {
      return this.items[this.cursor++];
    }
    if (this.exhausted) return null;

    for (;;) {
      const next = this.source.next();
      if (next.done) {
        // the scanner always ends on eof or error
        throw new StopParsing(unexpectedEof(this.input.length));
      }
      const item = next.value;
      if (item.type === 'space') continue;
      if (item.type === 'error') {
        this.exhausted = true;
        throw new StopParsing(lexicalError(item.value, item.pos));
      }
      if (item.type === 'eof') {
        this.exhausted = true;
        if (this.parenthesis > 0) {
          throw new StopParsing(unexpectedEof(item.pos, this.parenthesis));
        }
        return null;
      }
      this.items.push(item);
      this.cursor++;
      return item;
    }
  }

  private peek(): Item | null {
    const start = this.cursor;
    const item = this.nextItem();
    // Back up so this item is read again by the next nextItem()
    this.cursor = start;
    return item;
  }

  private left(): Node | undefined {
    return this.nodes[this.nodes.length - 1];
  }

  private append(node: Node): void {
    this.logger.trace(`node ${node.kind}`, { text: nodeToString(node) });
    this.nodes.push(node);
  }

  // Parsing completed, check that the last node can end an expression
  private finish(): void {
    const left = this.left();
    if (left && !isNodeKind(left, afterValue)) {
      throw new StopParsing(unexpectedEof(this.input.length));
    }
    this.append(newMarker(this.input.length, 'end'));
  }

  // $foo = ...
  private parseEquals(item: Item): void {
    const first = this.nodes[0];
    if (this.nodes.length !== 1 || first.kind !== 'variable') {
      throw new StopParsing(
        syntaxError(
          item.value,
          item.pos,
          'equals can only follow a variable name at the very start of the line',
          'Assign as the first thing on the line, e.g. $foo = 1'
        )
      );
    }
    // Replace the variable reference with an assignment
    this.nodes[0] = newAssign(first.position, first.name);
    this.logger.trace('node assign', { target: first.name });
  }

  private parseVariable(item: Item): void {
    const left = this.left();
    if (left) {
      const valid: NodeKind[] = [...operatorNodes, 'lparen', 'assign'];
      if (this.nodes.length === 1) valid.push(...prefixNodes);
      if (!isNodeKind(left, valid)) {
        throw new StopParsing(
          syntaxError(
            item.value,
            item.pos,
            `variables should follow operators, (, or =, not ${nodeToString(left)}`
          )
        );
      }
    }
    this.append(newVariable(item.pos, item.value));
  }

  // 5, 1.234, 0xff, 0775, b001
  private parseNumber(item: Item): void {
    const left = this.left();
    if (left && !isNodeKind(left, beforeValue)) {
      throw new StopParsing(
        syntaxError(
          item.value,
          item.pos,
          'numbers should follow operators, (, or ='
        )
      );
    }
    this.append(newNumber(item.pos, item.value));
  }

  /**
   * + - * ** / // & | ^ ~ % << >>, and the sign of a negative number.
   */
  private parseOperator(item: Item, kind: OperatorKind): void {
    const left = this.left();

    if (kind === 'sub') {
      const negative = this.negativeNumber(left);
      if (negative) {
        this.cursor++; // the peeked number is part of this node
        this.lastEnd = negative.pos + negative.value.length;
        this.append(
          newNumber(
            item.pos,
            `-${negative.value}`,
            parseNumberSystem(negative.value)
          )
        );
        return;
      }
    }

    // Operators need a value or ) on the left; the right side is checked later
    if (!left) {
      throw new StopParsing(syntaxError(item.value, item.pos));
    }
    if (!isNodeKind(left, afterValue)) {
      throw new StopParsing(
        syntaxError(
          item.value,
          item.pos,
          'operators should follow numbers, variables, or closing parenthesis'
        )
      );
    }
    this.append(newOperator(item.pos, kind));
  }

  /**
   * The number item following a `-` when the two form one negative literal:
   * at the start of the line, or after an operator or prefix node
   * (`2 + -1`, `(-1 * 3)`, `$foo = -1`, `dec(-7)`).
   */
  private negativeNumber(left: Node | undefined): Item | null {
    if (left && isNodeKind(left, valueNodes)) return null;
    const peek = this.peek();
    if (!peek || peek.type !== 'number') return null;
    if (left && !isNodeKind(left, beforeValue)) return null;
    return peek;
  }

  /**
   * clear() takes the whole line; the rest of the input is read and its
   * shape checked before anything else.
   */
  private parseClear(item: Item): void {
    const invalid = syntaxError(
      item.value,
      item.pos,
      'when used the input should be only: clear()',
      'clear()'
    );
    if (this.left()) throw new StopParsing(invalid);

    this.drain();
    const [, open, close] = this.items;
    if (
      this.items.length !== 3 ||
      open.type !== 'lparen' ||
      close.type !== 'rparen'
    ) {
      throw new StopParsing(invalid);
    }

    this.append(newMarker(item.pos, 'clear'));
    this.append(newMarker(this.input.length, 'end'));
  }

  // save(name), load(name)
  private parseDiskOperation(item: Item, kind: 'save' | 'load'): void {
    const invalid = syntaxError(
      item.value,
      item.pos,
      `when used the input should be only: ${kind}(name)`,
      `${kind}(name)`
    );
    if (this.left()) throw new StopParsing(invalid);

    this.drain();
    const [, open, name, close] = this.items;
    if (
      this.items.length !== 4 ||
      open.type !== 'lparen' ||
      name.type !== 'text' ||
      close.type !== 'rparen'
    ) {
      throw new StopParsing(invalid);
    }

    this.append(newDiskOperation(item.pos, kind, name.value));
    this.append(newMarker(this.input.length, 'end'));
  }

  private drain(): void {
    let item = this.nextItem();
    while (item) {
      this.lastEnd = item.pos + item.value.length;
      item = this.nextItem();
    }
  }

  // (   abs(   dec(
  private parseLParen(item: Item): void {
    const left = this.left();
    if (left && !isNodeKind(left, [...beforeValue, 'abs'])) {
      throw new StopParsing(
        syntaxError(
          item.value,
          item.pos,
          'should be following abs, dec, hex, bin, oct, =, operators, or other (s'
        )
      );
    }
    this.parenthesis++;
    this.append(newMarker(item.pos, 'lparen'));
  }

  private parseRParen(item: Item): void {
    if (this.parenthesis === 0) {
      throw new StopParsing(
        syntaxError(item.value, item.pos, 'no parenthesis open')
      );
    }
    const left = this.left();
    if (!left || !isNodeKind(left, afterValue)) {
      throw new StopParsing(
        syntaxError(
          item.value,
          item.pos,
          'should be following numbers, variables, or other )s'
        )
      );
    }
    this.parenthesis--;
    this.append(newMarker(item.pos, 'rparen'));
  }

  private parseAbs(item: Item): void {
    const left = this.left();
    if (left && !isNodeKind(left, beforeValue)) {
      throw new StopParsing(
        syntaxError(
          `${item.value}()`,
          item.pos,
          'may follow operators, (, or ='
        )
      );
    }
    this.append(newMarker(item.pos, 'abs'));
  }
}

/**
 * Parses one line into a validated node sequence. On failure the sequence
 * ends with a `parsingStopped` node carrying the error message.
 */
export function parse(input: string, options: ParseOptions = {}): ParseResult {
  const logger = options.logger ?? rootLogger.child('parser');
  const timer = logger.time('parse');
  const result = new Parser(input, logger).parse();
  timer.end({ nodes: result.nodes.length, failed: result.error !== null });
  return result;
}
