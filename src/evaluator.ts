// src/evaluator.ts - PEMDAS reduction over the parser's flat node sequence
//
// The sequence is reduced in place: the leftmost parenthesis group is
// evaluated recursively and spliced back as one number, then the leftmost
// ** , then the leftmost multiplicative operator, then the leftmost additive
// one, until a single value remains.
import {
  CalcError,
  ExecResult,
  Node,
  NodeKind,
  NumberNode,
  NumberSystem,
  OperatorKind,
  OperatorNode,
} from './types';
import { isOperatorNode, newNumber, nodeToString } from './nodes';
import { formatDecimal, formatNumber, literalValue } from './radix';
import {
  ProfileStore,
  MemoryProfileStore,
  decodeProfile,
  encodeProfile,
} from './profiles';
import { runtimeError, storageError } from './errors';
import { Logger, rootLogger } from './logger';

export interface EvaluatorOptions {
  store?: ProfileStore;
  // Fired after a profile has been written
  onSave?: (profile: string) => void;
  logger?: Logger;
}

class EvalFailure extends Error {
  constructor(readonly error: CalcError) {
    super(error.message);
  }
}

const parenthesis: readonly NodeKind[] = ['lparen'];
const exponent: readonly NodeKind[] = ['exp'];
const multiplicative: readonly NodeKind[] = [
  'mult',
  'div',
  'fdiv',
  'mod',
  'and',
  'or',
  'xor',
  'inv',
  'lshift',
  'rshift',
];
const additive: readonly NodeKind[] = ['add', 'sub'];

function findNext(nodes: readonly Node[], kinds: readonly NodeKind[]): number {
  return nodes.findIndex((node) => kinds.includes(node.kind));
}

// Index of the ) matching the ( at `open`, or -1
function findClosing(nodes: readonly Node[], open: number): number {
  let depth = 0;
  for (let idx = open; idx < nodes.length; idx++) {
    const kind = nodes[idx].kind;
    if (kind === 'lparen') depth++;
    else if (kind === 'rparen') depth--;
    if (depth === 0) return idx;
  }
  return -1;
}

function replace(
  nodes: readonly Node[],
  start: number,
  end: number,
  node: Node
): Node[] {
  return [...nodes.slice(0, start), node, ...nodes.slice(end + 1)];
}

// Remainder with the sign of the divisor
function floorMod(l: number, r: number): number {
  const m = l % r;
  return m !== 0 && (m < 0) !== (r < 0) ? m + r : m;
}

// Shifts on 64-bit signed integers
function shift(l: number, r: number, kind: 'lshift' | 'rshift'): number {
  const value = BigInt.asIntN(64, BigInt(Math.trunc(l)));
  const count = Math.trunc(r);
  if (count >= 64) {
    return kind === 'lshift' || value >= 0n ? 0 : -1;
  }
  const shifted =
    kind === 'lshift'
      ? BigInt.asIntN(64, value << BigInt(count))
      : value >> BigInt(count);
  return Number(shifted);
}

function applyOperator(kind: OperatorKind, l: number, r: number): number {
  switch (kind) {
    case 'add':
      return l + r;
    case 'sub':
      return l - r;
    case 'mult':
      return l * r;
    case 'exp':
      return Math.pow(l, r);
    case 'div':
      return l / r;
    case 'fdiv':
      return Math.floor(l / r);
    case 'mod':
      return floorMod(l, r);
    case 'lshift':
    case 'rshift':
      if (r < 0) {
        throw new EvalFailure(
          runtimeError(`negative shift count ${formatDecimal(r)}`)
        );
      }
      return shift(l, r, kind);
    // TODO: & | ^ ~ still subtract; give them bitwise semantics
    default:
      return l - r;
  }
}

/**
 * Evaluator: Owns the variable store and executes parsed lines against it.
 * One line is executed to completion before the next is accepted.
 */
export class Evaluator {
  private readonly variables = new Map<string, NumberNode>();
  private readonly store: ProfileStore;
  private readonly onSave: (profile: string) => void;
  private readonly logger: Logger;

  constructor(options: EvaluatorOptions = {}) {
    this.store = options.store ?? new MemoryProfileStore();
    this.onSave = options.onSave ?? (() => undefined);
    this.logger = options.logger ?? rootLogger.child('evaluator');
  }

  /** A copy of the current variable store. */
  snapshot(): Map<string, NumberNode> {
    return new Map(this.variables);
  }

  getVariable(name: string): NumberNode | undefined {
    return this.variables.get(name);
  }

  hasProfile(profile: string): boolean {
    return this.store.exists(profile);
  }

  /**
   * Executes a parsed line. With `commit` false an assignment is computed
   * but not written to the variable store.
   */
  exec(nodes: readonly Node[], commit: boolean): ExecResult {
    if (nodes.length === 0) return { result: '', error: null };

    const last = nodes[nodes.length - 1];
    if (last.kind === 'parsingStopped') {
      return {
        result: '',
        error: runtimeError(
          `cannot evaluate a line that failed to parse: ${last.reason}`
        ),
      };
    }

    const first = nodes[0];
    let output: NumberSystem | null = null;
    let target: string | null = null;
    let body = nodes;

    switch (first.kind) {
      case 'setOutput':
        output = first.output;
        body = nodes.slice(1);
        break;
      case 'assign':
        if (commit) target = first.target;
        body = nodes.slice(1);
        break;
      case 'clear':
        this.variables.clear();
        this.logger.info('cleared state');
        return { result: 'Cleared state', error: null };
      case 'save':
        return this.save(first.profile);
      case 'load':
        return this.load(first.profile);
    }

    try {
      const value = this.reduce(body);
      if (!value) return { result: '', error: null };

      const result = this.render(value, output);
      if (target) {
        this.variables.set(target, newNumber(value.position, result));
        this.logger.debug('assigned', { target, value: result });
      }
      return { result, error: null };
    } catch (e) {
      if (!(e instanceof EvalFailure)) throw e;
      this.logger.debug('evaluation failed', { message: e.error.message });
      return { result: '', error: e.error };
    }
  }

  // (parenthesis & exponent) (multiply & divide) (add & subtract)
  private reduce(input: readonly Node[]): NumberNode | null {
    let nodes = [...input];

    for (;;) {
      this.logger.debug('reduce', nodes.map(nodeToString).join(' '));

      // A single node must be a value, or the end of an empty line
      if (nodes.length === 1) return this.finalValue(nodes[0]);

      let next = findNext(nodes, parenthesis);
      if (next !== -1) {
        nodes = this.reduceGroup(nodes, next);
        continue;
      }

      next = findNext(nodes, exponent);
      if (next === -1) next = findNext(nodes, multiplicative);
      if (next === -1) next = findNext(nodes, additive);
      if (next !== -1) {
        nodes = this.calculateAt(nodes, next);
        continue;
      }

      // Cut out the end marker cleanly
      if (nodes[1].kind === 'end') {
        nodes = [nodes[0]];
        continue;
      }

      this.logger.error('unexpected end of reduction', {
        nodes: nodes.map(nodeToString),
      });
      throw new EvalFailure(runtimeError('internal error while evaluating'));
    }
  }

  // Replaces ( ... ), or abs( ... ), with its value
  private reduceGroup(nodes: Node[], open: number): Node[] {
    const closing = findClosing(nodes, open);
    const inner =
      closing === -1 ? null : this.reduce(nodes.slice(open + 1, closing));
    if (!inner) {
      throw new EvalFailure(runtimeError('internal error while evaluating'));
    }

    if (open > 0 && nodes[open - 1].kind === 'abs') {
      const positive = inner.value.startsWith('-')
        ? newNumber(inner.position, inner.value.slice(1), inner.system)
        : inner;
      return replace(nodes, open - 1, closing, positive);
    }
    return replace(nodes, open, closing, inner);
  }

  private calculateAt(nodes: Node[], index: number): Node[] {
    const op = nodes[index];
    const left = nodes[index - 1];
    const right = nodes[index + 1];
    if (!isOperatorNode(op) || !left || !right) {
      throw new EvalFailure(runtimeError('internal error while evaluating'));
    }
    const value = this.calculate(left, op, right);
    return replace(nodes, index - 1, index + 1, value);
  }

  private calculate(left: Node, op: OperatorNode, right: Node): NumberNode {
    // Each side can be a variable reference or a number
    const l = this.numericValue(this.readValue(left));
    const r = this.numericValue(this.readValue(right));
    const result = applyOperator(op.kind, l, r);
    const expr = `${nodeToString(left)} ${op.operator} ${nodeToString(right)}`;

    if (!Number.isFinite(result)) {
      throw new EvalFailure(
        runtimeError(`result of ${expr} is not a finite number`, expr)
      );
    }
    return newNumber(left.position, formatDecimal(result), 'dec');
  }

  private readValue(node: Node): NumberNode {
    if (node.kind === 'number') return node;
    if (node.kind === 'variable') {
      const value = this.variables.get(node.name);
      if (!value) {
        throw new EvalFailure(
          runtimeError(`unknown variable ${node.name}`, node.name)
        );
      }
      return value;
    }
    throw new EvalFailure(
      runtimeError(`expected a value, got ${nodeToString(node)}`)
    );
  }

  private numericValue(node: NumberNode): number {
    const value = literalValue(node.value, node.system);
    if (value === null) {
      throw new EvalFailure(
        runtimeError(`malformed number ${node.value}`, node.value)
      );
    }
    return value;
  }

  private finalValue(node: Node): NumberNode | null {
    if (node.kind === 'end') return null;
    const value = this.readValue(node);
    // 089 and 0x scan as numbers but have no value
    this.numericValue(value);
    return value;
  }

  // A literal already in the requested system is returned untouched
  private render(node: NumberNode, output: NumberSystem | null): string {
    if (output === null || node.system === output) return node.value;
    const text = formatNumber(this.numericValue(node), output);
    if (text === null) {
      throw new EvalFailure(
        runtimeError(`cannot show non-integer ${node.value} as ${output}`)
      );
    }
    return text;
  }

  private save(profile: string): ExecResult {
    try {
      this.store.write(profile, encodeProfile(this.variables));
    } catch (e) {
      this.logger.warn('save failed', { profile });
      return { result: '', error: storageError('save', profile, e) };
    }
    this.onSave(profile);
    this.logger.info(`saved ${profile}`, { variables: this.variables.size });
    return { result: `Saved ${profile}`, error: null };
  }

  // Loaded variables are merged over the current ones
  private load(profile: string): ExecResult {
    let loaded: Map<string, NumberNode>;
    try {
      loaded = decodeProfile(this.store.read(profile));
    } catch (e) {
      this.logger.warn('load failed', { profile });
      return { result: '', error: storageError('load', profile, e) };
    }
    for (const [name, value] of loaded) {
      this.variables.set(name, value);
    }
    this.logger.info(`loaded ${profile}`, { variables: loaded.size });
    return { result: `Loaded ${profile}`, error: null };
  }
}
