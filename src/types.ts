// src/types.ts - Core interfaces and types for the calcline pipeline

/**
 * Operator kinds shared by lexical items and nodes.
 */
export const operatorKinds = [
  'add',
  'sub',
  'mult',
  'exp',
  'div',
  'fdiv',
  'and',
  'or',
  'xor',
  'inv',
  'mod',
  'lshift',
  'rshift',
] as const;
export type OperatorKind = (typeof operatorKinds)[number];

/**
 * Keywords the scanner recognizes in place of plain text.
 */
export const keywordKinds = [
  'abs',
  'dec',
  'bin',
  'hex',
  'oct',
  'save',
  'load',
  'clear',
] as const;
export type KeywordKind = (typeof keywordKinds)[number];

/**
 * Item Type: Kind of a lexical item.
 */
export type ItemType =
  | 'error' // value is the error text
  | 'eof'
  | 'space'
  | 'equals'
  | 'lparen'
  | 'rparen'
  | 'number' // 135, 1.23, 0x7f, b0100, 0755
  | 'variable' // $hello
  | 'text'
  | OperatorKind
  | KeywordKind;

/**
 * Item: One lexical token with its raw text and starting byte position.
 */
export interface Item {
  readonly type: ItemType;
  readonly value: string;
  readonly pos: number;
}

/**
 * Number System: Radix of a literal, and the output format selector.
 */
export type NumberSystem = 'dec' | 'hex' | 'bin' | 'oct';

export type NodeKind =
  | 'assign'
  | 'lparen'
  | 'rparen'
  | 'number'
  | 'variable'
  | OperatorKind
  | 'abs'
  | 'setOutput'
  | 'save'
  | 'load'
  | 'clear'
  | 'end'
  | 'parsingStopped';

interface BaseNode {
  readonly position: number; // byte offset in the line, -1 for loaded values
}

export interface NumberNode extends BaseNode {
  readonly kind: 'number';
  readonly value: string; // lowercased literal text
  readonly system: NumberSystem;
}

export interface VariableNode extends BaseNode {
  readonly kind: 'variable';
  readonly name: string; // includes the $ sigil
}

export interface AssignNode extends BaseNode {
  readonly kind: 'assign';
  readonly target: string;
}

export interface OperatorNode extends BaseNode {
  readonly kind: OperatorKind;
  readonly operator: string;
}

export interface SetOutputNode extends BaseNode {
  readonly kind: 'setOutput';
  readonly output: NumberSystem;
}

export interface DiskOperationNode extends BaseNode {
  readonly kind: 'save' | 'load';
  readonly profile: string;
}

export interface MarkerNode extends BaseNode {
  readonly kind: 'lparen' | 'rparen' | 'abs' | 'clear' | 'end';
}

/**
 * Parsing Stopped: Always the last node of a sequence whose parse failed.
 */
export interface ParsingStoppedNode extends BaseNode {
  readonly kind: 'parsingStopped';
  readonly reason: string;
}

/**
 * Node: One validated semantic unit of the parser's flat output.
 */
export type Node =
  | NumberNode
  | VariableNode
  | AssignNode
  | OperatorNode
  | SetOutputNode
  | DiskOperationNode
  | MarkerNode
  | ParsingStoppedNode;

/**
 * Calc Error: Structured failure for one input line.
 */
export interface CalcError {
  type: 'lexical' | 'syntax' | 'unexpected-eof' | 'runtime' | 'storage';
  message: string;
  text?: string; // offending source text
  position?: number; // byte offset into the line
  suggestedFix?: string;
}

export interface ParseResult {
  nodes: Node[];
  error: CalcError | null;
}

export interface ExecResult {
  result: string;
  error: CalcError | null;
}
