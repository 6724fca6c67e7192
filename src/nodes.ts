// src/nodes.ts - Node constructors, grouping sets and canonical rendering
import {
  AssignNode,
  DiskOperationNode,
  MarkerNode,
  Node,
  NodeKind,
  NumberNode,
  NumberSystem,
  OperatorKind,
  OperatorNode,
  ParsingStoppedNode,
  SetOutputNode,
  VariableNode,
  operatorKinds,
} from './types';
import { parseNumberSystem } from './radix';

// Nodes that are operators between values
export const operatorNodes: readonly NodeKind[] = operatorKinds;

// Nodes that can be evaluated as values
export const valueNodes: readonly NodeKind[] = ['number', 'variable'];

// Nodes that can be prefixes to most values
export const prefixNodes: readonly NodeKind[] = [
  'lparen',
  'setOutput',
  'assign',
];

export const operatorSymbols: Record<OperatorKind, string> = {
  add: '+',
  sub: '-',
  mult: '*',
  exp: '**',
  div: '/',
  fdiv: '//',
  and: '&',
  or: '|',
  xor: '^',
  inv: '~',
  mod: '%',
  lshift: '<<',
  rshift: '>>',
};

export function isNodeKind(node: Node, kinds: readonly NodeKind[]): boolean {
  return kinds.includes(node.kind);
}

export function isOperatorNode(node: Node): node is OperatorNode {
  return (operatorKinds as readonly string[]).includes(node.kind);
}

export function newNumber(
  position: number,
  value: string,
  system: NumberSystem = parseNumberSystem(value)
): NumberNode {
  return { kind: 'number', position, value: value.toLowerCase(), system };
}

export function newVariable(position: number, name: string): VariableNode {
  return { kind: 'variable', position, name };
}

export function newAssign(position: number, target: string): AssignNode {
  return { kind: 'assign', position, target };
}

export function newOperator(
  position: number,
  kind: OperatorKind
): OperatorNode {
  return { kind, position, operator: operatorSymbols[kind] };
}

export function newSetOutput(
  position: number,
  output: NumberSystem
): SetOutputNode {
  return { kind: 'setOutput', position, output };
}

export function newDiskOperation(
  position: number,
  kind: 'save' | 'load',
  profile: string
): DiskOperationNode {
  return { kind, position, profile };
}

export function newMarker(
  position: number,
  kind: MarkerNode['kind']
): MarkerNode {
  return { kind, position };
}

export function newParsingStopped(
  position: number,
  reason: string
): ParsingStoppedNode {
  return { kind: 'parsingStopped', position, reason };
}

/**
 * Canonical text of a node.
 */
export function nodeToString(node: Node): string {
  switch (node.kind) {
    case 'number':
      return node.value;
    case 'variable':
      return node.name;
    case 'assign':
      return `${node.target} =`;
    case 'setOutput':
      return node.output;
    case 'save':
    case 'load':
      return `${node.kind}(${node.profile})`;
    case 'clear':
      return 'clear()';
    case 'lparen':
      return '(';
    case 'rparen':
      return ')';
    case 'abs':
      return 'abs';
    case 'end':
      return '';
    case 'parsingStopped':
      return node.reason;
    default:
      return node.operator;
  }
}
