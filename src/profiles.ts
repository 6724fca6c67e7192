// src/profiles.ts - Named profile storage for saved variables
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { NumberNode } from './types';
import { newNumber } from './nodes';
import { literalValue, parseNumberSystem } from './radix';
import { lexAll } from './lexer';
import { Logger, rootLogger } from './logger';

/**
 * Profile Store: Key-value persistence addressed by profile name. Methods
 * throw on I/O failure; the evaluator turns that into a storage error.
 */
export interface ProfileStore {
  read(profile: string): string;
  write(profile: string, contents: string): void;
  exists(profile: string): boolean;
}

/**
 * Stores each profile as `<root>/<profile>.yml`.
 */
export class FileProfileStore implements ProfileStore {
  readonly root: string;
  private readonly logger: Logger;

  constructor(root: string, logger: Logger = rootLogger.child('profiles')) {
    this.root = root;
    this.logger = logger;
  }

  pathFor(profile: string): string {
    return path.join(this.root, `${profile}.yml`);
  }

  read(profile: string): string {
    const file = this.pathFor(profile);
    this.logger.debug('reading profile', { file });
    return fs.readFileSync(file, 'utf8');
  }

  write(profile: string, contents: string): void {
    const file = this.pathFor(profile);
    this.logger.debug('writing profile', { file });
    fs.mkdirSync(this.root, { recursive: true, mode: 0o700 });
    fs.writeFileSync(file, contents, { mode: 0o600 });
  }

  exists(profile: string): boolean {
    return fs.existsSync(this.pathFor(profile));
  }
}

export class MemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, string>();

  read(profile: string): string {
    const contents = this.profiles.get(profile);
    if (contents === undefined) {
      throw new Error(`no profile named ${profile}`);
    }
    return contents;
  }

  write(profile: string, contents: string): void {
    this.profiles.set(profile, contents);
  }

  exists(profile: string): boolean {
    return this.profiles.has(profile);
  }
}

interface ProfileDocument {
  variables: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const variableName = /^\$[A-Za-z_]+$/;

// A literal the scanner reads as one number, optionally negative
function isNumberLiteral(text: string): boolean {
  const types = lexAll(text).map((item) => item.type);
  const literal = types[0] === 'sub' ? types.slice(1) : types;
  if (
    literal.length !== 2 ||
    literal[0] !== 'number' ||
    literal[1] !== 'eof'
  ) {
    return false;
  }
  return literalValue(text, parseNumberSystem(text)) !== null;
}

export function encodeProfile(
  variables: ReadonlyMap<string, NumberNode>
): string {
  const doc: ProfileDocument = { variables: {} };
  for (const [name, node] of variables) {
    doc.variables[name] = node.value;
  }
  return yaml.stringify(doc);
}

/**
 * Reads a profile document back into number nodes. Throws on anything that
 * is not a `variables` mapping of `$name` keys to number literals.
 */
export function decodeProfile(text: string): Map<string, NumberNode> {
  const doc: unknown = yaml.parse(text);
  if (!isRecord(doc) || !isRecord(doc.variables)) {
    throw new Error('profile has no variables mapping');
  }

  const variables = new Map<string, NumberNode>();
  for (const [name, raw] of Object.entries(doc.variables)) {
    if (!variableName.test(name)) {
      throw new Error(`invalid variable name ${name}`);
    }
    // Hand-edited files may hold plain YAML numbers
    const literal = typeof raw === 'number' ? String(raw) : raw;
    if (typeof literal !== 'string' || !isNumberLiteral(literal)) {
      throw new Error(`invalid value for ${name}`);
    }
    variables.set(name, newNumber(-1, literal));
  }
  return variables;
}
