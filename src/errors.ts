// src/errors.ts - Factories and rendering for CalcError
import { CalcError } from './types';

export function lexicalError(message: string, position: number): CalcError {
  return {
    type: 'lexical',
    message: `${message} at pos ${position}`,
    position,
  };
}

export function syntaxError(
  text: string,
  position: number,
  reason?: string,
  suggestedFix?: string
): CalcError {
  const message = reason
    ? `unexpected ${text} at pos ${position}, ${reason}`
    : `unexpected ${text} at pos ${position}`;
  const err: CalcError = { type: 'syntax', message, text, position };
  if (suggestedFix) err.suggestedFix = suggestedFix;
  return err;
}

export function unexpectedEof(
  position: number,
  openParens: number = 0
): CalcError {
  if (openParens > 0) {
    return {
      type: 'unexpected-eof',
      message: 'unexpected end of input, there are unclosed parenthesis',
      position,
      suggestedFix: `Add ${openParens} closing )`,
    };
  }
  return {
    type: 'unexpected-eof',
    message: 'unexpected end of input',
    position,
  };
}

export function runtimeError(message: string, text?: string): CalcError {
  const err: CalcError = { type: 'runtime', message };
  if (text !== undefined) err.text = text;
  return err;
}

export function storageError(
  verb: 'save' | 'load',
  profile: string,
  cause: unknown
): CalcError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return {
    type: 'storage',
    message: `could not ${verb} ${profile}: ${detail}`,
    text: profile,
  };
}

/**
 * Renders an error for display, with the suggested fix on its own line.
 */
export function formatCalcError(err: CalcError): string {
  if (!err.suggestedFix) return err.message;
  return `${err.message}\n  hint: ${err.suggestedFix}`;
}
