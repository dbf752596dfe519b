import type { TokenSequence } from '../types';

const TOKEN_SPLIT_RE = /[()\s]+/;

// i32.add, local.get, memory.size, f64.convert_i32_s, ...
const DOTTED_INSTRUCTION_RE = /^[a-z][a-z0-9_]*(?:\.[a-z0-9_]+)+$/;

const INTEGER_LITERAL_RE = /^[-+]?\d+$/;
const HEX_LITERAL_RE = /^0x[0-9a-fA-F]+$/;

export const DECLARATION_TOKENS: ReadonlySet<string> = new Set([
  'module',
  'func',
  'param',
  'result',
  'local',
  'global',
  'memory',
  'table',
  'elem',
  'data',
  'type',
  'import',
  'export',
]);

export const BARE_OPCODES: ReadonlySet<string> = new Set([
  'block',
  'loop',
  'if',
  'else',
  'end',
  'call',
  'drop',
  'return',
  'nop',
  'unreachable',
  'br',
  'br_if',
  'br_table',
  'select',
]);

/**
 * Whether a raw token counts as an instruction mnemonic.
 *
 * Literals and declaration keywords are rejected; anything else must be a dotted
 * mnemonic or one of the bare control/stack opcodes. Mnemonics outside both
 * groups (e.g. `call_indirect`, `return_call`) are dropped.
 */
export function isInstructionToken(token: string): boolean {
  if (!token) return false;
  if (INTEGER_LITERAL_RE.test(token) || HEX_LITERAL_RE.test(token)) return false;
  if (DECLARATION_TOKENS.has(token)) return false;
  return DOTTED_INSTRUCTION_RE.test(token) || BARE_OPCODES.has(token);
}

/** Extract instruction tokens from WAT text, in source order. */
export function tokenizeInstructions(watText: string): TokenSequence {
  return watText.split(TOKEN_SPLIT_RE).filter(isInstructionToken);
}

/** Split text into lines, keeping each line's terminator so a join reproduces the input. */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}
