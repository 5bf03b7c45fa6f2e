/**
 * Instruction set tables
 *
 * Name/value lookups for the 16-bit teaching CPU. Word layout:
 *
 *   [15:13] opcode | [12] immediate flag | [11:9] rA or condition | [8:0] rB or immediate
 */

export const WORD_WIDTH = 16;
export const DEFAULT_DEPTH = 256;

export const MAX_WORD = 0xffff;
export const MAX_IMMEDIATE = 0x1ff;

/** Symbol name that may never be bound by a label or `.define`. */
export const RESERVED_SYMBOL = 'DEPTH';

// Opcodes
export const OPCODE_MV = 0;
export const OPCODE_MVT = 1;
export const OPCODE_ADD = 2;
export const OPCODE_SUB = 3;
export const OPCODE_LD = 4;
export const OPCODE_ST = 5;
export const OPCODE_AND = 6;
export const OPCODE_BRANCH = 7;

// Branch conditions
export const COND_ALWAYS = 0;
export const COND_EQ = 1;
export const COND_NE = 2;
export const COND_CC = 3;
export const COND_CS = 4;

/** Mnemonics accepted with two register operands. */
export const REGISTER_OPCODES: ReadonlyMap<string, number> = new Map([
  ['mv', OPCODE_MV],
  ['add', OPCODE_ADD],
  ['sub', OPCODE_SUB],
  ['ld', OPCODE_LD],
  ['st', OPCODE_ST],
  ['and', OPCODE_AND],
]);

/** Mnemonics accepted with a register and an immediate operand. */
export const IMMEDIATE_OPCODES: ReadonlyMap<string, number> = new Map([
  ['mv', OPCODE_MV],
  ['mvt', OPCODE_MVT],
  ['add', OPCODE_ADD],
  ['sub', OPCODE_SUB],
  ['and', OPCODE_AND],
]);

/** Branch mnemonics and their condition codes. */
export const BRANCH_CONDITIONS: ReadonlyMap<string, number> = new Map([
  ['b', COND_ALWAYS],
  ['beq', COND_EQ],
  ['bne', COND_NE],
  ['bcc', COND_CC],
  ['bcs', COND_CS],
]);

// pc is another name for r7
export const REGISTERS: ReadonlyMap<string, number> = new Map([
  ['r0', 0],
  ['r1', 1],
  ['r2', 2],
  ['r3', 3],
  ['r4', 4],
  ['r5', 5],
  ['r6', 6],
  ['r7', 7],
  ['pc', 7],
]);

/** Mnemonic for each opcode value (branches get their condition suffix appended). */
export const OPCODE_NAMES: readonly string[] = ['mv', 'mvt', 'add', 'sub', 'ld', 'st', 'and', 'b'];

export const REGISTER_NAMES: readonly string[] = ['r0', 'r1', 'r2', 'r3', 'r4', 'r5', 'r6', 'r7'];

export const CONDITION_SUFFIXES: readonly string[] = ['', 'eq', 'ne', 'cc', 'cs'];

/** Opcodes whose register form addresses memory through rB. */
export function isMemoryOpcode(opcode: number): boolean {
  return opcode === OPCODE_LD || opcode === OPCODE_ST;
}
