/**
 * Disassembler
 *
 * Decodes machine words back into assembly text. The MIF writer uses this
 * to annotate every instruction word.
 */

import {
  CONDITION_SUFFIXES,
  OPCODE_BRANCH,
  OPCODE_MVT,
  OPCODE_NAMES,
  REGISTER_NAMES,
  isMemoryOpcode,
} from './isa.js';

export interface DecodedWord {
  opcode: number;
  immediate: boolean;
  /** rA, or the condition code for branches. */
  ra: number;
  rb: number;
  /** Low 9 bits: immediate value or branch target. */
  operand: number;
}

export function decode(word: number): DecodedWord {
  return {
    opcode: (word >> 13) & 0x7,
    immediate: ((word >> 12) & 0x1) === 1,
    ra: (word >> 9) & 0x7,
    rb: word & 0x7,
    operand: word & 0x1ff,
  };
}

function hex16(value: number): string {
  return '0x' + value.toString(16).padStart(4, '0');
}

export function disassemble(word: number): string {
  const { opcode, immediate, ra, rb, operand } = decode(word);

  if (opcode === OPCODE_BRANCH) {
    const suffix = CONDITION_SUFFIXES[ra] ?? `?${ra}`;
    const target = immediate ? `#${hex16(operand)}` : REGISTER_NAMES[rb];
    return `b${suffix} ${target}`;
  }

  const head = `${OPCODE_NAMES[opcode]} ${REGISTER_NAMES[ra]}, `;

  if (immediate) {
    const value = opcode === OPCODE_MVT ? operand << 8 : operand;
    return head + `#${hex16(value)}`;
  }

  return head + (isMemoryOpcode(opcode) ? `[${REGISTER_NAMES[rb]}]` : REGISTER_NAMES[rb]);
}
