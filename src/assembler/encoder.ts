/**
 * Instruction Encoder
 *
 * Packs resolved operands into 16-bit machine words. Range checks happen in
 * the assembler before these are called; here every field is only masked.
 */

import { OPCODE_BRANCH, OPCODE_MVT } from './isa.js';

const IMMEDIATE_FLAG = 1 << 12;

export class Encoder {
  /**
   * Encode a register-register instruction
   * Format: opcode[15:13] | 0[12] | rA[11:9] | 000000 | rB[2:0]
   */
  static encodeRegister(opcode: number, ra: number, rb: number): number {
    return ((opcode & 0x7) << 13) | ((ra & 0x7) << 9) | (rb & 0x7);
  }

  /**
   * Encode a register-immediate instruction
   * Format: opcode[15:13] | 1[12] | rA[11:9] | imm[8:0]
   *
   * mvt loads the upper byte of rA, so its field holds imm >> 8.
   */
  static encodeImmediate(opcode: number, ra: number, imm: number): number {
    const field = opcode === OPCODE_MVT ? imm >> 8 : imm;
    return ((opcode & 0x7) << 13) | IMMEDIATE_FLAG | ((ra & 0x7) << 9) | (field & 0x1ff);
  }

  /**
   * Encode a branch
   * Format: 111[15:13] | 1[12] | cond[11:9] | target[8:0]
   */
  static encodeBranch(condition: number, target: number): number {
    return (OPCODE_BRANCH << 13) | IMMEDIATE_FLAG | ((condition & 0x7) << 9) | (target & 0x1ff);
  }
}
