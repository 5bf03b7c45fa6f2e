import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { assemble } from '../../src/assembler/assembler.js';
import { disassemble } from '../../src/assembler/disassembler.js';
import { Encoder } from '../../src/assembler/encoder.js';
import { ErrorCode } from '../../src/assembler/errors.js';
import { BRANCH_CONDITIONS, IMMEDIATE_OPCODES, OPCODE_MVT, REGISTER_OPCODES } from '../../src/assembler/isa.js';

const register = fc.integer({ min: 0, max: 7 });

function words(source: string): number[] {
  const result = assemble(source);
  expect(result.errors).toEqual([]);
  return result.words.map((w) => w.value);
}

describe('Property-based: assembler', () => {
  it('encodes every register pair the way the encoder does', () => {
    fc.assert(
      fc.property(fc.constantFrom(...REGISTER_OPCODES.keys()), register, register, (mnemonic, ra, rb) => {
        const operand = mnemonic === 'ld' || mnemonic === 'st' ? `[r${rb}]` : `r${rb}`;
        const opcode = REGISTER_OPCODES.get(mnemonic) ?? -1;
        expect(words(`${mnemonic} r${ra}, ${operand}`)).toEqual([Encoder.encodeRegister(opcode, ra, rb)]);
      }),
      { numRuns: 200 }
    );
  });

  it('treats pc as r7', () => {
    fc.assert(
      fc.property(register, (rb) => {
        expect(words(`add pc, r${rb}`)).toEqual(words(`add r7, r${rb}`));
        expect(words(`mv r${rb}, pc`)).toEqual(words(`mv r${rb}, r7`));
      })
    );
  });

  it('accepts a 9-bit immediate and nothing larger', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffff }), (imm) => {
        const result = assemble(`sub r2, #${imm}`);
        if (imm <= 0x1ff) {
          expect(result.errors).toEqual([]);
          expect(result.words[0].value).toBe(0x7400 | imm);
        } else {
          expect(result.errors.map((e) => e.code)).toEqual([ErrorCode.BIG_IMMEDIATE]);
        }
      }),
      { numRuns: 300 }
    );
  });

  it('accepts an mvt value only when its low byte is zero', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffff }), (imm) => {
        const result = assemble(`mvt r1, #${imm}`);
        if ((imm & 0xff) === 0) {
          expect(result.errors).toEqual([]);
          expect(result.words[0].value).toBe(0x3200 | (imm >> 8));
        } else {
          expect(result.errors.map((e) => e.code)).toEqual([ErrorCode.BAD_MVT_IMMEDIATE]);
        }
      }),
      { numRuns: 300 }
    );
  });

  it('reassembles the disassembly of an immediate instruction', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...IMMEDIATE_OPCODES.values()),
        register,
        fc.integer({ min: 0, max: 0x1ff }),
        (opcode, ra, imm) => {
          const value = opcode === OPCODE_MVT ? (imm & 0xff) << 8 : imm;
          const word = Encoder.encodeImmediate(opcode, ra, value);
          expect(words(disassemble(word))).toEqual([word]);
        }
      ),
      { numRuns: 200 }
    );
  });

  it('reassembles the disassembly of a branch', () => {
    fc.assert(
      fc.property(fc.constantFrom(...BRANCH_CONDITIONS.values()), fc.integer({ min: 0, max: 0xff }), (cond, target) => {
        const word = Encoder.encodeBranch(cond, target);
        expect(words(disassemble(word))).toEqual([word]);
      })
    );
  });

  it('rejects branch targets at or past the memory depth', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 128 }), fc.integer({ min: 0, max: 0x1ff }), (half, target) => {
        const depth = half * 2;
        const result = assemble(`DEPTH ${depth}\nbne ${target}`);
        if (target < depth) {
          expect(result.words.map((w) => w.value)).toEqual([0xf400 | target]);
        } else {
          expect(result.errors.map((e) => e.code)).toEqual([ErrorCode.BIG_BRANCH]);
        }
      }),
      { numRuns: 200 }
    );
  });

  it('resolves a forward label past any mix of instructions and defines', () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { maxLength: 40 }), (layout) => {
        const body = layout.map((isInstruction, i) => (isInstruction ? 'mv r0, r0' : `.define K${i} ${i}`));
        const source = ['b end', ...body, 'end: .word 0'].join('\n');
        const target = 1 + layout.filter((isInstruction) => isInstruction).length;

        const result = assemble(source);
        expect(result.errors).toEqual([]);
        expect(result.words[0].value).toBe(0xf000 | target);
        expect(result.symbols.get('end')).toBe(target);
      }),
      { numRuns: 200 }
    );
  });
});
