/**
 * Assembler
 *
 * Two-pass assembler: pass 1 assigns addresses to labels and collects
 * `.define` constants, pass 2 encodes one word per instruction or `.word`
 * line against the frozen symbol table.
 */

import type {
  BranchLine,
  ClassifiedLine,
  DataLine,
  EmittingLine,
  ImmediateLine,
  RegisterLine,
  SourceLine,
} from './classifier.js';
import { LineKind, classifyLine, isEmittingLine, loadSource, parseLiteral } from './classifier.js';
import { AssemblyError, ErrorCode } from './errors.js';
import { Encoder } from './encoder.js';
import {
  BRANCH_CONDITIONS,
  DEFAULT_DEPTH,
  IMMEDIATE_OPCODES,
  MAX_IMMEDIATE,
  MAX_WORD,
  OPCODE_MVT,
  REGISTERS,
  REGISTER_OPCODES,
  WORD_WIDTH,
} from './isa.js';
import { SymbolTable, SymbolTableError } from './symbol-table.js';

export interface MachineWord {
  value: number;
  isInstruction: boolean;
}

export interface AssemblerOptions {
  /** Memory depth in words; a DEPTH directive in the source overrides it. */
  depth?: number;
}

export interface AssemblerError {
  code: ErrorCode;
  message: string;
  line: number;
}

export interface AssemblerResult {
  words: MachineWord[];
  symbols: ReadonlyMap<string, number>;
  width: number;
  depth: number;
  errors: AssemblerError[];
}

interface Statement {
  line: number;
  node: ClassifiedLine;
}

interface Layout {
  symbols: ReadonlyMap<string, number>;
  depth: number;
}

/** Where pass 2 is, for resolving operands and reporting errors. */
interface EncodeContext extends Layout {
  line: number;
  address: number;
}

export function isValidDepth(depth: number): boolean {
  return Number.isSafeInteger(depth) && depth > 0 && depth % 2 === 0;
}

export class Assembler {
  private lines: readonly SourceLine[];
  private initialDepth: number;

  constructor(source: string, options: AssemblerOptions = {}) {
    const depth = options.depth ?? DEFAULT_DEPTH;
    if (!isValidDepth(depth)) {
      throw new RangeError(`Memory depth must be a positive multiple of 2, got ${depth}`);
    }
    this.lines = loadSource(source);
    this.initialDepth = depth;
  }

  assemble(): AssemblerResult {
    const statements: Statement[] = this.lines.map((source) => ({
      line: source.line,
      node: classifyLine(source.text),
    }));

    let layout: Layout;
    try {
      layout = this.pass1(statements);
    } catch (e: unknown) {
      return this.failed(e, { symbols: new Map(), depth: this.initialDepth });
    }

    let words: MachineWord[];
    try {
      words = this.pass2(statements, layout);
    } catch (e: unknown) {
      return this.failed(e, layout);
    }

    return {
      words,
      symbols: layout.symbols,
      width: WORD_WIDTH,
      depth: layout.depth,
      errors: [],
    };
  }

  private failed(e: unknown, layout: Layout): AssemblerResult {
    if (!(e instanceof AssemblyError)) {
      throw e;
    }
    return {
      words: [],
      symbols: layout.symbols,
      width: WORD_WIDTH,
      depth: layout.depth,
      errors: [{ code: e.code, message: e.message, line: e.line }],
    };
  }

  // Pass 1: symbol table and memory depth

  private pass1(statements: readonly Statement[]): Layout {
    const table = new SymbolTable();
    let depth = this.initialDepth;
    let depthDeclared = false;
    let address = 0;

    const symbolOp = (line: number, op: () => void): void => {
      try {
        op();
      } catch (e: unknown) {
        if (e instanceof SymbolTableError) {
          throw new AssemblyError(e.code, line, depth, address);
        }
        throw e;
      }
    };
    const bind = (name: string, value: number, line: number): void =>
      symbolOp(line, () => table.define(name, value));

    for (const { line, node } of statements) {
      switch (node.kind) {
        case LineKind.BLANK:
          break;

        case LineKind.DEPTH: {
          const value = parseInt(node.value, 10);
          if (depthDeclared || address > 0 || !isValidDepth(value)) {
            throw new AssemblyError(ErrorCode.BAD_DEPTH, line, depth, address);
          }
          depth = value;
          depthDeclared = true;
          break;
        }

        case LineKind.DEFINE: {
          // Name checks come before the value
          symbolOp(line, () => table.checkName(node.name));
          const value = parseLiteral(node.value);
          if (value === undefined) {
            throw new AssemblyError(ErrorCode.BAD_DATA, line, depth, address);
          }
          if (value > MAX_WORD) {
            throw new AssemblyError(ErrorCode.BIG_DEFINE, line, depth, address);
          }
          bind(node.name, value, line);
          break;
        }

        case LineKind.LABEL:
          bind(node.label, address, line);
          break;

        case LineKind.UNRECOGNIZED:
          throw new AssemblyError(ErrorCode.BAD_SYNTAX, line, depth, address);

        default:
          // Instruction or .word: an optional label takes this word's address
          if (node.label !== undefined) {
            bind(node.label, address, line);
          }
          address++;
      }
    }

    return { symbols: table.freeze(), depth };
  }

  // Pass 2: machine words

  private pass2(statements: readonly Statement[], layout: Layout): MachineWord[] {
    const words: MachineWord[] = [];

    for (const { line, node } of statements) {
      const ctx: EncodeContext = { ...layout, line, address: words.length };

      // Unreachable after pass 1, kept so both passes share the policy
      if (node.kind === LineKind.UNRECOGNIZED) {
        throw this.error(ErrorCode.BAD_SYNTAX, ctx);
      }
      if (!isEmittingLine(node)) {
        continue;
      }
      if (words.length >= layout.depth) {
        throw this.error(ErrorCode.MEMORY_OVERFLOW, ctx);
      }

      words.push(this.encodeLine(node, ctx));
    }

    return words;
  }

  private encodeLine(node: EmittingLine, ctx: EncodeContext): MachineWord {
    switch (node.kind) {
      case LineKind.INDIRECT_MISUSE:
        throw this.error(ErrorCode.BAD_INDIRECT, ctx);
      case LineKind.REGISTER:
        return { value: this.encodeRegister(node, ctx), isInstruction: true };
      case LineKind.IMMEDIATE:
        return { value: this.encodeImmediate(node, ctx), isInstruction: true };
      case LineKind.BRANCH:
        return { value: this.encodeBranch(node, ctx), isInstruction: true };
      case LineKind.DATA:
        return { value: this.encodeData(node, ctx), isInstruction: false };
    }
  }

  private encodeRegister(node: RegisterLine, ctx: EncodeContext): number {
    const opcode = REGISTER_OPCODES.get(node.mnemonic);
    if (opcode === undefined) {
      throw this.error(ErrorCode.BAD_INSTRUCTION, ctx);
    }
    const ra = this.register(node.ra, ctx);
    const rb = this.register(node.rb, ctx);
    return Encoder.encodeRegister(opcode, ra, rb);
  }

  private encodeImmediate(node: ImmediateLine, ctx: EncodeContext): number {
    const opcode = IMMEDIATE_OPCODES.get(node.mnemonic);
    if (opcode === undefined) {
      throw this.error(ErrorCode.BAD_INSTRUCTION, ctx);
    }
    const ra = this.register(node.ra, ctx);
    const imm = this.resolve(node.operand, ctx);

    if (opcode === OPCODE_MVT) {
      if (imm > MAX_WORD) {
        throw this.error(ErrorCode.BIG_IMMEDIATE, ctx);
      }
      if ((imm & 0xff) !== 0) {
        throw this.error(ErrorCode.BAD_MVT_IMMEDIATE, ctx);
      }
    } else if (imm > MAX_IMMEDIATE) {
      throw this.error(ErrorCode.BIG_IMMEDIATE, ctx);
    }

    return Encoder.encodeImmediate(opcode, ra, imm);
  }

  private encodeBranch(node: BranchLine, ctx: EncodeContext): number {
    const condition = BRANCH_CONDITIONS.get(node.mnemonic);
    if (condition === undefined) {
      throw this.error(ErrorCode.BAD_INSTRUCTION, ctx);
    }
    const target = this.resolve(node.target, ctx);
    if (target >= ctx.depth) {
      throw this.error(ErrorCode.BIG_BRANCH, ctx);
    }
    return Encoder.encodeBranch(condition, target);
  }

  private encodeData(node: DataLine, ctx: EncodeContext): number {
    const value = parseLiteral(node.value);
    if (value === undefined || value > MAX_WORD) {
      throw this.error(ErrorCode.BAD_DATA, ctx);
    }
    return value;
  }

  private register(name: string, ctx: EncodeContext): number {
    const reg = REGISTERS.get(name);
    if (reg === undefined) {
      throw this.error(ErrorCode.BAD_REGISTER, ctx);
    }
    return reg;
  }

  /** A literal, or failing that a label or `.define` constant. */
  private resolve(operand: string, ctx: EncodeContext): number {
    const value = parseLiteral(operand) ?? ctx.symbols.get(operand);
    if (value === undefined) {
      throw this.error(ErrorCode.UNDEFINED_SYMBOL, ctx);
    }
    return value;
  }

  private error(code: ErrorCode, ctx: EncodeContext): AssemblyError {
    return new AssemblyError(code, ctx.line, ctx.depth, ctx.address);
  }
}

/**
 * Assemble source text in one call.
 */
export function assemble(source: string, options?: AssemblerOptions): AssemblerResult {
  return new Assembler(source, options).assemble();
}
