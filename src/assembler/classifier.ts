/**
 * Line Classifier
 *
 * Sorts each source line into one of a fixed set of statement kinds and
 * captures its fields. The grammar is line-oriented and regular, so every
 * kind is an anchored pattern tried in precedence order.
 */

export enum LineKind {
  BLANK = 'BLANK',
  DEPTH = 'DEPTH',
  DEFINE = 'DEFINE',
  LABEL = 'LABEL',
  INDIRECT_MISUSE = 'INDIRECT_MISUSE',
  REGISTER = 'REGISTER',
  IMMEDIATE = 'IMMEDIATE',
  BRANCH = 'BRANCH',
  DATA = 'DATA',
  UNRECOGNIZED = 'UNRECOGNIZED',
}

export interface SourceLine {
  text: string;
  line: number;
}

export interface BlankLine {
  kind: LineKind.BLANK;
}

export interface DepthLine {
  kind: LineKind.DEPTH;
  value: string;
}

export interface DefineLine {
  kind: LineKind.DEFINE;
  name: string;
  value: string;
}

export interface LabelLine {
  kind: LineKind.LABEL;
  label: string;
}

/** Register form with `[rB]` on an opcode other than ld/st. */
export interface IndirectMisuseLine {
  kind: LineKind.INDIRECT_MISUSE;
  label?: string;
  mnemonic: string;
}

export interface RegisterLine {
  kind: LineKind.REGISTER;
  label?: string;
  mnemonic: string;
  ra: string;
  rb: string;
  indirect: boolean;
}

export interface ImmediateLine {
  kind: LineKind.IMMEDIATE;
  label?: string;
  mnemonic: string;
  ra: string;
  operand: string;
}

export interface BranchLine {
  kind: LineKind.BRANCH;
  label?: string;
  mnemonic: string;
  target: string;
}

export interface DataLine {
  kind: LineKind.DATA;
  label?: string;
  value: string;
}

export interface UnrecognizedLine {
  kind: LineKind.UNRECOGNIZED;
}

/** Lines that occupy one word of memory. */
export type EmittingLine = IndirectMisuseLine | RegisterLine | ImmediateLine | BranchLine | DataLine;

export type ClassifiedLine =
  | BlankLine
  | DepthLine
  | DefineLine
  | LabelLine
  | EmittingLine
  | UnrecognizedLine;

const NAME = '[A-Za-z_$][A-Za-z0-9_$]*';
const REG = 'r\\d+|pc';
const OPERAND = '[A-Za-z0-9_$]+';
const LABEL_PREFIX = `(?:(${NAME}):)?\\s*`;
const TRAILER = '\\s*(?:\\/\\/.*)?$';

const COMMENT_PATTERN = /^\/\//;
const DEPTH_PATTERN = new RegExp(`^DEPTH\\s+(\\d+)${TRAILER}`);
const DEFINE_PATTERN = new RegExp(`^\\.define\\s+(${NAME})\\s+(${OPERAND})${TRAILER}`);
const LABEL_PATTERN = new RegExp(`^(${NAME}):${TRAILER}`);
const REGISTER_PATTERN = new RegExp(
  `^${LABEL_PREFIX}([A-Za-z]+)\\s+(${REG})\\s*,\\s*(?:\\[\\s*(${REG})\\s*\\]|(${REG}))${TRAILER}`
);
const IMMEDIATE_PATTERN = new RegExp(
  `^${LABEL_PREFIX}([A-Za-z]+)\\s+(${REG})\\s*,\\s*#?\\s*(${OPERAND})${TRAILER}`
);
const BRANCH_PATTERN = new RegExp(`^${LABEL_PREFIX}(b[A-Za-z]*)\\s+#?\\s*(${OPERAND})${TRAILER}`);
const DATA_PATTERN = new RegExp(`^${LABEL_PREFIX}\\.word\\s+(${OPERAND})${TRAILER}`);

const INDIRECT_MNEMONICS = new Set(['ld', 'st']);

/**
 * Split source text into numbered lines (1-based).
 */
export function loadSource(source: string): SourceLine[] {
  return source.split(/\r?\n/).map((text, index) => ({ text, line: index + 1 }));
}

export function classifyLine(raw: string): ClassifiedLine {
  const text = raw.trim();

  if (text === '' || COMMENT_PATTERN.test(text)) {
    return { kind: LineKind.BLANK };
  }

  let match = DEPTH_PATTERN.exec(text);
  if (match) {
    return { kind: LineKind.DEPTH, value: match[1] };
  }

  match = DEFINE_PATTERN.exec(text);
  if (match) {
    return { kind: LineKind.DEFINE, name: match[1], value: match[2] };
  }

  match = LABEL_PATTERN.exec(text);
  if (match) {
    return { kind: LineKind.LABEL, label: match[1] };
  }

  match = REGISTER_PATTERN.exec(text);
  if (match) {
    const mnemonic = match[2];
    const indirect = match[4] !== undefined;

    // Only loads and stores take [rB]; this wins over a plain shape-1 match
    if (indirect && !INDIRECT_MNEMONICS.has(mnemonic)) {
      return { kind: LineKind.INDIRECT_MISUSE, label: match[1], mnemonic };
    }

    return {
      kind: LineKind.REGISTER,
      label: match[1],
      mnemonic,
      ra: match[3],
      rb: match[4] ?? match[5],
      indirect,
    };
  }

  match = IMMEDIATE_PATTERN.exec(text);
  if (match) {
    return { kind: LineKind.IMMEDIATE, label: match[1], mnemonic: match[2], ra: match[3], operand: match[4] };
  }

  match = BRANCH_PATTERN.exec(text);
  if (match) {
    return { kind: LineKind.BRANCH, label: match[1], mnemonic: match[2], target: match[3] };
  }

  match = DATA_PATTERN.exec(text);
  if (match) {
    return { kind: LineKind.DATA, label: match[1], value: match[2] };
  }

  return { kind: LineKind.UNRECOGNIZED };
}

export function isEmittingLine(line: ClassifiedLine): line is EmittingLine {
  switch (line.kind) {
    case LineKind.INDIRECT_MISUSE:
    case LineKind.REGISTER:
    case LineKind.IMMEDIATE:
    case LineKind.BRANCH:
    case LineKind.DATA:
      return true;
    default:
      return false;
  }
}

/**
 * Parse an unsigned integer literal: decimal, `0x` hex or `0b` binary.
 * Returns undefined for anything else, including symbol names.
 */
export function parseLiteral(text: string): number | undefined {
  if (/^0[xX][0-9a-fA-F]+$/.test(text)) {
    return parseInt(text.slice(2), 16);
  }
  if (/^0[bB][01]+$/.test(text)) {
    return parseInt(text.slice(2), 2);
  }
  if (/^\d+$/.test(text)) {
    return parseInt(text, 10);
  }
  return undefined;
}
