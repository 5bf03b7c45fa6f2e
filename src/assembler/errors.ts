/**
 * Assembler diagnostics
 *
 * Every failure is identified by an ErrorCode. describeError() turns a code
 * and its context into the single line shown to the user.
 */

export enum ErrorCode {
  BAD_INSTRUCTION = 1,
  BAD_REGISTER,
  BAD_MVT_IMMEDIATE,
  BIG_IMMEDIATE,
  BIG_DEFINE,
  REDEFINITION,
  UNDEFINED_SYMBOL,
  BAD_DEPTH,
  BAD_DATA,
  RESERVED_SYMBOL,
  BIG_BRANCH,
  BAD_SYNTAX,
  BAD_INDIRECT,
  MEMORY_OVERFLOW,
  UNKNOWN, // keep last
}

interface ErrorContext {
  line: string;
  depth: number;
  instructionCount: number;
}

const withContext = (ctx: ErrorContext) =>
  `(depth = ${ctx.depth}, instructions = ${ctx.instructionCount})`;

const MESSAGES: Record<ErrorCode, (ctx: ErrorContext) => string> = {
  [ErrorCode.BAD_INSTRUCTION]: (ctx) => `ERROR: line ${ctx.line}: unknown instruction`,
  [ErrorCode.BAD_REGISTER]: (ctx) => `ERROR: line ${ctx.line}: unknown register`,
  [ErrorCode.BAD_MVT_IMMEDIATE]: (ctx) =>
    `ERROR: line ${ctx.line}: the immediate value for mvt should be 0 in the eight least-significant bits`,
  [ErrorCode.BIG_IMMEDIATE]: (ctx) => `ERROR: line ${ctx.line}: the immediate value is too large`,
  [ErrorCode.BIG_DEFINE]: (ctx) => `ERROR: line ${ctx.line}: define value too large`,
  [ErrorCode.REDEFINITION]: (ctx) => `ERROR: line ${ctx.line}: symbol is being redefined`,
  [ErrorCode.UNDEFINED_SYMBOL]: (ctx) =>
    `ERROR: line ${ctx.line}: undeclared identifier (label or define), or value error`,
  [ErrorCode.BAD_DEPTH]: (ctx) =>
    `ERROR: line ${ctx.line}: memory depth must be a positive multiple of 2, set once before the first instruction ${withContext(ctx)}`,
  [ErrorCode.BAD_DATA]: (ctx) => `ERROR: line ${ctx.line}: missing or bad data`,
  [ErrorCode.RESERVED_SYMBOL]: (ctx) =>
    `ERROR: line ${ctx.line}: symbol DEPTH is reserved, it cannot be redefined`,
  [ErrorCode.BIG_BRANCH]: (ctx) =>
    `ERROR: line ${ctx.line}: the branch target is too large ${withContext(ctx)}`,
  [ErrorCode.BAD_SYNTAX]: (ctx) => `ERROR: line ${ctx.line}: can't parse assembly code`,
  [ErrorCode.BAD_INDIRECT]: (ctx) =>
    `ERROR: line ${ctx.line}: only ld and st accept an indirect [register] operand`,
  [ErrorCode.MEMORY_OVERFLOW]: (ctx) =>
    `ERROR: line ${ctx.line}: program does not fit in memory ${withContext(ctx)}`,
  [ErrorCode.UNKNOWN]: () => 'ERROR: UNKNOWN',
};

/**
 * Format a diagnostic. Codes outside the enum clamp to ErrorCode.UNKNOWN.
 */
export function describeError(
  code: number,
  line: number,
  depth: number,
  instructionCount: number
): string {
  const known = Number.isInteger(code) && code >= ErrorCode.BAD_INSTRUCTION;
  const clamped: ErrorCode = known ? Math.min(code, ErrorCode.UNKNOWN) : ErrorCode.UNKNOWN;
  return MESSAGES[clamped]({ line: String(line), depth, instructionCount });
}

export class AssemblyError extends Error {
  constructor(
    public code: ErrorCode,
    public line: number,
    depth: number,
    instructionCount: number
  ) {
    super(describeError(code, line, depth, instructionCount));
    this.name = 'AssemblyError';
  }
}
