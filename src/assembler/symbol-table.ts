/**
 * Symbol Table
 *
 * One flat namespace for `.define` constants and labels. Filled during
 * pass 1 and handed to pass 2 as a frozen, read-only view.
 */

import { RESERVED_SYMBOL } from './isa.js';
import { ErrorCode } from './errors.js';

export type SymbolTableErrorCode = ErrorCode.RESERVED_SYMBOL | ErrorCode.REDEFINITION;

export class SymbolTableError extends Error {
  constructor(public code: SymbolTableErrorCode, public symbol: string) {
    super(`Cannot bind symbol '${symbol}'`);
    this.name = 'SymbolTableError';
  }
}

export class SymbolTable {
  private symbols: Map<string, number> = new Map();
  private frozen = false;

  /** Throw if `name` cannot be bound: it is reserved or already taken. */
  checkName(name: string): void {
    if (name === RESERVED_SYMBOL) {
      throw new SymbolTableError(ErrorCode.RESERVED_SYMBOL, name);
    }
    if (this.symbols.has(name)) {
      throw new SymbolTableError(ErrorCode.REDEFINITION, name);
    }
  }

  /** Bind a label or constant. */
  define(name: string, value: number): void {
    if (this.frozen) {
      throw new Error(`Symbol table is frozen, cannot define '${name}'`);
    }
    this.checkName(name);
    this.symbols.set(name, value);
  }

  lookup(name: string): number | undefined {
    return this.symbols.get(name);
  }

  get size(): number {
    return this.symbols.size;
  }

  /**
   * Stop accepting definitions and return a read-only snapshot.
   */
  freeze(): ReadonlyMap<string, number> {
    this.frozen = true;
    return new Map(this.symbols);
  }
}
