/**
 * MIF Assembler
 *
 * Assembles source for the 16-bit teaching CPU into Memory Initialization Files.
 */

export * from './isa.js';
export * from './classifier.js';
export * from './errors.js';
export * from './symbol-table.js';
export * from './encoder.js';
export * from './assembler.js';
export * from './disassembler.js';
export * from './mif.js';
export { main as runCli } from './cli.js';
