// MIF Assembler - two-pass assembler for a 16-bit, 8-register teaching CPU

export * from './assembler/index.js';
