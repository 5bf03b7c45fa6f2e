/**
 * MIF writer
 *
 * Serializes assembled words as a Memory Initialization File: a fixed
 * header, one `address : word;` line per word, and the END marker.
 */

import type { MachineWord } from './assembler.js';
import { disassemble } from './disassembler.js';

export interface MemoryImage {
  width: number;
  depth: number;
  words: readonly MachineWord[];
}

const DATA_COMMENT = 'data';

export function formatMif(image: MemoryImage): string {
  const digits = Math.ceil(image.width / 4);
  const lines: string[] = [
    `WIDTH = ${image.width};`,
    `DEPTH = ${image.depth};`,
    'ADDRESS_RADIX = HEX;',
    'DATA_RADIX = HEX;',
    '',
    'CONTENT',
    'BEGIN',
  ];

  image.words.forEach((word, address) => {
    const comment = word.isInstruction ? disassemble(word.value) : DATA_COMMENT;
    const value = word.value.toString(16).padStart(digits, '0');
    lines.push(`${address.toString(16)}\t\t: ${value};\t\t% ${comment} %`);
  });

  lines.push('END;');
  return lines.join('\n') + '\n';
}

/**
 * Output file name: `a.mif` by default, `.mif` appended when missing.
 */
export function mifFileName(name?: string): string {
  if (name === undefined) {
    return 'a.mif';
  }
  return name.endsWith('.mif') ? name : `${name}.mif`;
}
