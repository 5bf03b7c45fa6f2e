#!/usr/bin/env node
/**
 * Assembler CLI
 *
 * Usage: mif-asm <input-file> [output-file]
 */

import { readFileSync, realpathSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { Assembler } from './assembler.js';
import { formatMif, mifFileName } from './mif.js';

interface CliOptions {
  inputFile: string;
  outputFile: string;
}

type ParsedArgs = { options: CliOptions } | { exitCode: number };

function parseArgs(args: string[]): ParsedArgs {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.some((arg) => arg === '-h' || arg === '--help')) {
    printUsage();
    return { exitCode: 0 };
  }

  if (cliArgs.length === 0) {
    console.error('Error: Too few arguments.');
    printUsage();
    return { exitCode: 1 };
  }

  if (cliArgs.length > 2) {
    console.error('Error: Too many arguments.');
    printUsage();
    return { exitCode: 1 };
  }

  const [inputFile, outputArg] = cliArgs;

  if (!inputFile.trim()) {
    console.error('Error: Input file name is empty');
    return { exitCode: 1 };
  }
  if (outputArg !== undefined && !outputArg.trim()) {
    console.error('Error: Output file name is empty');
    return { exitCode: 1 };
  }

  return { options: { inputFile, outputFile: mifFileName(outputArg) } };
}

function printUsage(): void {
  console.log(`MIF Assembler

Usage: mif-asm <input-file> [output-file]

Arguments:
  input-file   Assembly source
  output-file  Memory Initialization File (default: a.mif, .mif is appended if missing)

Options:
  -h, --help   Show this help message

Examples:
  mif-asm program.s
  mif-asm program.s rom.mif`);
}

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}

export function main(args: string[] = process.argv): number {
  const parsed = parseArgs(args);

  if ('exitCode' in parsed) {
    return parsed.exitCode;
  }
  const { options } = parsed;

  // Read input file
  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e: unknown) {
    if (errnoCode(e) === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return 1;
  }

  // Assemble
  const result = new Assembler(source).assemble();

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      console.error(error.message);
    }
    return 1;
  }

  // Write output
  try {
    writeFileSync(options.outputFile, formatMif(result));
  } catch {
    console.error(`Error: Cannot write file: ${options.outputFile}`);
    return 1;
  }

  console.log(
    `Assembled ${result.words.length} words (depth ${result.depth}) to ${options.outputFile}`
  );

  if (result.symbols.size > 0) {
    console.log(`Symbols: ${result.symbols.size}`);
  }

  return 0;
}

/** argv[1] may be an npm bin symlink, or a path without its extension. */
function isEntryPoint(entry: string | undefined): boolean {
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint(process.argv[1])) {
  process.exit(main());
}
