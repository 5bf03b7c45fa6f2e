import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync, readFileSync, existsSync, mkdirSync, rmSync } from 'fs';
import { main } from '../../src/assembler/cli.js';
import { tmpdir } from 'os';
import { join } from 'path';

describe('CLI', () => {
  const testDir = join(tmpdir(), 'mif-asm-test-' + Date.now());
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;

  beforeEach(() => {
    mkdirSync(testDir, { recursive: true });
    consoleLogs = [];
    consoleErrors = [];
    originalLog = console.log;
    originalError = console.error;
    console.log = (...args) => consoleLogs.push(args.join(' '));
    console.error = (...args) => consoleErrors.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('argument parsing', () => {
    it('should show usage with no arguments', () => {
      const exitCode = main(['node', 'cli.js']);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual(['Error: Too few arguments.']);
      expect(consoleLogs.some((l) => l.includes('Usage: mif-asm <input-file> [output-file]'))).toBe(true);
    });

    it('should show usage with too many arguments', () => {
      const exitCode = main(['node', 'cli.js', 'a.s', 'b.mif', 'c']);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual(['Error: Too many arguments.']);
      expect(consoleLogs.some((l) => l.includes('Usage'))).toBe(true);
    });

    it('should show help with -h flag', () => {
      const exitCode = main(['node', 'cli.js', '-h']);
      expect(exitCode).toBe(0);
      expect(consoleLogs.some((l) => l.includes('Usage'))).toBe(true);
    });

    it('should show help with --help flag', () => {
      const exitCode = main(['node', 'cli.js', 'prog.s', '--help']);
      expect(exitCode).toBe(0);
      expect(consoleErrors).toEqual([]);
    });

    it('should reject an empty input name', () => {
      const exitCode = main(['node', 'cli.js', '  ']);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual(['Error: Input file name is empty']);
    });

    it('should reject an empty output name', () => {
      const exitCode = main(['node', 'cli.js', 'prog.s', '']);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual(['Error: Output file name is empty']);
    });
  });

  describe('module loading', () => {
    it('should load when argv[1] names a file that does not exist', async () => {
      const savedEntry = process.argv[1];
      process.argv[1] = join(testDir, 'some-app', 'main');
      try {
        vi.resetModules();
        const mod = await import('../../src/index.js');
        expect(typeof mod.runCli).toBe('function');
        expect(consoleLogs).toEqual([]);
      } finally {
        process.argv[1] = savedEntry;
      }
    });
  });

  describe('file operations', () => {
    it('should error on missing input file', () => {
      const inputPath = join(testDir, 'nonexistent.s');
      const exitCode = main(['node', 'cli.js', inputPath]);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual([`Error: File not found: ${inputPath}`]);
    });

    it('should error when the input is a directory', () => {
      const exitCode = main(['node', 'cli.js', testDir]);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual([`Error: Cannot read file: ${testDir}`]);
    });

    it('should write the MIF file', () => {
      const inputPath = join(testDir, 'prog.s');
      const outputPath = join(testDir, 'rom.mif');

      writeFileSync(inputPath, 'mv r0, #0x05\nadd r1, r0\n');

      const exitCode = main(['node', 'cli.js', inputPath, outputPath]);

      expect(exitCode).toBe(0);
      expect(readFileSync(outputPath, 'utf-8')).toBe(
        [
          'WIDTH = 16;',
          'DEPTH = 256;',
          'ADDRESS_RADIX = HEX;',
          'DATA_RADIX = HEX;',
          '',
          'CONTENT',
          'BEGIN',
          '0\t\t: 1005;\t\t% mv r0, #0x0005 %',
          '1\t\t: 4200;\t\t% add r1, r0 %',
          'END;',
          '',
        ].join('\n')
      );
    });

    it('should append .mif to the output name', () => {
      const inputPath = join(testDir, 'prog.s');
      const outputBase = join(testDir, 'rom');

      writeFileSync(inputPath, '.word 1');

      const exitCode = main(['node', 'cli.js', inputPath, outputBase]);

      expect(exitCode).toBe(0);
      expect(existsSync(outputBase + '.mif')).toBe(true);
      expect(existsSync(outputBase)).toBe(false);
    });

    it('should error when the output cannot be written', () => {
      const inputPath = join(testDir, 'prog.s');
      const outputPath = join(testDir, 'missing-dir', 'rom.mif');

      writeFileSync(inputPath, '.word 1');

      const exitCode = main(['node', 'cli.js', inputPath, outputPath]);

      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual([`Error: Cannot write file: ${outputPath}`]);
    });
  });

  describe('error handling', () => {
    it('should print one diagnostic and write nothing on error', () => {
      const inputPath = join(testDir, 'error.s');
      const outputPath = join(testDir, 'error.mif');

      writeFileSync(inputPath, 'mv r0, r0\n.define DEPTH 10\n');

      const exitCode = main(['node', 'cli.js', inputPath, outputPath]);

      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual(['ERROR: line 2: symbol DEPTH is reserved, it cannot be redefined']);
      expect(existsSync(outputPath)).toBe(false);
    });
  });

  describe('output messages', () => {
    it('should print word count and depth on success', () => {
      const inputPath = join(testDir, 'prog.s');
      const outputPath = join(testDir, 'prog.mif');

      writeFileSync(inputPath, 'DEPTH 64\nmv r0, r0\nmv r1, r1\nb 0');

      const exitCode = main(['node', 'cli.js', inputPath, outputPath]);

      expect(exitCode).toBe(0);
      expect(consoleLogs).toEqual([`Assembled 3 words (depth 64) to ${outputPath}`]);
    });

    it('should print symbol count when symbols present', () => {
      const inputPath = join(testDir, 'prog.s');
      const outputPath = join(testDir, 'prog.mif');

      writeFileSync(inputPath, `
.define VALUE 42
main:
  mv r0, #VALUE
loop:
  b loop`);

      const exitCode = main(['node', 'cli.js', inputPath, outputPath]);

      expect(exitCode).toBe(0);
      expect(consoleLogs).toContain('Symbols: 3');
    });
  });
});
