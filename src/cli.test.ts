import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { main } from './cli';

// NOP; CALL 0
const IMAGE = [0x00, 0x00, 0x00, 0x20];
const LABELLED = '\nlabel0000:\n\n0000\t0000\tNOP\n0001\t2000\tCALL\tlabel0000\n';
const UNLABELLED = '0000\t0000\tNOP\n0001\t2000\tCALL\t00000h\n';

/** Silence and capture the listing (stdout) and diagnostics (console.error) */
function captureOutput() {
  return {
    stdout: vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
    stderr: vi.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}

describe('bs83bdis command line', () => {
  let dir: string;
  let image: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'bs83bdis-cli-'));
    image = join(dir, 'rom.bin');
    writeFileSync(image, Uint8Array.from(IMAGE));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints a labelled listing by default', () => {
    const { stdout } = captureOutput();
    expect(main([image])).toBe(0);
    expect(stdout).toHaveBeenCalledWith(LABELLED);
  });

  it('prints plain addresses with --no-labels', () => {
    const { stdout } = captureOutput();
    expect(main(['--no-labels', image])).toBe(0);
    expect(stdout).toHaveBeenCalledWith(UNLABELLED);
  });

  it('writes the listing to --output', () => {
    const { stdout, stderr } = captureOutput();
    const out = join(dir, 'rom.asm');
    expect(main([image, '-o', out])).toBe(0);
    expect(readFileSync(out, 'utf-8')).toBe(LABELLED);
    expect(stdout).not.toHaveBeenCalledWith(LABELLED);
    expect(stderr).toHaveBeenCalledWith(`\x1b[32m✓ ${image}\x1b[0m → ${out}`);
  });

  it('reports load errors and exits with 1', () => {
    const { stderr } = captureOutput();
    const missing = join(dir, 'missing.bin');
    expect(main([missing])).toBe(1);
    expect(stderr).toHaveBeenCalledWith(`\x1b[31m✗ ${missing} is not a file\x1b[0m`);
  });

  it('requires exactly one input file', () => {
    captureOutput();
    expect(main([])).toBe(1);
    expect(main([image, image])).toBe(1);
  });

  it('rejects unknown options', () => {
    const { stderr } = captureOutput();
    expect(main(['--json', image])).toBe(1);
    expect(stderr).toHaveBeenCalledWith(`\x1b[31m✗ unknown option '--json'\x1b[0m`);
  });

  it('requires a file name after --output', () => {
    const { stderr } = captureOutput();
    expect(main([image, '--output'])).toBe(1);
    expect(stderr).toHaveBeenCalledWith(`\x1b[31m✗ --output requires a file name\x1b[0m`);
  });

  it('prints usage for --help', () => {
    const { stderr } = captureOutput();
    expect(main(['--help'])).toBe(0);
    expect(stderr).toHaveBeenCalledWith('Usage: bs83bdis <FILE> [options]');
  });
});
