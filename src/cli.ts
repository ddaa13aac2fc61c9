import { writeFileSync } from 'fs';
import { disassemble, loadBinaryFile, LoadError } from './core';

const USAGE = [
  'bs83bdis — Holtek BS83B08A-3 binary code disassembler',
  '',
  'Usage: bs83bdis <FILE> [options]',
  '',
  'Options:',
  '  --no-labels        Do not generate labels for CALL/JMP targets',
  '  -o, --output FILE  Write the listing to FILE instead of stdout',
  '  -h, --help         Show this help',
];

function printUsage(): void {
  for (const line of USAGE) console.error(line);
}

function fail(message: string): number {
  console.error(`\x1b[31m✗ ${message}\x1b[0m`);
  return 1;
}

/**
 * Run the disassembler with the given command-line arguments
 * (process.argv without node and script). Returns the process exit code.
 */
export function main(args: string[]): number {
  let labels = true;
  let outputPath: string | undefined;
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h' || arg === '--help') {
      printUsage();
      return 0;
    } else if (arg === '--no-labels') {
      labels = false;
    } else if (arg === '-o' || arg === '--output') {
      if (i + 1 >= args.length) {
        printUsage();
        return fail(`${arg} requires a file name`);
      }
      outputPath = args[++i];
    } else if (arg.startsWith('-')) {
      printUsage();
      return fail(`unknown option '${arg}'`);
    } else {
      files.push(arg);
    }
  }

  if (files.length !== 1) {
    printUsage();
    return 1;
  }

  const inputPath = files[0];
  let listing: string;
  try {
    listing = disassemble(loadBinaryFile(inputPath), { labels });
  } catch (err) {
    if (err instanceof LoadError) return fail(err.message);
    throw err;
  }

  if (outputPath === undefined) {
    process.stdout.write(listing);
    return 0;
  }

  try {
    writeFileSync(outputPath, listing, 'utf-8');
  } catch {
    return fail(`cannot write file '${outputPath}'`);
  }
  console.error(`\x1b[32m✓ ${inputPath}\x1b[0m → ${outputPath}`);
  return 0;
}
