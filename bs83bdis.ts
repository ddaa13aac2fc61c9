/**
 * bs83bdis — Holtek BS83B08A-3 disassembler command line
 *
 * Usage:
 *   npm run bundle && node dist/bs83bdis.mjs <image.bin> [--no-labels] [-o out.asm]
 */
import { main } from './src/cli';

process.exit(main(process.argv.slice(2)));
