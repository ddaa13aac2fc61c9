import { DECODE_RULES, MEMORY_MAP } from './constants';
import { createInstruction } from './instruction';
import { Format } from './types';
import type {
  Address, DisassembledProgram, DisassemblyOptions, Instruction, LabelTable, Word,
} from './types';

/**
 * Decode a single 16-bit program word.
 * Rules are tried in DECODE_RULES order and the first hit wins; a word that
 * matches nothing decodes to an INVALID instruction rather than throwing.
 */
export function decodeWord(word: Word, address: Address): Instruction {
  for (const rule of DECODE_RULES) {
    if (rule.kind === 'group') {
      if ((word & rule.mask) !== rule.mark) continue;
      const mnemonic = rule.opcodes.get(word & rule.list);
      if (mnemonic) return createInstruction(address, mnemonic, rule.format, word);
    } else {
      const entry = rule.opcodes.get(word & rule.mask);
      if (entry) return createInstruction(address, entry[1], entry[0], word);
    }
  }
  return createInstruction(address, null, Format.INVALID, word);
}

/**
 * Give every CALL/JMP destination a label, numbered in order of first
 * reference while scanning from address 0.
 *
 * Example:
 *   assignLabels([JMP 0x010, CALL 0x004, JMP 0x010])
 *   → Map { 0x010 => 'label0000', 0x004 => 'label0001' }
 */
export function assignLabels(instructions: readonly Instruction[]): LabelTable {
  const labels = new Map<Address, string>();
  let counter = 0;
  for (const instruction of instructions) {
    if (instruction.format !== Format.ADDRESS) continue;
    if (labels.has(instruction.target)) continue;
    labels.set(instruction.target, `label${hex(counter, 4)}`);
    counter++;
  }
  return labels;
}

/** Register name for a data memory address, or [0XXh] when it has none */
export function lookupMemoryLocation(location: number): string {
  if (location < 0) {
    throw new Error(`Invalid memory location ${location}`);
  }
  const name = location < MEMORY_MAP.length ? MEMORY_MAP[location] : null;
  return name ?? `[0${hex(location, 2)}h]`;
}

function hex(value: number, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, '0');
}

function formatOperands(instruction: Instruction, labels: LabelTable | undefined): string {
  switch (instruction.format) {
    case Format.SPECIAL:
      return instruction.mnemonic;
    case Format.M2A:
      return `${instruction.mnemonic}\t${lookupMemoryLocation(instruction.location)}, A`;
    case Format.A2M:
      return `${instruction.mnemonic}\tA, ${lookupMemoryLocation(instruction.location)}`;
    case Format.LITERAL:
      return `${instruction.mnemonic}\tA, 0${hex(instruction.literal, 2)}h`;
    case Format.ADDRESS: {
      const target = labels?.get(instruction.target) ?? `0${hex(instruction.target, 4)}h`;
      return `${instruction.mnemonic}\t${target}`;
    }
    case Format.BIT:
      return `${instruction.mnemonic}\t${lookupMemoryLocation(instruction.location)}.${instruction.bit}`;
    case Format.MEMORY:
      return `${instruction.mnemonic}\t${lookupMemoryLocation(instruction.location)}`;
    case Format.INVALID:
      return `; (${instruction.word.toString(2).padStart(16, '0')}) Invalid opcode`;
  }
}

/**
 * Render one instruction as a listing line, preceded by its label block when
 * the address is a jump/call target. Pass no label table to print targets as
 * plain hex addresses.
 *
 * Examples:
 *   "0001\t2000\tCALL\tlabel0000\n"
 *   "0002\t0F2A\tMOV\tA, 02Ah\n"
 */
export function formatInstruction(instruction: Instruction, labels?: LabelTable): string {
  let out = '';
  const label = labels?.get(instruction.address);
  if (label !== undefined) {
    out += `\n${label}:\n\n`;
  }
  out += `${hex(instruction.address, 4)}\t${hex(instruction.word, 4)}\t`;
  out += formatOperands(instruction, labels);
  return out + '\n';
}

/** Decode every word (word i at address i) and resolve labels unless disabled */
export function disassembleProgram(
  words: readonly Word[],
  options: DisassemblyOptions = {},
): DisassembledProgram {
  const instructions = words.map((word, address) => decodeWord(word, address));
  if (options.labels === false) {
    return { instructions };
  }
  return { instructions, labels: assignLabels(instructions) };
}

/** Full listing text for a program image, in ascending address order */
export function disassemble(words: readonly Word[], options: DisassemblyOptions = {}): string {
  const { instructions, labels } = disassembleProgram(words, options);
  return instructions.map(instruction => formatInstruction(instruction, labels)).join('');
}
