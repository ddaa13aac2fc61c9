export {
  decodeWord, assignLabels, lookupMemoryLocation, formatInstruction,
  disassembleProgram, disassemble,
} from './disassembler';
export { createInstruction, getDataAddress, getBit } from './instruction';
export { parseWords, loadBinaryFile, LoadError } from './loader';
export { DECODE_RULES, MEMORY_MAP } from './constants';
export type { DecodeRule, OpcodeGroup, OpcodeTable } from './constants';
export {
  Format, WORD_MASK, CODE_ADDRESS_START, CODE_ADDRESS_END, CODE_FILE_MAX_SIZE,
} from './types';
export type {
  Word, Address, Instruction, LabelTable, DisassemblyOptions, DisassembledProgram,
  SpecialInstruction, LocationInstruction, LiteralInstruction, AddressInstruction,
  BitInstruction, InvalidInstruction, LocationFormat,
} from './types';
