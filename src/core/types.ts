// 16-bit program word (stored as standard JS number, masked to 16 bits)
export type Word = number;

// 11-bit program address, one word per address
export type Address = number;

export const WORD_MASK = 0xFFFF;

export const CODE_ADDRESS_START = 0x0000;
export const CODE_ADDRESS_END = 0x07FF;
export const CODE_FILE_MAX_SIZE = 0x1000; // bytes

export const Format = {
  SPECIAL: 'special',
  M2A: 'm2a',         // memory to accumulator
  A2M: 'a2m',         // accumulator to memory
  LITERAL: 'literal',
  ADDRESS: 'address',
  BIT: 'bit',
  MEMORY: 'memory',
  INVALID: 'invalid',
} as const;
export type Format = typeof Format[keyof typeof Format];

/** Formats whose single operand is a data memory location */
export type LocationFormat = typeof Format.M2A | typeof Format.A2M | typeof Format.MEMORY;

interface InstructionBase {
  readonly address: Address;
  readonly word: Word;
}

export interface SpecialInstruction extends InstructionBase {
  readonly format: typeof Format.SPECIAL;
  readonly mnemonic: string;
}

export interface LocationInstruction extends InstructionBase {
  readonly format: LocationFormat;
  readonly mnemonic: string;
  /** Data memory address, 0x00-0xFF */
  readonly location: number;
}

export interface LiteralInstruction extends InstructionBase {
  readonly format: typeof Format.LITERAL;
  readonly mnemonic: string;
  readonly literal: number;
}

export interface AddressInstruction extends InstructionBase {
  readonly format: typeof Format.ADDRESS;
  readonly mnemonic: string;
  /** Jump/call destination in program memory */
  readonly target: Address;
}

export interface BitInstruction extends InstructionBase {
  readonly format: typeof Format.BIT;
  readonly mnemonic: string;
  readonly location: number;
  readonly bit: number;
}

export interface InvalidInstruction extends InstructionBase {
  readonly format: typeof Format.INVALID;
}

export type Instruction =
  | SpecialInstruction
  | LocationInstruction
  | LiteralInstruction
  | AddressInstruction
  | BitInstruction
  | InvalidInstruction;

/** Jump/call target address -> generated label name */
export type LabelTable = ReadonlyMap<Address, string>;

export interface DisassemblyOptions {
  /** Resolve CALL/JMP targets to generated labels (default true) */
  labels?: boolean;
}

export interface DisassembledProgram {
  instructions: Instruction[];
  /** Undefined when label generation is disabled */
  labels?: LabelTable;
}
