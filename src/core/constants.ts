import { Format } from './types';
import type { LocationFormat } from './types';
import registerNames from './data/bs83b08a-registers.json';

// Special-function register names indexed by data memory address (0x00-0x5F).
// null entries are unnamed and render numerically.
export const MEMORY_MAP: readonly (string | null)[] = registerNames;

/**
 * A group of opcodes sharing a fixed bit pattern.
 * A word belongs to the group when (word & mask) === mark; the opcode is then
 * selected by (word & list).
 */
export interface OpcodeGroup {
  kind: 'group';
  name: string;
  format: Format;
  mask: number;
  mark: number;
  list: number;
  opcodes: ReadonlyMap<number, string>;
}

/** Opcodes selected directly by (word & mask), each with its own operand format */
export interface OpcodeTable {
  kind: 'table';
  name: string;
  mask: number;
  opcodes: ReadonlyMap<number, readonly [LocationFormat, string]>;
}

export type DecodeRule = OpcodeGroup | OpcodeTable;

export const SPECIAL_OPCODES: OpcodeGroup = {
  kind: 'group',
  name: 'special',
  format: Format.SPECIAL,
  mask: 0xFFF8,
  mark: 0x0000,
  list: 0x0007,
  opcodes: new Map([
    [0x0000, 'NOP'],
    [0x0001, 'CLR WDT1'],
    [0x0002, 'HALT'],
    [0x0003, 'RET'],
    [0x0004, 'RETI'],
    [0x0005, 'CLR WDT2'],
  ]),
};

export const BIT_OPCODES: OpcodeGroup = {
  kind: 'group',
  name: 'bit',
  format: Format.BIT,
  mask: 0xB000,
  mark: 0x3000,
  list: 0x3C00,
  opcodes: new Map([
    [0x3000, 'SET'],
    [0x3400, 'CLR'],
    [0x3800, 'SNZ'],
    [0x3C00, 'SZ'],
  ]),
};

export const ADDRESS_OPCODES: OpcodeGroup = {
  kind: 'group',
  name: 'address',
  format: Format.ADDRESS,
  mask: 0xF000,
  mark: 0x2000,
  list: 0xF800,
  opcodes: new Map([
    [0x2000, 'CALL'],
    [0x2800, 'JMP'],
  ]),
};

// Two-operand ALU and single-operand memory operations, keyed on bits 15 and 12-7
export const OTHER_OPCODES: OpcodeTable = {
  kind: 'table',
  name: 'other',
  mask: 0x9F80,
  opcodes: new Map<number, readonly [LocationFormat, string]>([
    [0x0080, [Format.M2A, 'MOV']],
    [0x0100, [Format.MEMORY, 'CPLA']],
    [0x0180, [Format.MEMORY, 'CPL']],
    [0x0200, [Format.A2M, 'SUB']],
    [0x0280, [Format.A2M, 'SUBM']],
    [0x0300, [Format.A2M, 'ADD']],
    [0x0380, [Format.A2M, 'ADDM']],
    [0x0400, [Format.A2M, 'XOR']],
    [0x0480, [Format.A2M, 'XORM']],
    [0x0500, [Format.A2M, 'OR']],
    [0x0580, [Format.A2M, 'ORM']],
    [0x0600, [Format.A2M, 'AND']],
    [0x0680, [Format.A2M, 'ANDM']],
    [0x0700, [Format.A2M, 'MOV']],
    [0x1000, [Format.MEMORY, 'SZA']],
    [0x1080, [Format.MEMORY, 'SZ']],
    [0x1100, [Format.MEMORY, 'SWAPA']],
    [0x1180, [Format.MEMORY, 'SWAP']],
    [0x1200, [Format.A2M, 'SBC']],
    [0x1280, [Format.A2M, 'SBCM']],
    [0x1300, [Format.A2M, 'ADC']],
    [0x1380, [Format.A2M, 'ADCM']],
    [0x1400, [Format.MEMORY, 'INCA']],
    [0x1480, [Format.MEMORY, 'INC']],
    [0x1500, [Format.MEMORY, 'DECA']],
    [0x1580, [Format.MEMORY, 'DEC']],
    [0x1600, [Format.MEMORY, 'SIZA']],
    [0x1680, [Format.MEMORY, 'SIZ']],
    [0x1700, [Format.MEMORY, 'SDZA']],
    [0x1780, [Format.MEMORY, 'SDZ']],
    [0x1800, [Format.MEMORY, 'RLA']],
    [0x1880, [Format.MEMORY, 'RL']],
    [0x1900, [Format.MEMORY, 'RRA']],
    [0x1980, [Format.MEMORY, 'RR']],
    [0x1A00, [Format.MEMORY, 'RLCA']],
    [0x1A80, [Format.MEMORY, 'RLC']],
    [0x1B00, [Format.MEMORY, 'RRCA']],
    [0x1B80, [Format.MEMORY, 'RRC']],
    [0x1D00, [Format.MEMORY, 'TABRDC']],
    [0x1D80, [Format.MEMORY, 'TABRDL']],
    [0x1E80, [Format.MEMORY, 'DAA']],
    [0x1F00, [Format.MEMORY, 'CLR']],
    [0x1F80, [Format.MEMORY, 'SET']],
  ]),
};

export const LITERAL_OPCODES: OpcodeGroup = {
  kind: 'group',
  name: 'literal',
  format: Format.LITERAL,
  mask: 0x8800,
  mark: 0x0800,
  list: 0x0F00,
  opcodes: new Map([
    [0x0900, 'RET'],
    [0x0A00, 'SUB'],
    [0x0B00, 'ADD'],
    [0x0C00, 'XOR'],
    [0x0D00, 'OR'],
    [0x0E00, 'AND'],
    [0x0F00, 'MOV'],
  ]),
};

// Same pattern as OTHER_OPCODES[0x0080]; never reached after that table.
export const M2A_OPCODES: OpcodeGroup = {
  kind: 'group',
  name: 'm2a',
  format: Format.M2A,
  mask: 0x9F80,
  mark: 0x0080,
  list: 0x1F80,
  opcodes: new Map([
    [0x0080, 'MOV'],
  ]),
};

// Evaluation order matters: masks overlap across groups.
export const DECODE_RULES: readonly DecodeRule[] = [
  SPECIAL_OPCODES,
  BIT_OPCODES,
  ADDRESS_OPCODES,
  OTHER_OPCODES,
  LITERAL_OPCODES,
  M2A_OPCODES,
];
