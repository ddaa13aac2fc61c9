import { Format, CODE_ADDRESS_START, CODE_ADDRESS_END } from './types';
import type { Address, Instruction, Word } from './types';

/** Data memory address: 7-bit field plus the bank flag in bit 14 */
export function getDataAddress(word: Word): number {
  return (word & 0x7F) + ((word & (1 << 14)) ? 0x80 : 0);
}

/** Bit index for SET/CLR/SNZ/SZ, bits 9-7 */
export function getBit(word: Word): number {
  return (word >> 7) & 0x7;
}

/**
 * Build the decoded view of `word` at `address`, extracting the operand
 * fields that `format` defines.
 *
 * Throws on an address outside program memory or a missing mnemonic for any
 * format other than INVALID: both mean the opcode tables are inconsistent.
 */
export function createInstruction(
  address: Address,
  mnemonic: string | null,
  format: Format,
  word: Word,
): Instruction {
  if (address < CODE_ADDRESS_START || address > CODE_ADDRESS_END) {
    throw new Error(`Address 0x${address.toString(16).toUpperCase().padStart(4, '0')} out of range`);
  }
  if (format === Format.INVALID) {
    return { format, address, word };
  }

  const name = mnemonic?.trim();
  if (!name) {
    throw new Error('Invalid or missing opcode name');
  }

  switch (format) {
    case Format.SPECIAL:
      return { format, address, word, mnemonic: name };
    case Format.M2A:
    case Format.A2M:
    case Format.MEMORY:
      return { format, address, word, mnemonic: name, location: getDataAddress(word) };
    case Format.LITERAL:
      return { format, address, word, mnemonic: name, literal: word & 0xFF };
    case Format.ADDRESS:
      return { format, address, word, mnemonic: name, target: word & 0x7FF };
    case Format.BIT:
      return { format, address, word, mnemonic: name, location: getDataAddress(word), bit: getBit(word) };
  }
}
