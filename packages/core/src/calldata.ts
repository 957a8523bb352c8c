import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { keccak_256 } from '@noble/hashes/sha3';
import { isHexString, isValidAddress, strip0x } from '@calldata-compress/shared';
import { CodecError, CodecErrorCode } from './codec-errors.js';
import { SELECTOR_WIDTH } from './codec-types.js';

/**
 * Decode a hex calldata string, with or without the 0x prefix. Rejected
 * input never reaches the codec.
 */
export function parseCalldataHex(hex: string): Uint8Array {
  const digits = strip0x(hex);
  if (!isHexString(hex)) {
    throw new CodecError(
      CodecErrorCode.INVALID_INPUT,
      'Calldata contains non-hex characters',
      { context: { length: hex.length } }
    );
  }
  if (digits.length % 2 !== 0) {
    throw new CodecError(
      CodecErrorCode.INVALID_INPUT,
      `Calldata has an odd number of hex digits (${digits.length})`
    );
  }
  return hexToBytes(digits);
}

export function formatCalldataHex(bytes: Uint8Array): string {
  return `0x${bytesToHex(bytes)}`;
}

export function normalizeAddress(address: string): string {
  if (!isValidAddress(address)) {
    throw new CodecError(
      CodecErrorCode.INVALID_INPUT,
      `Invalid address: ${address}`
    );
  }
  return `0x${strip0x(address).toLowerCase()}`;
}

// First four bytes of keccak-256 over the canonical signature
export function selectorFromSignature(signature: string): Uint8Array {
  return keccak_256(signature).slice(0, SELECTOR_WIDTH);
}
