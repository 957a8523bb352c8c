import type { TransactionRecord } from '../../../src/codec-types.js';

export const TRANSFER_SELECTOR = 'a9059cbb';
export const APPROVE_SELECTOR = '095ea7b3';

export const TOKEN_ADDRESS = '0x1111111111111111111111111111111111111111';
export const ALICE_ADDRESS = '0x2222222222222222222222222222222222222222';
export const BOB_ADDRESS = '0x3333333333333333333333333333333333333333';
export const CAROL_ADDRESS = '0x4444444444444444444444444444444444444444';

/**
 * 32-byte ABI word holding an address
 */
export function addressWord(address: string): string {
  return '00'.repeat(12) + address.slice(2).toLowerCase();
}

/**
 * 32-byte ABI word holding an unsigned integer
 */
export function uintWord(value: bigint): string {
  return value.toString(16).padStart(64, '0');
}

export function transferCalldata(to: string, amount: bigint): string {
  return `0x${TRANSFER_SELECTOR}${addressWord(to)}${uintWord(amount)}`;
}

export function approveCalldata(spender: string, amount: bigint): string {
  return `0x${APPROVE_SELECTOR}${addressWord(spender)}${uintWord(amount)}`;
}

export function createTransferTransaction(
  from: string,
  to: string,
  amount: bigint
): TransactionRecord {
  return {
    input: transferCalldata(to, amount),
    to: TOKEN_ADDRESS,
    from,
  };
}

export const SAMPLE_TRANSACTIONS: TransactionRecord[] = [
  createTransferTransaction(ALICE_ADDRESS, BOB_ADDRESS, 1000n),
  createTransferTransaction(ALICE_ADDRESS, CAROL_ADDRESS, 250n),
  createTransferTransaction(BOB_ADDRESS, CAROL_ADDRESS, 1000n),
  createTransferTransaction(CAROL_ADDRESS, BOB_ADDRESS, 42n),
  {
    input: approveCalldata(BOB_ADDRESS, 5000n),
    to: TOKEN_ADDRESS,
    from: ALICE_ADDRESS,
  },
  { input: '0x', to: BOB_ADDRESS, from: ALICE_ADDRESS },
];
