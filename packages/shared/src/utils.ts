export function strip0x(hex: string): string {
  return hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
}

export function isHexString(value: string): boolean {
  return /^[a-fA-F0-9]*$/.test(strip0x(value));
}

export function isValidAddress(address: string): boolean {
  return /^[a-fA-F0-9]{40}$/.test(strip0x(address));
}

export function formatRatio(ratio: number, decimals: number = 4): string {
  return ratio.toFixed(decimals);
}

export function getCurrentTimestamp(): number {
  return Date.now();
}

export function bytesEqualAt(
  haystack: Uint8Array,
  offset: number,
  needle: Uint8Array
): boolean {
  if (offset < 0 || offset + needle.length > haystack.length) {
    return false;
  }
  for (let i = 0; i < needle.length; i++) {
    if (haystack[offset + i] !== needle[i]) {
      return false;
    }
  }
  return true;
}
