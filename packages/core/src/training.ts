/**
 * Training corpus extraction
 *
 * Turns transaction records into the three token streams the dictionaries
 * are ranked from. Counting and ranking stay in Dictionary.build.
 */

import { hexToBytes } from '@noble/hashes/utils';
import { isValidAddress, strip0x } from '@calldata-compress/shared';
import { parseCalldataHex } from './calldata.js';
import { freezeDictionarySet } from './dictionary-set.js';
import { Dictionary } from './dictionary.js';
import type { DictionarySet } from './codec-interfaces.js';
import {
  ADDRESS_WIDTH,
  SELECTOR_WIDTH,
  type CodecConfig,
  type TrainingCorpus,
  type TransactionRecord,
} from './codec-types.js';

const WORD_SIZE = 32;
// An address argument is left-padded with 12 zero bytes inside its ABI word
const ADDRESS_PADDING = WORD_SIZE - ADDRESS_WIDTH;

function addressFromField(field: string | null | undefined): Uint8Array | null {
  if (!field || !isValidAddress(field)) {
    return null;
  }
  return hexToBytes(strip0x(field).toLowerCase());
}

/**
 * Address-looking arguments: a zero-padded word whose value does not start
 * with two zero bytes. Small integers share the padding but not the high bytes.
 */
export function extractWordAddresses(calldata: Uint8Array): Uint8Array[] {
  const found: Uint8Array[] = [];
  for (
    let offset = SELECTOR_WIDTH;
    offset + WORD_SIZE <= calldata.length;
    offset += WORD_SIZE
  ) {
    let padded = true;
    for (let i = 0; i < ADDRESS_PADDING; i++) {
      if (calldata[offset + i] !== 0) {
        padded = false;
        break;
      }
    }
    const valueStart = offset + ADDRESS_PADDING;
    if (!padded || (calldata[valueStart] === 0 && calldata[valueStart + 1] === 0)) {
      continue;
    }
    found.push(calldata.slice(valueStart, offset + WORD_SIZE));
  }
  return found;
}

export function extractNgrams(
  calldata: Uint8Array,
  sizes: readonly number[],
  stride: number
): Uint8Array[] {
  const grams: Uint8Array[] = [];
  for (const size of sizes) {
    for (
      let offset = SELECTOR_WIDTH;
      offset + size <= calldata.length;
      offset += stride
    ) {
      grams.push(calldata.slice(offset, offset + size));
    }
  }
  return grams;
}

export function extractTrainingCorpus(
  transactions: readonly TransactionRecord[],
  config: CodecConfig
): TrainingCorpus {
  const corpus: TrainingCorpus = { selectors: [], addresses: [], patterns: [] };

  for (const transaction of transactions) {
    const calldata = parseCalldataHex(transaction.input);

    for (const field of [transaction.to, transaction.from]) {
      const address = addressFromField(field);
      if (address) {
        corpus.addresses.push(address);
      }
    }

    if (calldata.length < SELECTOR_WIDTH) {
      continue;
    }
    corpus.selectors.push(calldata.slice(0, SELECTOR_WIDTH));
    corpus.addresses.push(...extractWordAddresses(calldata));
    corpus.patterns.push(
      ...extractNgrams(calldata, config.patternNgramSizes, config.patternStride)
    );
  }

  return corpus;
}

export function buildDictionaries(
  corpus: TrainingCorpus,
  config: CodecConfig
): DictionarySet {
  return freezeDictionarySet({
    selector: Dictionary.build(corpus.selectors, {
      kind: 'selector',
      ...config.selectorDictionary,
      minLength: SELECTOR_WIDTH,
      maxLength: SELECTOR_WIDTH,
    }),
    address: Dictionary.build(corpus.addresses, {
      kind: 'address',
      ...config.addressDictionary,
      minLength: ADDRESS_WIDTH,
      maxLength: ADDRESS_WIDTH,
    }),
    pattern: Dictionary.build(corpus.patterns, {
      kind: 'pattern',
      ...config.patternDictionary,
      minOccurrences: config.minPatternOccurrences,
      minLength: 2,
    }),
  });
}
