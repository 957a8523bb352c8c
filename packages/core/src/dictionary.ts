/**
 * Byte-pattern dictionary
 *
 * Immutable bijection between byte patterns and fixed-width indices. A
 * dictionary is built once from a training corpus and never changes after
 * construction; retraining produces a new instance.
 */

import { encode, decode } from '@msgpack/msgpack';
import { bytesToHex } from '@noble/hashes/utils';
import { bytesEqualAt } from '@calldata-compress/shared';
import { CodecError, CodecErrorCode } from './codec-errors.js';
import {
  DICTIONARY_KINDS,
  type DictionaryKind,
  type IndexWidth,
} from './codec-types.js';

const DICTIONARY_RECORD_FORMAT = 1;

export interface DictionaryEntry {
  pattern: Uint8Array;
  index: number;
}

export interface DictionaryBuildOptions {
  kind: DictionaryKind;
  capacity: number;
  indexWidth: IndexWidth;
  minOccurrences?: number;
  minLength?: number;
  maxLength?: number;
}

export interface TokenMatch {
  index: number;
  length: number;
}

// Structured record persisted by save()/load()
export interface DictionaryRecord {
  format: number;
  kind: DictionaryKind;
  capacity: number;
  indexWidth: IndexWidth;
  dropped: number;
  entries: Array<[Uint8Array, number]>;
}

interface Candidate {
  pattern: Uint8Array;
  count: number;
}

export function maxIndexFor(indexWidth: IndexWidth): number {
  return indexWidth === 1 ? 0xff : 0xffff;
}

export class Dictionary {
  readonly kind: DictionaryKind;
  readonly capacity: number;
  readonly indexWidth: IndexWidth;
  // Distinct candidates left out because the capacity was reached
  readonly droppedCount: number;

  private readonly forward: ReadonlyMap<string, number>;
  private readonly backward: ReadonlyMap<number, Uint8Array>;
  // Entries grouped by first byte, longest first then lowest index
  private readonly byLeadingByte: ReadonlyMap<number, readonly DictionaryEntry[]>;

  private constructor(
    kind: DictionaryKind,
    capacity: number,
    indexWidth: IndexWidth,
    entries: readonly DictionaryEntry[],
    droppedCount: number
  ) {
    Dictionary.validateLimits(capacity, indexWidth);
    if (entries.length > capacity) {
      throw new CodecError(
        CodecErrorCode.INVALID_DICTIONARY,
        `Dictionary holds ${entries.length} entries but capacity is ${capacity}`
      );
    }

    const forward = new Map<string, number>();
    const backward = new Map<number, Uint8Array>();
    const maxIndex = maxIndexFor(indexWidth);

    for (const { pattern, index } of entries) {
      if (pattern.length === 0) {
        throw new CodecError(
          CodecErrorCode.INVALID_DICTIONARY,
          'Dictionary patterns must not be empty'
        );
      }
      if (!Number.isInteger(index) || index < 0 || index > maxIndex) {
        throw new CodecError(
          CodecErrorCode.INVALID_DICTIONARY,
          `Index ${index} does not fit in ${indexWidth} byte(s)`
        );
      }
      const key = bytesToHex(pattern);
      if (forward.has(key) || backward.has(index)) {
        throw new CodecError(
          CodecErrorCode.INVALID_DICTIONARY,
          `Duplicate dictionary entry for pattern ${key} or index ${index}`
        );
      }
      const copy = Uint8Array.from(pattern);
      forward.set(key, index);
      backward.set(index, copy);
    }

    const buckets = new Map<number, DictionaryEntry[]>();
    for (const [index, pattern] of backward) {
      const bucket = buckets.get(pattern[0]) ?? [];
      bucket.push({ pattern, index });
      buckets.set(pattern[0], bucket);
    }
    for (const bucket of buckets.values()) {
      bucket.sort(
        (a, b) => b.pattern.length - a.pattern.length || a.index - b.index
      );
    }

    this.kind = kind;
    this.capacity = capacity;
    this.indexWidth = indexWidth;
    this.droppedCount = droppedCount;
    this.forward = forward;
    this.backward = backward;
    this.byLeadingByte = buckets;
    Object.freeze(this);
  }

  /**
   * Rank corpus patterns by frequency and keep the top `capacity`. Ties keep
   * the order in which patterns first appeared in the corpus.
   */
  static build(
    corpus: Iterable<Uint8Array>,
    options: DictionaryBuildOptions
  ): Dictionary {
    Dictionary.validateLimits(options.capacity, options.indexWidth);

    const minLength = Math.max(1, options.minLength ?? 1);
    const maxLength = options.maxLength ?? Number.POSITIVE_INFINITY;
    const minOccurrences = options.minOccurrences ?? 1;

    const counts = new Map<string, Candidate>();
    for (const pattern of corpus) {
      if (pattern.length < minLength || pattern.length > maxLength) {
        continue;
      }
      const key = bytesToHex(pattern);
      const existing = counts.get(key);
      if (existing) {
        existing.count++;
      } else {
        counts.set(key, { pattern, count: 1 });
      }
    }

    // Map iteration follows first insertion and sort() is stable
    const ranked = Array.from(counts.values())
      .filter(candidate => candidate.count >= minOccurrences)
      .sort((a, b) => b.count - a.count);

    const kept = ranked.slice(0, options.capacity);
    const dropped = ranked.length - kept.length;

    return new Dictionary(
      options.kind,
      options.capacity,
      options.indexWidth,
      kept.map((candidate, index) => ({ pattern: candidate.pattern, index })),
      dropped
    );
  }

  /**
   * Dictionary whose indices follow the order of `patterns`.
   */
  static fromPatterns(
    patterns: readonly Uint8Array[],
    options: Omit<DictionaryBuildOptions, 'minOccurrences' | 'minLength' | 'maxLength'>
  ): Dictionary {
    return new Dictionary(
      options.kind,
      options.capacity,
      options.indexWidth,
      patterns.map((pattern, index) => ({ pattern, index })),
      0
    );
  }

  static empty(
    kind: DictionaryKind,
    capacity: number,
    indexWidth: IndexWidth
  ): Dictionary {
    return new Dictionary(kind, capacity, indexWidth, [], 0);
  }

  static fromRecord(record: DictionaryRecord): Dictionary {
    return new Dictionary(
      record.kind,
      record.capacity,
      record.indexWidth,
      record.entries.map(([pattern, index]) => ({ pattern, index })),
      record.dropped
    );
  }

  static load(source: Uint8Array): Dictionary {
    let raw: unknown;
    try {
      raw = decode(source);
    } catch (error) {
      throw new CodecError(
        CodecErrorCode.INVALID_DICTIONARY,
        `Dictionary record is not valid MessagePack: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return Dictionary.fromRecord(parseDictionaryRecord(raw));
  }

  get size(): number {
    return this.forward.size;
  }

  get isEmpty(): boolean {
    return this.forward.size === 0;
  }

  lookup(pattern: Uint8Array): number | undefined {
    return this.forward.get(bytesToHex(pattern));
  }

  reverse(index: number): Uint8Array | undefined {
    const pattern = this.backward.get(index);
    return pattern ? Uint8Array.from(pattern) : undefined;
  }

  /**
   * Longest entry matching `bytes` at `offset`, lowest index on a tie.
   */
  matchLongest(bytes: Uint8Array, offset: number): TokenMatch | null {
    const bucket = this.byLeadingByte.get(bytes[offset]);
    if (!bucket) {
      return null;
    }
    for (const entry of bucket) {
      if (bytesEqualAt(bytes, offset, entry.pattern)) {
        return { index: entry.index, length: entry.pattern.length };
      }
    }
    return null;
  }

  /**
   * Exact lookup of the `width` bytes at `offset`.
   */
  matchExact(
    bytes: Uint8Array,
    offset: number,
    width: number
  ): TokenMatch | null {
    if (offset + width > bytes.length) {
      return null;
    }
    const index = this.lookup(bytes.subarray(offset, offset + width));
    return index === undefined ? null : { index, length: width };
  }

  getEntries(): DictionaryEntry[] {
    return Array.from(this.backward, ([index, pattern]) => ({
      pattern: Uint8Array.from(pattern),
      index,
    })).sort((a, b) => a.index - b.index);
  }

  toRecord(): DictionaryRecord {
    return {
      format: DICTIONARY_RECORD_FORMAT,
      kind: this.kind,
      capacity: this.capacity,
      indexWidth: this.indexWidth,
      dropped: this.droppedCount,
      entries: this.getEntries().map(entry => [entry.pattern, entry.index]),
    };
  }

  save(): Uint8Array {
    return encode(this.toRecord());
  }

  private static validateLimits(capacity: number, indexWidth: number): void {
    if (indexWidth !== 1 && indexWidth !== 2) {
      throw new CodecError(
        CodecErrorCode.INVALID_CONFIG,
        `Index width must be 1 or 2 bytes, got ${indexWidth}`
      );
    }
    if (
      !Number.isInteger(capacity) ||
      capacity < 1 ||
      capacity > maxIndexFor(indexWidth) + 1
    ) {
      throw new CodecError(
        CodecErrorCode.INVALID_CONFIG,
        `Capacity ${capacity} is out of range for ${indexWidth}-byte indices`
      );
    }
  }
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDictionaryKind(value: unknown): value is DictionaryKind {
  return DICTIONARY_KINDS.some(kind => kind === value);
}

function isIndexWidth(value: unknown): value is IndexWidth {
  return value === 1 || value === 2;
}

function parseEntry(value: unknown): [Uint8Array, number] {
  if (
    Array.isArray(value) &&
    value.length === 2 &&
    value[0] instanceof Uint8Array &&
    typeof value[1] === 'number'
  ) {
    return [value[0], value[1]];
  }
  throw new CodecError(
    CodecErrorCode.INVALID_DICTIONARY,
    'Dictionary entry must be a [bytes, index] pair'
  );
}

export function parseDictionaryRecord(raw: unknown): DictionaryRecord {
  if (!isRecordObject(raw)) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      'Dictionary record must be a map'
    );
  }
  const { format, kind, capacity, indexWidth, dropped, entries } = raw;
  if (format !== DICTIONARY_RECORD_FORMAT) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      `Unsupported dictionary record format: ${String(format)}`
    );
  }
  if (!isDictionaryKind(kind)) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      `Unknown dictionary kind: ${String(kind)}`
    );
  }
  if (typeof capacity !== 'number' || !isIndexWidth(indexWidth)) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      'Dictionary record is missing capacity or index width'
    );
  }
  if (!Array.isArray(entries)) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      'Dictionary record entries must be a list'
    );
  }
  return {
    format: DICTIONARY_RECORD_FORMAT,
    kind,
    capacity,
    indexWidth,
    dropped: typeof dropped === 'number' ? dropped : 0,
    entries: entries.map(parseEntry),
  };
}
