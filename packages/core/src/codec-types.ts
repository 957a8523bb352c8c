/**
 * Codec Types for Calldata Compression
 *
 * Wire constants, stage identifiers, configuration and statistics shapes
 * shared by every part of the codec.
 */

import type { LogLevel } from '@calldata-compress/shared';

// Format versions this build can decode
export const FORMAT_VERSION = 1;
export const SUPPORTED_FORMAT_VERSIONS: readonly number[] = [FORMAT_VERSION];

// version byte + stage count byte
export const HEADER_FIXED_SIZE = 2;

export const SELECTOR_WIDTH = 4;
export const ADDRESS_WIDTH = 20;

/**
 * Reserved marker table. One namespace for every stage: a literal byte with
 * any of these values is escaped whenever the body carries codes.
 */
export const Marker = {
  SELECTOR: 0xf0,
  ADDRESS: 0xf1,
  PATTERN: 0xf2,
  ZERO_SHORT: 0xf3,
  ZERO_MEDIUM: 0xf4,
  ZERO_LONG: 0xf5,
  ESCAPE: 0xf6,
} as const;

export type Marker = (typeof Marker)[keyof typeof Marker];

export const RESERVED_MARKERS: ReadonlySet<number> = new Set<number>(
  Object.values(Marker)
);

export function isReservedMarker(byte: number): boolean {
  return RESERVED_MARKERS.has(byte);
}

// Pipeline stages, in application order
export const StageKind = {
  SELECTOR: 'selector',
  ADDRESS: 'address',
  PATTERN: 'pattern',
  ZERO_RUN: 'zero_run',
} as const;

export type StageKind = (typeof StageKind)[keyof typeof StageKind];

export const STAGE_ORDER: readonly StageKind[] = [
  StageKind.SELECTOR,
  StageKind.ADDRESS,
  StageKind.PATTERN,
  StageKind.ZERO_RUN,
];

// Tag written to the header stage record for each stage
export const STAGE_TAGS: Readonly<Record<StageKind, number>> = {
  selector: Marker.SELECTOR,
  address: Marker.ADDRESS,
  pattern: Marker.PATTERN,
  zero_run: Marker.ZERO_SHORT,
};

// Stages backed by a dictionary
export type DictionaryKind = Exclude<StageKind, 'zero_run'>;

export const DICTIONARY_KINDS: readonly DictionaryKind[] = [
  StageKind.SELECTOR,
  StageKind.ADDRESS,
  StageKind.PATTERN,
];

export type IndexWidth = 1 | 2;

export interface DictionaryLimits {
  capacity: number;
  indexWidth: IndexWidth;
}

export interface CodecConfig {
  formatVersion: number;
  minZeroRunLength: number;
  enabledStages: StageKind[];
  selectorDictionary: DictionaryLimits;
  addressDictionary: DictionaryLimits;
  patternDictionary: DictionaryLimits;
  patternNgramSizes: number[];
  patternStride: number;
  minPatternOccurrences: number;
  logLevel: LogLevel;
}

// Subset of the configuration the pure pipeline functions look at
export interface PipelineOptions {
  formatVersion?: number;
  minZeroRunLength?: number;
  enabledStages?: readonly StageKind[];
}

export interface StageOutcome {
  stage: StageKind;
  applied: boolean;
  itemsReplaced: number;
  bytesSaved: number;
  sizeBefore: number;
  sizeAfter: number;
}

export interface EncodeReport {
  data: Uint8Array;
  originalSize: number;
  compressedSize: number;
  appliedStages: StageKind[];
  outcomes: StageOutcome[];
}

export interface DecodeReport {
  data: Uint8Array;
  version: number;
  appliedStages: StageKind[];
}

export interface StageCounters {
  timesApplied: number;
  itemsReplaced: number;
  bytesSaved: number;
}

export interface DictionarySizes {
  size: number;
  capacity: number;
  dropped: number;
}

export interface CodecStatsSnapshot {
  totalCompressions: number;
  totalDecompressions: number;
  totalBytesIn: number;
  totalBytesOut: number;
  totalBytesDecoded: number;
  compressionRatio: number;
  stages: Readonly<Record<StageKind, Readonly<StageCounters>>>;
  dictionaries: Readonly<Partial<Record<DictionaryKind, Readonly<DictionarySizes>>>>;
  capacityWarnings: number;
  errorCounts: Readonly<Record<string, number>>;
  // Streams from another format version, passed through rather than decoded
  versionMismatches: number;
  lastUpdated: number;
}

// Transaction record as handed over by a data source
export interface TransactionRecord {
  input: string;
  to?: string | null;
  from?: string | null;
  hash?: string;
}

export interface TrainingCorpus {
  selectors: Uint8Array[];
  addresses: Uint8Array[];
  patterns: Uint8Array[];
}
