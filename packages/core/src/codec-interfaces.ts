/**
 * Codec Interfaces
 *
 * Contracts between the pipeline orchestrator and its stages, and the
 * surface of the long-lived compressor facade.
 */

import type { LoggerLike } from '@calldata-compress/shared';
import type { Dictionary } from './dictionary.js';
import type { BodyLayout, StreamBody } from './segments.js';
import type {
  CodecConfig,
  CodecStatsSnapshot,
  DictionaryKind,
  StageKind,
  TransactionRecord,
} from './codec-types.js';

export interface StageEncodeResult {
  body: StreamBody;
  itemsReplaced: number;
  bytesSaved: number;
}

// One reversible transform of the pipeline
export interface IPipelineStage {
  readonly kind: StageKind;
  encode(body: StreamBody): StageEncodeResult;
  decode(body: StreamBody): StreamBody;
  // Layout of the body once this stage has been applied
  extendLayout(layout: BodyLayout): BodyLayout;
}

// Immutable snapshot of every dictionary the pipeline may consult
export type DictionarySet = Readonly<Partial<Record<DictionaryKind, Dictionary>>>;

export interface ICalldataCompressor {
  compress(payload: Uint8Array): Uint8Array;
  decompress(payload: Uint8Array): Uint8Array;
  isCompressible(payload: Uint8Array): boolean;
  compressTransaction(transaction: TransactionRecord): TransactionRecord;
  decompressTransaction(transaction: TransactionRecord): TransactionRecord;

  train(transactions: readonly TransactionRecord[]): DictionarySet;
  getDictionaries(): DictionarySet;
  setDictionaries(dictionaries: DictionarySet): void;

  getConfig(): CodecConfig;
  getStats(): CodecStatsSnapshot;
  resetStats(): void;
}

export interface ICalldataCompressorOptions {
  dictionaries?: DictionarySet;
  logger?: LoggerLike;
}
