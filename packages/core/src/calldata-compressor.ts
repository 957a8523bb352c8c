/**
 * Calldata Compressor
 *
 * Long-lived facade over the pure pipeline. It owns only the reference to
 * the active dictionary snapshot and a statistics sink; every call hands
 * that snapshot to compress/decompress, and retraining swaps the reference
 * in one assignment.
 */

import { EventEmitter } from 'events';
import { Logger, formatRatio, type LoggerLike } from '@calldata-compress/shared';
import { formatCalldataHex, parseCalldataHex } from './calldata.js';
import { CodecErrorCode, isCodecError } from './codec-errors.js';
import { freezeDictionarySet } from './dictionary-set.js';
import {
  compressWithReport,
  decompressWithReport,
  isCompressible,
  toPipelineOptions,
} from './pipeline.js';
import { StatisticsCollector } from './statistics.js';
import { buildDictionaries, extractTrainingCorpus } from './training.js';
import type {
  DictionarySet,
  ICalldataCompressor,
  ICalldataCompressorOptions,
} from './codec-interfaces.js';
import {
  DICTIONARY_KINDS,
  type CodecConfig,
  type CodecStatsSnapshot,
  type DictionaryKind,
  type PipelineOptions,
  type TransactionRecord,
} from './codec-types.js';

export interface CapacityExceededEvent {
  kind: DictionaryKind;
  capacity: number;
  dropped: number;
}

function isEmptyInput(input: string): boolean {
  return input === '' || input === '0x' || input === '0X';
}

export class CalldataCompressor extends EventEmitter implements ICalldataCompressor {
  private readonly config: CodecConfig;
  private readonly pipelineOptions: PipelineOptions;
  private readonly logger: LoggerLike;
  private readonly stats = new StatisticsCollector();
  private dictionaries: DictionarySet;

  constructor(config: CodecConfig, options: ICalldataCompressorOptions = {}) {
    super();
    this.config = config;
    this.pipelineOptions = toPipelineOptions(config);

    if (options.logger) {
      this.logger = options.logger;
    } else {
      const logger = Logger.getInstance();
      logger.setLogLevel(config.logLevel);
      this.logger = logger;
    }

    this.dictionaries = freezeDictionarySet({ ...options.dictionaries });
    this.stats.recordDictionaries(this.dictionaries);
  }

  /**
   * Build fresh dictionaries from transaction records and make them active.
   * Calls already holding the previous snapshot keep using it.
   */
  train(transactions: readonly TransactionRecord[]): DictionarySet {
    const corpus = extractTrainingCorpus(transactions, this.config);
    const dictionaries = buildDictionaries(corpus, this.config);

    this.logger.info('Trained calldata dictionaries', {
      transactions: transactions.length,
      selectors: dictionaries.selector?.size ?? 0,
      addresses: dictionaries.address?.size ?? 0,
      patterns: dictionaries.pattern?.size ?? 0,
    });

    this.setDictionaries(dictionaries);
    return this.dictionaries;
  }

  getDictionaries(): DictionarySet {
    return this.dictionaries;
  }

  setDictionaries(dictionaries: DictionarySet): void {
    const snapshot = freezeDictionarySet({ ...dictionaries });
    this.dictionaries = snapshot;
    this.stats.recordDictionaries(snapshot);

    for (const kind of DICTIONARY_KINDS) {
      const dictionary = snapshot[kind];
      if (!dictionary || dictionary.droppedCount === 0) {
        continue;
      }
      const event: CapacityExceededEvent = {
        kind,
        capacity: dictionary.capacity,
        dropped: dictionary.droppedCount,
      };
      this.logger.warn('Dictionary capacity exceeded', { ...event });
      this.emit('capacity_exceeded', event);
    }

    this.emit('dictionaries_updated', snapshot);
  }

  compress(payload: Uint8Array): Uint8Array {
    const report = compressWithReport(payload, this.dictionaries, this.pipelineOptions);
    this.stats.recordCompression(report);

    this.logger.debug('Compressed calldata', {
      originalSize: report.originalSize,
      compressedSize: report.compressedSize,
      ratio:
        report.originalSize > 0
          ? formatRatio(report.compressedSize / report.originalSize)
          : undefined,
      stages: report.appliedStages,
    });

    return report.data;
  }

  isCompressible(payload: Uint8Array): boolean {
    return isCompressible(payload, this.dictionaries, this.pipelineOptions);
  }

  /**
   * Decode with the active snapshot. A stream from another format version is
   * returned unmodified and reported through `version_mismatch`; any other
   * decode error is rethrown.
   */
  decompress(payload: Uint8Array): Uint8Array {
    return this.decode(payload) ?? Uint8Array.from(payload);
  }

  compressTransaction(transaction: TransactionRecord): TransactionRecord {
    if (isEmptyInput(transaction.input)) {
      return { ...transaction };
    }
    const calldata = parseCalldataHex(transaction.input);
    return { ...transaction, input: formatCalldataHex(this.compress(calldata)) };
  }

  decompressTransaction(transaction: TransactionRecord): TransactionRecord {
    if (isEmptyInput(transaction.input)) {
      return { ...transaction };
    }
    const decoded = this.decode(parseCalldataHex(transaction.input));
    if (!decoded) {
      return { ...transaction };
    }
    return { ...transaction, input: formatCalldataHex(decoded) };
  }

  getConfig(): CodecConfig {
    return {
      ...this.config,
      enabledStages: [...this.config.enabledStages],
      patternNgramSizes: [...this.config.patternNgramSizes],
    };
  }

  getStats(): CodecStatsSnapshot {
    return this.stats.snapshot();
  }

  resetStats(): void {
    this.stats.reset();
    this.logger.debug('Codec statistics reset');
  }

  // null when the stream belongs to another format version
  private decode(payload: Uint8Array): Uint8Array | null {
    try {
      const report = decompressWithReport(payload, this.dictionaries);
      this.stats.recordDecompression(report);
      return report.data;
    } catch (error) {
      if (isCodecError(error, CodecErrorCode.VERSION_MISMATCH)) {
        this.stats.recordVersionMismatch();
        this.logger.warn('Calldata uses an unsupported format version, passing it through', {
          version: payload[0],
          size: payload.length,
        });
        this.emit('version_mismatch', error);
        return null;
      }

      const code = isCodecError(error) ? error.code : 'UNKNOWN';
      this.stats.recordError(code);
      this.logger.error('Calldata decompression failed', {
        code,
        error: error instanceof Error ? error.message : String(error),
        size: payload.length,
      });
      this.emit('decompression_error', error);
      throw error;
    }
  }
}
