/**
 * Statistics sink
 *
 * Aggregates the reports returned by the pure pipeline functions. The codec
 * never reads these counters back; they exist for callers and reporting.
 */

import { getCurrentTimestamp } from '@calldata-compress/shared';
import type { DictionarySet } from './codec-interfaces.js';
import {
  DICTIONARY_KINDS,
  STAGE_ORDER,
  type CodecStatsSnapshot,
  type DecodeReport,
  type DictionaryKind,
  type DictionarySizes,
  type EncodeReport,
  type StageCounters,
  type StageKind,
} from './codec-types.js';

function emptyStageCounters(): Record<StageKind, StageCounters> {
  return {
    selector: { timesApplied: 0, itemsReplaced: 0, bytesSaved: 0 },
    address: { timesApplied: 0, itemsReplaced: 0, bytesSaved: 0 },
    pattern: { timesApplied: 0, itemsReplaced: 0, bytesSaved: 0 },
    zero_run: { timesApplied: 0, itemsReplaced: 0, bytesSaved: 0 },
  };
}

export class StatisticsCollector {
  private totalCompressions = 0;
  private totalDecompressions = 0;
  private totalBytesIn = 0;
  private totalBytesOut = 0;
  private totalBytesDecoded = 0;
  private stages = emptyStageCounters();
  private dictionaries: Partial<Record<DictionaryKind, DictionarySizes>> = {};
  private capacityWarnings = 0;
  private errorCounts = new Map<string, number>();
  private versionMismatches = 0;
  private lastUpdated = getCurrentTimestamp();

  recordCompression(report: EncodeReport): void {
    this.totalCompressions++;
    this.totalBytesIn += report.originalSize;
    this.totalBytesOut += report.compressedSize;
    for (const outcome of report.outcomes) {
      if (!outcome.applied) {
        continue;
      }
      const counters = this.stages[outcome.stage];
      counters.timesApplied++;
      counters.itemsReplaced += outcome.itemsReplaced;
      counters.bytesSaved += outcome.bytesSaved;
    }
    this.touch();
  }

  recordDecompression(report: DecodeReport): void {
    this.totalDecompressions++;
    this.totalBytesDecoded += report.data.length;
    this.touch();
  }

  recordError(code: string): void {
    this.errorCounts.set(code, (this.errorCounts.get(code) ?? 0) + 1);
    this.touch();
  }

  recordVersionMismatch(): void {
    this.versionMismatches++;
    this.touch();
  }

  /**
   * Capture sizes of a freshly installed snapshot. Truncated dictionaries
   * count as capacity warnings.
   */
  recordDictionaries(dictionaries: DictionarySet): void {
    this.dictionaries = {};
    for (const kind of DICTIONARY_KINDS) {
      const dictionary = dictionaries[kind];
      if (!dictionary) {
        continue;
      }
      this.dictionaries[kind] = {
        size: dictionary.size,
        capacity: dictionary.capacity,
        dropped: dictionary.droppedCount,
      };
      if (dictionary.droppedCount > 0) {
        this.capacityWarnings++;
      }
    }
    this.touch();
  }

  snapshot(): CodecStatsSnapshot {
    const stages = emptyStageCounters();
    for (const kind of STAGE_ORDER) {
      stages[kind] = Object.freeze({ ...this.stages[kind] });
    }
    const dictionaries: Partial<Record<DictionaryKind, DictionarySizes>> = {};
    for (const kind of DICTIONARY_KINDS) {
      const sizes = this.dictionaries[kind];
      if (sizes) {
        dictionaries[kind] = Object.freeze({ ...sizes });
      }
    }

    return Object.freeze({
      totalCompressions: this.totalCompressions,
      totalDecompressions: this.totalDecompressions,
      totalBytesIn: this.totalBytesIn,
      totalBytesOut: this.totalBytesOut,
      totalBytesDecoded: this.totalBytesDecoded,
      compressionRatio:
        this.totalBytesIn > 0 ? this.totalBytesOut / this.totalBytesIn : 1,
      stages: Object.freeze(stages),
      dictionaries: Object.freeze(dictionaries),
      capacityWarnings: this.capacityWarnings,
      errorCounts: Object.freeze(Object.fromEntries(this.errorCounts)),
      versionMismatches: this.versionMismatches,
      lastUpdated: this.lastUpdated,
    });
  }

  // Counters go back to zero; dictionary sizes describe the live snapshot and stay
  reset(): void {
    this.totalCompressions = 0;
    this.totalDecompressions = 0;
    this.totalBytesIn = 0;
    this.totalBytesOut = 0;
    this.totalBytesDecoded = 0;
    this.stages = emptyStageCounters();
    this.capacityWarnings = 0;
    this.errorCounts.clear();
    this.versionMismatches = 0;
    this.touch();
  }

  private touch(): void {
    this.lastUpdated = getCurrentTimestamp();
  }
}
