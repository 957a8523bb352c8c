/**
 * Codec Factory
 *
 * Fluent configuration builder plus helpers that turn a validated
 * configuration into a ready compressor.
 */

import { LogLevel, type LoggerLike } from '@calldata-compress/shared';
import { CalldataCompressor } from './calldata-compressor.js';
import { CodecError, CodecErrorCode } from './codec-errors.js';
import type { DictionarySet } from './codec-interfaces.js';
import { maxIndexFor } from './dictionary.js';
import { DEFAULT_MIN_ZERO_RUN } from './zero-run-stage.js';
import {
  FORMAT_VERSION,
  STAGE_ORDER,
  SUPPORTED_FORMAT_VERSIONS,
  type CodecConfig,
  type DictionaryKind,
  type DictionaryLimits,
  type IndexWidth,
  type StageKind,
} from './codec-types.js';

function invalidConfig(message: string): CodecError {
  return new CodecError(CodecErrorCode.INVALID_CONFIG, message);
}

function validateLimits(kind: DictionaryKind, limits: DictionaryLimits): void {
  if (limits.indexWidth !== 1 && limits.indexWidth !== 2) {
    throw invalidConfig(`${kind} index width must be 1 or 2 bytes`);
  }
  const maxCapacity = maxIndexFor(limits.indexWidth) + 1;
  if (
    !Number.isInteger(limits.capacity) ||
    limits.capacity < 1 ||
    limits.capacity > maxCapacity
  ) {
    throw invalidConfig(
      `${kind} capacity must be between 1 and ${maxCapacity} for ${limits.indexWidth}-byte indices`
    );
  }
}

/**
 * Configuration Builder for fluent API
 */
export class CodecConfigBuilder {
  private config: CodecConfig;

  constructor() {
    this.config = {
      formatVersion: FORMAT_VERSION,
      minZeroRunLength: DEFAULT_MIN_ZERO_RUN,
      enabledStages: [...STAGE_ORDER],
      selectorDictionary: { capacity: 256, indexWidth: 1 },
      addressDictionary: { capacity: 65536, indexWidth: 2 },
      patternDictionary: { capacity: 256, indexWidth: 1 },
      patternNgramSizes: [8, 16, 32],
      patternStride: 4,
      minPatternOccurrences: 3,
      logLevel: LogLevel.INFO,
    };
  }

  formatVersion(version: number): CodecConfigBuilder {
    this.config.formatVersion = version;
    return this;
  }

  minZeroRunLength(length: number): CodecConfigBuilder {
    this.config.minZeroRunLength = length;
    return this;
  }

  enableStages(...stages: StageKind[]): CodecConfigBuilder {
    this.config.enabledStages = stages;
    return this;
  }

  disableStage(stage: StageKind): CodecConfigBuilder {
    this.config.enabledStages = this.config.enabledStages.filter(s => s !== stage);
    return this;
  }

  selectorDictionary(capacity: number, indexWidth: IndexWidth): CodecConfigBuilder {
    this.config.selectorDictionary = { capacity, indexWidth };
    return this;
  }

  addressDictionary(capacity: number, indexWidth: IndexWidth): CodecConfigBuilder {
    this.config.addressDictionary = { capacity, indexWidth };
    return this;
  }

  patternDictionary(capacity: number, indexWidth: IndexWidth): CodecConfigBuilder {
    this.config.patternDictionary = { capacity, indexWidth };
    return this;
  }

  patternNgrams(sizes: number[], stride: number = 4): CodecConfigBuilder {
    this.config.patternNgramSizes = sizes;
    this.config.patternStride = stride;
    return this;
  }

  minPatternOccurrences(count: number): CodecConfigBuilder {
    this.config.minPatternOccurrences = count;
    return this;
  }

  logLevel(level: LogLevel): CodecConfigBuilder {
    this.config.logLevel = level;
    return this;
  }

  build(): CodecConfig {
    const config = this.config;

    if (!SUPPORTED_FORMAT_VERSIONS.includes(config.formatVersion)) {
      throw invalidConfig(`Unsupported format version ${config.formatVersion}`);
    }
    if (!Number.isInteger(config.minZeroRunLength) || config.minZeroRunLength < 1) {
      throw invalidConfig('Minimum zero-run length must be a positive integer');
    }
    for (const stage of config.enabledStages) {
      if (!STAGE_ORDER.includes(stage)) {
        throw invalidConfig(`Unknown stage: ${String(stage)}`);
      }
    }

    validateLimits('selector', config.selectorDictionary);
    validateLimits('address', config.addressDictionary);
    validateLimits('pattern', config.patternDictionary);

    if (
      config.patternNgramSizes.length === 0 ||
      config.patternNgramSizes.some(size => !Number.isInteger(size) || size < 2)
    ) {
      throw invalidConfig('Pattern n-gram sizes must be integers of at least 2');
    }
    if (!Number.isInteger(config.patternStride) || config.patternStride < 1) {
      throw invalidConfig('Pattern stride must be a positive integer');
    }
    if (
      !Number.isInteger(config.minPatternOccurrences) ||
      config.minPatternOccurrences < 1
    ) {
      throw invalidConfig('Minimum pattern occurrences must be a positive integer');
    }

    // Stage order is fixed by the pipeline, whatever order they were enabled in
    return {
      ...config,
      enabledStages: STAGE_ORDER.filter(stage => config.enabledStages.includes(stage)),
      selectorDictionary: { ...config.selectorDictionary },
      addressDictionary: { ...config.addressDictionary },
      patternDictionary: { ...config.patternDictionary },
      patternNgramSizes: [...config.patternNgramSizes],
    };
  }
}

export function createConfigBuilder(): CodecConfigBuilder {
  return new CodecConfigBuilder();
}

export function createDefaultConfig(): CodecConfig {
  return new CodecConfigBuilder().build();
}

export interface CreateCompressorOptions {
  config?: CodecConfig;
  dictionaries?: DictionarySet;
  logger?: LoggerLike;
}

// Convenience export for easy usage
export const createCalldataCompressor = (
  options: CreateCompressorOptions = {}
): CalldataCompressor =>
  new CalldataCompressor(options.config ?? createDefaultConfig(), {
    dictionaries: options.dictionaries,
    logger: options.logger,
  });
