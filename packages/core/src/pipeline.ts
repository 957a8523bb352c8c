/**
 * Pipeline orchestrator
 *
 * Pure compress/decompress over whole payloads. Stages run in a fixed order
 * (selector, address, pattern, zero-run) and a stage is kept only when it
 * makes the encoded stream, header included, strictly shorter. The header
 * records exactly the stages that were kept; decoding replays them in
 * reverse.
 *
 * Stream layout: [version][stage count][stage tags...][body]
 */

import { CodecError, CodecErrorCode, malformedStream } from './codec-errors.js';
import type { DictionarySet, IPipelineStage } from './codec-interfaces.js';
import {
  flattenLiterals,
  measureBody,
  parseBody,
  rawBody,
  serializeBody,
  type BodyLayout,
  type StreamBody,
} from './segments.js';
import {
  createAddressStage,
  createPatternStage,
  createSelectorStage,
} from './token-stage.js';
import { DEFAULT_MIN_ZERO_RUN, ZeroRunStage } from './zero-run-stage.js';
import {
  FORMAT_VERSION,
  HEADER_FIXED_SIZE,
  STAGE_ORDER,
  STAGE_TAGS,
  SUPPORTED_FORMAT_VERSIONS,
  StageKind,
  type CodecConfig,
  type DecodeReport,
  type EncodeReport,
  type PipelineOptions,
  type StageOutcome,
} from './codec-types.js';

const EMPTY_LAYOUT: BodyLayout = {
  selectorWidth: null,
  structured: false,
  referenceWidths: {},
  allowZeroRuns: false,
};

export interface StreamHeader {
  version: number;
  appliedStages: StageKind[];
  bodyOffset: number;
}

function stageForKind(
  kind: StageKind,
  dictionaries: DictionarySet,
  minZeroRunLength: number
): IPipelineStage | null {
  switch (kind) {
    case StageKind.SELECTOR:
      return dictionaries.selector ? createSelectorStage(dictionaries.selector) : null;
    case StageKind.ADDRESS:
      return dictionaries.address ? createAddressStage(dictionaries.address) : null;
    case StageKind.PATTERN:
      return dictionaries.pattern ? createPatternStage(dictionaries.pattern) : null;
    case StageKind.ZERO_RUN:
      return new ZeroRunStage(minZeroRunLength);
  }
}

function requireDecoder(kind: StageKind, dictionaries: DictionarySet): IPipelineStage {
  const stage = stageForKind(kind, dictionaries, DEFAULT_MIN_ZERO_RUN);
  if (!stage) {
    throw new CodecError(
      CodecErrorCode.DICTIONARY_MISS,
      `Stream applies the ${kind} stage but no ${kind} dictionary was supplied`,
      { context: { stage: kind } }
    );
  }
  return stage;
}

function skipped(stage: StageKind, size: number): StageOutcome {
  return {
    stage,
    applied: false,
    itemsReplaced: 0,
    bytesSaved: 0,
    sizeBefore: size,
    sizeAfter: size,
  };
}

// Subset of a codec configuration the pure functions look at
export function toPipelineOptions(config: CodecConfig): PipelineOptions {
  return {
    formatVersion: config.formatVersion,
    minZeroRunLength: config.minZeroRunLength,
    enabledStages: config.enabledStages,
  };
}

function resolveFormatVersion(options: PipelineOptions): number {
  const version = options.formatVersion ?? FORMAT_VERSION;
  if (!SUPPORTED_FORMAT_VERSIONS.includes(version)) {
    throw new CodecError(
      CodecErrorCode.INVALID_CONFIG,
      `Cannot encode unsupported format version ${version}`
    );
  }
  return version;
}

export function compressWithReport(
  payload: Uint8Array,
  dictionaries: DictionarySet,
  options: PipelineOptions = {}
): EncodeReport {
  const version = resolveFormatVersion(options);
  const enabled = new Set<StageKind>(options.enabledStages ?? STAGE_ORDER);
  const minZeroRunLength = options.minZeroRunLength ?? DEFAULT_MIN_ZERO_RUN;

  let body: StreamBody = rawBody(payload);
  let layout = EMPTY_LAYOUT;
  const appliedStages: StageKind[] = [];
  const outcomes: StageOutcome[] = [];
  let currentSize = HEADER_FIXED_SIZE + measureBody(body, layout);

  for (const kind of STAGE_ORDER) {
    const stage = enabled.has(kind)
      ? stageForKind(kind, dictionaries, minZeroRunLength)
      : null;
    if (!stage) {
      outcomes.push(skipped(kind, currentSize));
      continue;
    }

    const result = stage.encode(body);
    if (result.itemsReplaced === 0) {
      outcomes.push(skipped(kind, currentSize));
      continue;
    }

    const candidateLayout = stage.extendLayout(layout);
    const candidateSize =
      HEADER_FIXED_SIZE +
      appliedStages.length +
      1 +
      measureBody(result.body, candidateLayout);

    if (candidateSize >= currentSize) {
      outcomes.push(skipped(kind, currentSize));
      continue;
    }

    outcomes.push({
      stage: kind,
      applied: true,
      itemsReplaced: result.itemsReplaced,
      bytesSaved: result.bytesSaved,
      sizeBefore: currentSize,
      sizeAfter: candidateSize,
    });
    appliedStages.push(kind);
    body = result.body;
    layout = candidateLayout;
    currentSize = candidateSize;
  }

  const encodedBody = serializeBody(body, layout);
  const headerSize = HEADER_FIXED_SIZE + appliedStages.length;
  const data = new Uint8Array(headerSize + encodedBody.length);
  data[0] = version;
  data[1] = appliedStages.length;
  appliedStages.forEach((kind, i) => {
    data[HEADER_FIXED_SIZE + i] = STAGE_TAGS[kind];
  });
  data.set(encodedBody, headerSize);

  return {
    data,
    originalSize: payload.length,
    compressedSize: data.length,
    appliedStages,
    outcomes,
  };
}

export function compress(
  payload: Uint8Array,
  dictionaries: DictionarySet,
  options: PipelineOptions = {}
): Uint8Array {
  return compressWithReport(payload, dictionaries, options).data;
}

/**
 * True when at least one enabled stage finds something to replace in the
 * payload. `compress` may still drop that stage if its codes do not make the
 * stream shorter; a false result means the output is the raw payload.
 */
export function isCompressible(
  payload: Uint8Array,
  dictionaries: DictionarySet,
  options: PipelineOptions = {}
): boolean {
  const enabled = new Set<StageKind>(options.enabledStages ?? STAGE_ORDER);
  const minZeroRunLength = options.minZeroRunLength ?? DEFAULT_MIN_ZERO_RUN;
  const body = rawBody(payload);

  return STAGE_ORDER.some(kind => {
    const stage = enabled.has(kind)
      ? stageForKind(kind, dictionaries, minZeroRunLength)
      : null;
    return stage !== null && stage.encode(body).itemsReplaced > 0;
  });
}

function stageForTag(tag: number): StageKind | undefined {
  return STAGE_ORDER.find(kind => STAGE_TAGS[kind] === tag);
}

/**
 * Read the version byte and stage record without touching the body.
 */
export function readHeader(payload: Uint8Array): StreamHeader {
  if (payload.length === 0) {
    throw malformedStream('Missing stream header');
  }

  const version = payload[0];
  if (!SUPPORTED_FORMAT_VERSIONS.includes(version)) {
    throw new CodecError(
      CodecErrorCode.VERSION_MISMATCH,
      `Unsupported format version ${version}`,
      { context: { version }, payload: Uint8Array.from(payload) }
    );
  }

  if (payload.length < HEADER_FIXED_SIZE) {
    throw malformedStream('Missing stage count', 1);
  }
  const count = payload[1];
  if (count > STAGE_ORDER.length) {
    throw malformedStream(`Stage count ${count} exceeds ${STAGE_ORDER.length}`, 1);
  }
  if (payload.length < HEADER_FIXED_SIZE + count) {
    throw malformedStream('Truncated stage record', HEADER_FIXED_SIZE);
  }

  const appliedStages: StageKind[] = [];
  let previousPosition = -1;
  for (let i = 0; i < count; i++) {
    const offset = HEADER_FIXED_SIZE + i;
    const kind = stageForTag(payload[offset]);
    if (kind === undefined) {
      throw malformedStream(`Unknown stage tag 0x${payload[offset].toString(16)}`, offset);
    }
    const position = STAGE_ORDER.indexOf(kind);
    if (position <= previousPosition) {
      throw malformedStream(`Stage ${kind} recorded out of order`, offset);
    }
    previousPosition = position;
    appliedStages.push(kind);
  }

  return { version, appliedStages, bodyOffset: HEADER_FIXED_SIZE + count };
}

export function decompressWithReport(
  payload: Uint8Array,
  dictionaries: DictionarySet
): DecodeReport {
  const header = readHeader(payload);
  const stages = header.appliedStages.map(kind =>
    requireDecoder(kind, dictionaries)
  );

  const layout = stages.reduce<BodyLayout>(
    (current, stage) => stage.extendLayout(current),
    EMPTY_LAYOUT
  );

  let body = parseBody(payload, header.bodyOffset, layout);
  for (const stage of [...stages].reverse()) {
    body = stage.decode(body);
  }

  if (body.selectorIndex !== null) {
    throw malformedStream('Selector reference left after decoding');
  }

  return {
    data: flattenLiterals(body.segments),
    version: header.version,
    appliedStages: header.appliedStages,
  };
}

export function decompress(
  payload: Uint8Array,
  dictionaries: DictionarySet
): Uint8Array {
  return decompressWithReport(payload, dictionaries).data;
}
