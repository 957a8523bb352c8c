/**
 * Body segments and their wire encoding.
 *
 * Stages never rewrite raw bytes directly. The payload is held as a list of
 * segments; a stage only scans literal segments, so codes produced by an
 * earlier stage are never reinterpreted by a later one. Escaping happens in
 * exactly one place, when the segment list is serialized.
 */

import { CodecError, CodecErrorCode, malformedStream } from './codec-errors.js';
import {
  Marker,
  isReservedMarker,
  type IndexWidth,
} from './codec-types.js';

export type ReferenceStage = 'address' | 'pattern';

export type Segment =
  | { kind: 'literal'; bytes: Uint8Array }
  | { kind: 'reference'; stage: ReferenceStage; index: number }
  | { kind: 'zero_run'; length: number };

export interface StreamBody {
  // Positional selector reference at the head of the body
  selectorIndex: number | null;
  segments: Segment[];
}

export interface BodyLayout {
  selectorWidth: IndexWidth | null;
  // Codes and escapes present; false means the rest of the body is raw bytes
  structured: boolean;
  referenceWidths: Partial<Record<ReferenceStage, IndexWidth>>;
  allowZeroRuns: boolean;
}

const REFERENCE_MARKERS: Readonly<Record<ReferenceStage, number>> = {
  address: Marker.ADDRESS,
  pattern: Marker.PATTERN,
};

const MAX_SHORT_RUN = 0xff;
const MAX_MEDIUM_RUN = 0xffff;
export const MAX_ZERO_RUN = 0xffffffff;

export function literal(bytes: Uint8Array): Segment {
  return { kind: 'literal', bytes };
}

export function rawBody(payload: Uint8Array): StreamBody {
  return {
    selectorIndex: null,
    segments: payload.length > 0 ? [literal(payload)] : [],
  };
}

export function zeroRunSize(length: number): number {
  if (length <= MAX_SHORT_RUN) {
    return 2;
  }
  return length <= MAX_MEDIUM_RUN ? 3 : 5;
}

function referenceWidth(layout: BodyLayout, stage: ReferenceStage): IndexWidth {
  const width = layout.referenceWidths[stage];
  if (width === undefined) {
    throw new CodecError(
      CodecErrorCode.INVALID_INPUT,
      `Body carries ${stage} references but the layout has no ${stage} width`
    );
  }
  return width;
}

function literalSize(bytes: Uint8Array, structured: boolean): number {
  if (!structured) {
    return bytes.length;
  }
  let size = bytes.length;
  for (const byte of bytes) {
    if (isReservedMarker(byte)) {
      size++;
    }
  }
  return size;
}

export function segmentSize(segment: Segment, layout: BodyLayout): number {
  switch (segment.kind) {
    case 'literal':
      return literalSize(segment.bytes, layout.structured);
    case 'reference':
      return 1 + referenceWidth(layout, segment.stage);
    case 'zero_run':
      return zeroRunSize(segment.length);
  }
}

export function measureBody(body: StreamBody, layout: BodyLayout): number {
  let size = body.selectorIndex !== null && layout.selectorWidth !== null
    ? layout.selectorWidth
    : 0;
  for (const segment of body.segments) {
    size += segmentSize(segment, layout);
  }
  return size;
}

function writeIndex(
  out: Uint8Array,
  offset: number,
  index: number,
  width: IndexWidth
): number {
  if (width === 2) {
    out[offset] = (index >>> 8) & 0xff;
    out[offset + 1] = index & 0xff;
    return offset + 2;
  }
  out[offset] = index & 0xff;
  return offset + 1;
}

function writeZeroRun(out: Uint8Array, offset: number, length: number): number {
  if (length <= MAX_SHORT_RUN) {
    out[offset] = Marker.ZERO_SHORT;
    out[offset + 1] = length;
    return offset + 2;
  }
  if (length <= MAX_MEDIUM_RUN) {
    out[offset] = Marker.ZERO_MEDIUM;
    out[offset + 1] = (length >>> 8) & 0xff;
    out[offset + 2] = length & 0xff;
    return offset + 3;
  }
  out[offset] = Marker.ZERO_LONG;
  out[offset + 1] = (length >>> 24) & 0xff;
  out[offset + 2] = (length >>> 16) & 0xff;
  out[offset + 3] = (length >>> 8) & 0xff;
  out[offset + 4] = length & 0xff;
  return offset + 5;
}

export function serializeBody(body: StreamBody, layout: BodyLayout): Uint8Array {
  const out = new Uint8Array(measureBody(body, layout));
  let offset = 0;

  if (body.selectorIndex !== null) {
    if (layout.selectorWidth === null) {
      throw new CodecError(
        CodecErrorCode.INVALID_INPUT,
        'Body carries a selector reference but the layout has no selector width'
      );
    }
    offset = writeIndex(out, offset, body.selectorIndex, layout.selectorWidth);
  }

  for (const segment of body.segments) {
    switch (segment.kind) {
      case 'literal':
        if (!layout.structured) {
          out.set(segment.bytes, offset);
          offset += segment.bytes.length;
          break;
        }
        for (const byte of segment.bytes) {
          if (isReservedMarker(byte)) {
            out[offset++] = Marker.ESCAPE;
          }
          out[offset++] = byte;
        }
        break;
      case 'reference':
        out[offset++] = REFERENCE_MARKERS[segment.stage];
        offset = writeIndex(
          out,
          offset,
          segment.index,
          referenceWidth(layout, segment.stage)
        );
        break;
      case 'zero_run':
        offset = writeZeroRun(out, offset, segment.length);
        break;
    }
  }

  return out;
}

function readUint(
  bytes: Uint8Array,
  offset: number,
  width: number,
  what: string
): number {
  if (offset + width > bytes.length) {
    throw malformedStream(`Truncated ${what}`, offset);
  }
  let value = 0;
  for (let i = 0; i < width; i++) {
    value = value * 256 + bytes[offset + i];
  }
  return value;
}

class LiteralCollector {
  private pending: number[] = [];

  constructor(private readonly segments: Segment[]) {}

  push(byte: number): void {
    this.pending.push(byte);
  }

  flush(): void {
    if (this.pending.length > 0) {
      this.segments.push(literal(Uint8Array.from(this.pending)));
      this.pending = [];
    }
  }
}

/**
 * Parse a serialized body starting at `start`.
 */
export function parseBody(
  bytes: Uint8Array,
  start: number,
  layout: BodyLayout
): StreamBody {
  let offset = start;
  let selectorIndex: number | null = null;

  if (layout.selectorWidth !== null) {
    selectorIndex = readUint(bytes, offset, layout.selectorWidth, 'selector index');
    offset += layout.selectorWidth;
  }

  const segments: Segment[] = [];

  if (!layout.structured) {
    if (offset < bytes.length) {
      segments.push(literal(bytes.slice(offset)));
    }
    return { selectorIndex, segments };
  }

  const literals = new LiteralCollector(segments);

  while (offset < bytes.length) {
    const byte = bytes[offset];

    if (!isReservedMarker(byte)) {
      literals.push(byte);
      offset++;
      continue;
    }

    switch (byte) {
      case Marker.ESCAPE: {
        const escaped = readUint(bytes, offset + 1, 1, 'escape');
        if (!isReservedMarker(escaped)) {
          throw malformedStream(
            `Escape of non-reserved byte 0x${escaped.toString(16)}`,
            offset
          );
        }
        literals.push(escaped);
        offset += 2;
        break;
      }
      case Marker.ADDRESS:
      case Marker.PATTERN: {
        const stage: ReferenceStage = byte === Marker.ADDRESS ? 'address' : 'pattern';
        const width = layout.referenceWidths[stage];
        if (width === undefined) {
          throw malformedStream(
            `Unexpected ${stage} reference: stage not recorded in header`,
            offset
          );
        }
        const index = readUint(bytes, offset + 1, width, `${stage} index`);
        literals.flush();
        segments.push({ kind: 'reference', stage, index });
        offset += 1 + width;
        break;
      }
      case Marker.ZERO_SHORT:
      case Marker.ZERO_MEDIUM:
      case Marker.ZERO_LONG: {
        if (!layout.allowZeroRuns) {
          throw malformedStream(
            'Unexpected zero-run code: stage not recorded in header',
            offset
          );
        }
        const width = byte === Marker.ZERO_SHORT ? 1 : byte === Marker.ZERO_MEDIUM ? 2 : 4;
        const length = readUint(bytes, offset + 1, width, 'zero-run length');
        if (length === 0) {
          throw malformedStream('Zero-run of length 0', offset);
        }
        literals.flush();
        segments.push({ kind: 'zero_run', length });
        offset += 1 + width;
        break;
      }
      default:
        throw malformedStream(
          `Unescaped reserved byte 0x${byte.toString(16)} in body`,
          offset
        );
    }
  }

  literals.flush();
  return { selectorIndex, segments };
}

/**
 * Join segments back into bytes once every code has been expanded.
 */
export function flattenLiterals(segments: readonly Segment[]): Uint8Array {
  let total = 0;
  for (const segment of segments) {
    if (segment.kind !== 'literal') {
      throw new CodecError(
        CodecErrorCode.MALFORMED_STREAM,
        `Unexpanded ${segment.kind} segment left after decoding`
      );
    }
    total += segment.bytes.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const segment of segments) {
    if (segment.kind === 'literal') {
      out.set(segment.bytes, offset);
      offset += segment.bytes.length;
    }
  }
  return out;
}
