import { CodecError, CodecErrorCode } from './codec-errors.js';
import type { IPipelineStage, StageEncodeResult } from './codec-interfaces.js';
import {
  MAX_ZERO_RUN,
  literal,
  zeroRunSize,
  type BodyLayout,
  type Segment,
  type StreamBody,
} from './segments.js';
import { StageKind } from './codec-types.js';

export const DEFAULT_MIN_ZERO_RUN = 3;

/**
 * Tiered run-length coding of 0x00 runs. Runs shorter than `minRunLength`
 * stay literal.
 */
export class ZeroRunStage implements IPipelineStage {
  readonly kind = StageKind.ZERO_RUN;
  private readonly minRunLength: number;

  constructor(minRunLength: number = DEFAULT_MIN_ZERO_RUN) {
    if (!Number.isInteger(minRunLength) || minRunLength < 1) {
      throw new CodecError(
        CodecErrorCode.INVALID_CONFIG,
        `Minimum zero-run length must be a positive integer, got ${minRunLength}`
      );
    }
    this.minRunLength = minRunLength;
  }

  encode(body: StreamBody): StageEncodeResult {
    const segments: Segment[] = [];
    let itemsReplaced = 0;
    let bytesSaved = 0;

    for (const segment of body.segments) {
      if (segment.kind !== 'literal') {
        segments.push(segment);
        continue;
      }

      const bytes = segment.bytes;
      let start = 0;
      let offset = 0;
      while (offset < bytes.length) {
        if (bytes[offset] !== 0) {
          offset++;
          continue;
        }

        const runStart = offset;
        while (offset < bytes.length && bytes[offset] === 0) {
          offset++;
        }
        let remaining = offset - runStart;
        if (remaining < this.minRunLength) {
          continue;
        }

        if (runStart > start) {
          segments.push(literal(bytes.subarray(start, runStart)));
        }
        while (remaining > 0) {
          const length = Math.min(remaining, MAX_ZERO_RUN);
          segments.push({ kind: 'zero_run', length });
          itemsReplaced++;
          bytesSaved += length - zeroRunSize(length);
          remaining -= length;
        }
        start = offset;
      }
      if (start < bytes.length) {
        segments.push(literal(bytes.subarray(start)));
      }
    }

    return {
      body: { selectorIndex: body.selectorIndex, segments },
      itemsReplaced,
      bytesSaved,
    };
  }

  decode(body: StreamBody): StreamBody {
    return {
      selectorIndex: body.selectorIndex,
      segments: body.segments.map(segment =>
        segment.kind === 'zero_run'
          ? literal(new Uint8Array(segment.length))
          : segment
      ),
    };
  }

  extendLayout(layout: BodyLayout): BodyLayout {
    return { ...layout, structured: true, allowZeroRuns: true };
  }

  getMinRunLength(): number {
    return this.minRunLength;
  }
}
