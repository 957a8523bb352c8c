/**
 * Token Substitution Stage
 *
 * One stage implementation for selectors, addresses and byte patterns. What
 * differs between them is only where a token may sit and how it is matched:
 *
 * - selector: a 4-byte token at the very start of the payload, written back
 *   as a bare index because its position is implied by the header
 * - address: any 20-byte window of literal bytes, aligned or not
 * - pattern: entries of any length, longest match first, lowest index on a tie
 */

import { dictionaryMiss, CodecError, CodecErrorCode } from './codec-errors.js';
import type { Dictionary, TokenMatch } from './dictionary.js';
import type { IPipelineStage, StageEncodeResult } from './codec-interfaces.js';
import {
  literal,
  type BodyLayout,
  type ReferenceStage,
  type Segment,
  type StreamBody,
} from './segments.js';
import {
  ADDRESS_WIDTH,
  SELECTOR_WIDTH,
  StageKind,
  type DictionaryKind,
} from './codec-types.js';

export type TokenMatcher = (
  dictionary: Dictionary,
  bytes: Uint8Array,
  offset: number
) => TokenMatch | null;

export type TokenPlacement =
  | { scope: 'prefix' }
  | { scope: 'inline'; stage: ReferenceStage };

export function fixedWidthMatcher(width: number): TokenMatcher {
  return (dictionary, bytes, offset) =>
    dictionary.matchExact(bytes, offset, width);
}

export const longestMatcher: TokenMatcher = (dictionary, bytes, offset) =>
  dictionary.matchLongest(bytes, offset);

export class TokenSubstitutionStage implements IPipelineStage {
  readonly kind: DictionaryKind;
  private readonly dictionary: Dictionary;
  private readonly matcher: TokenMatcher;
  private readonly placement: TokenPlacement;

  constructor(
    kind: DictionaryKind,
    dictionary: Dictionary,
    matcher: TokenMatcher,
    placement: TokenPlacement
  ) {
    if (dictionary.kind !== kind) {
      throw new CodecError(
        CodecErrorCode.INVALID_CONFIG,
        `Cannot run the ${kind} stage with a ${dictionary.kind} dictionary`
      );
    }
    this.kind = kind;
    this.dictionary = dictionary;
    this.matcher = matcher;
    this.placement = placement;
  }

  encode(body: StreamBody): StageEncodeResult {
    if (this.dictionary.isEmpty) {
      return { body, itemsReplaced: 0, bytesSaved: 0 };
    }
    return this.placement.scope === 'prefix'
      ? this.encodePrefix(body)
      : this.encodeInline(body, this.placement.stage);
  }

  decode(body: StreamBody): StreamBody {
    if (this.placement.scope === 'prefix') {
      if (body.selectorIndex === null) {
        return body;
      }
      const pattern = this.resolve(body.selectorIndex);
      return {
        selectorIndex: null,
        segments: [literal(pattern), ...body.segments],
      };
    }

    const stage = this.placement.stage;
    return {
      selectorIndex: body.selectorIndex,
      segments: body.segments.map(segment =>
        segment.kind === 'reference' && segment.stage === stage
          ? literal(this.resolve(segment.index))
          : segment
      ),
    };
  }

  extendLayout(layout: BodyLayout): BodyLayout {
    if (this.placement.scope === 'prefix') {
      return { ...layout, selectorWidth: this.dictionary.indexWidth };
    }
    const referenceWidths: BodyLayout['referenceWidths'] = {
      ...layout.referenceWidths,
    };
    referenceWidths[this.placement.stage] = this.dictionary.indexWidth;
    return { ...layout, structured: true, referenceWidths };
  }

  private resolve(index: number): Uint8Array {
    const pattern = this.dictionary.reverse(index);
    if (!pattern) {
      throw dictionaryMiss(this.kind, index);
    }
    return pattern;
  }

  private encodePrefix(body: StreamBody): StageEncodeResult {
    const [first, ...rest] = body.segments;
    if (body.selectorIndex !== null || !first || first.kind !== 'literal') {
      return { body, itemsReplaced: 0, bytesSaved: 0 };
    }

    const match = this.matcher(this.dictionary, first.bytes, 0);
    if (!match) {
      return { body, itemsReplaced: 0, bytesSaved: 0 };
    }

    const remainder = first.bytes.subarray(match.length);
    return {
      body: {
        selectorIndex: match.index,
        segments: remainder.length > 0 ? [literal(remainder), ...rest] : rest,
      },
      itemsReplaced: 1,
      bytesSaved: match.length - this.dictionary.indexWidth,
    };
  }

  private encodeInline(
    body: StreamBody,
    stage: ReferenceStage
  ): StageEncodeResult {
    const referenceSize = 1 + this.dictionary.indexWidth;
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
        const match = this.matcher(this.dictionary, bytes, offset);
        if (!match) {
          offset++;
          continue;
        }
        if (offset > start) {
          segments.push(literal(bytes.subarray(start, offset)));
        }
        segments.push({ kind: 'reference', stage, index: match.index });
        itemsReplaced++;
        bytesSaved += match.length - referenceSize;
        offset += match.length;
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
}

export function createSelectorStage(dictionary: Dictionary): TokenSubstitutionStage {
  return new TokenSubstitutionStage(
    StageKind.SELECTOR,
    dictionary,
    fixedWidthMatcher(SELECTOR_WIDTH),
    { scope: 'prefix' }
  );
}

export function createAddressStage(dictionary: Dictionary): TokenSubstitutionStage {
  return new TokenSubstitutionStage(
    StageKind.ADDRESS,
    dictionary,
    fixedWidthMatcher(ADDRESS_WIDTH),
    { scope: 'inline', stage: StageKind.ADDRESS }
  );
}

export function createPatternStage(dictionary: Dictionary): TokenSubstitutionStage {
  return new TokenSubstitutionStage(
    StageKind.PATTERN,
    dictionary,
    longestMatcher,
    { scope: 'inline', stage: StageKind.PATTERN }
  );
}
