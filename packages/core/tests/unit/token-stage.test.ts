import { describe, test, expect } from 'vitest';
import { Dictionary } from '../../src/dictionary.js';
import {
  TokenSubstitutionStage,
  createAddressStage,
  createPatternStage,
  createSelectorStage,
  fixedWidthMatcher,
} from '../../src/token-stage.js';
import { literal, rawBody, type BodyLayout, type StreamBody } from '../../src/segments.js';
import { CodecErrorCode, isCodecError } from '../../src/codec-errors.js';
import { concatBytes, hex } from '../shared/helpers/test-utils.js';

const EMPTY_LAYOUT: BodyLayout = {
  selectorWidth: null,
  structured: false,
  referenceWidths: {},
  allowZeroRuns: false,
};

const ADDRESS = new Uint8Array(20).fill(0x22);

describe('TokenSubstitutionStage', () => {
  describe('selector', () => {
    const dictionary = Dictionary.fromPatterns([hex('a9059cbb')], {
      kind: 'selector',
      capacity: 256,
      indexWidth: 1,
    });
    const stage = createSelectorStage(dictionary);

    test('should replace a known leading selector with its index', () => {
      const result = stage.encode(rawBody(hex('a9059cbb00000001')));

      expect(result.itemsReplaced).toBe(1);
      expect(result.bytesSaved).toBe(3);
      expect(result.body).toEqual({
        selectorIndex: 0,
        segments: [literal(hex('00000001'))],
      });
      expect(stage.decode(result.body)).toEqual({
        selectorIndex: null,
        segments: [literal(hex('a9059cbb')), literal(hex('00000001'))],
      });
    });

    test('should drop the literal segment when the payload is only a selector', () => {
      const result = stage.encode(rawBody(hex('a9059cbb')));
      expect(result.body).toEqual({ selectorIndex: 0, segments: [] });
    });

    test('should leave unknown or short selectors alone', () => {
      const unknown = rawBody(hex('095ea7b300'));
      expect(stage.encode(unknown)).toEqual({ body: unknown, itemsReplaced: 0, bytesSaved: 0 });

      const short = rawBody(hex('a9059c'));
      expect(stage.encode(short).itemsReplaced).toBe(0);
    });

    test('should only look at the start of the payload', () => {
      const result = stage.encode(rawBody(hex('00a9059cbb')));
      expect(result.itemsReplaced).toBe(0);
    });

    test('should record a positional selector in the layout', () => {
      expect(stage.extendLayout(EMPTY_LAYOUT)).toEqual({
        ...EMPTY_LAYOUT,
        selectorWidth: 1,
      });
    });

    test('should fail on an index with no entry', () => {
      try {
        stage.decode({ selectorIndex: 9, segments: [] });
        throw new Error('Expected DICTIONARY_MISS');
      } catch (error) {
        expect(isCodecError(error, CodecErrorCode.DICTIONARY_MISS)).toBe(true);
      }
    });
  });

  describe('address', () => {
    const dictionary = Dictionary.fromPatterns([ADDRESS], {
      kind: 'address',
      capacity: 65536,
      indexWidth: 2,
    });
    const stage = createAddressStage(dictionary);

    test('should replace addresses at unaligned offsets', () => {
      const payload = concatBytes(hex('ab'), ADDRESS, hex('cd'));
      const result = stage.encode(rawBody(payload));

      expect(result.itemsReplaced).toBe(1);
      expect(result.bytesSaved).toBe(17);
      expect(result.body.segments).toEqual([
        literal(hex('ab')),
        { kind: 'reference', stage: 'address', index: 0 },
        literal(hex('cd')),
      ]);
      expect(stage.decode(result.body).segments).toEqual([
        literal(hex('ab')),
        literal(ADDRESS),
        literal(hex('cd')),
      ]);
    });

    test('should not scan inside codes left by earlier stages', () => {
      const body: StreamBody = {
        selectorIndex: 3,
        segments: [
          { kind: 'zero_run', length: 12 },
          literal(ADDRESS),
        ],
      };
      const result = stage.encode(body);

      expect(result.body).toEqual({
        selectorIndex: 3,
        segments: [
          { kind: 'zero_run', length: 12 },
          { kind: 'reference', stage: 'address', index: 0 },
        ],
      });
    });

    test('should mark the body as structured', () => {
      expect(stage.extendLayout(EMPTY_LAYOUT)).toEqual({
        selectorWidth: null,
        structured: true,
        referenceWidths: { address: 2 },
        allowZeroRuns: false,
      });
    });

    test('should leave other stages untouched on decode', () => {
      const body: StreamBody = {
        selectorIndex: null,
        segments: [{ kind: 'reference', stage: 'pattern', index: 0 }],
      };
      expect(stage.decode(body)).toEqual(body);
    });
  });

  describe('pattern', () => {
    const dictionary = Dictionary.fromPatterns([hex('aabb'), hex('aabbcc')], {
      kind: 'pattern',
      capacity: 256,
      indexWidth: 1,
    });
    const stage = createPatternStage(dictionary);

    test('should take the longest entry at each offset', () => {
      const result = stage.encode(rawBody(hex('aabbcc aabb 01')));

      expect(result.itemsReplaced).toBe(2);
      expect(result.bytesSaved).toBe(1);
      expect(result.body.segments).toEqual([
        { kind: 'reference', stage: 'pattern', index: 1 },
        { kind: 'reference', stage: 'pattern', index: 0 },
        literal(hex('01')),
      ]);
    });

    test('should do nothing with an empty dictionary', () => {
      const empty = createPatternStage(Dictionary.empty('pattern', 256, 1));
      const body = rawBody(hex('aabbcc'));
      expect(empty.encode(body)).toEqual({ body, itemsReplaced: 0, bytesSaved: 0 });
    });
  });

  test('should refuse a dictionary of another kind', () => {
    const selectors = Dictionary.empty('selector', 256, 1);
    try {
      new TokenSubstitutionStage('address', selectors, fixedWidthMatcher(20), {
        scope: 'inline',
        stage: 'address',
      });
      throw new Error('Expected INVALID_CONFIG');
    } catch (error) {
      expect(isCodecError(error, CodecErrorCode.INVALID_CONFIG)).toBe(true);
    }
  });
});
