import { describe, test, expect } from 'vitest';
import { ZeroRunStage, DEFAULT_MIN_ZERO_RUN } from '../../src/zero-run-stage.js';
import { literal, rawBody, type StreamBody } from '../../src/segments.js';
import { CodecErrorCode, isCodecError } from '../../src/codec-errors.js';
import { hex } from '../shared/helpers/test-utils.js';

describe('ZeroRunStage', () => {
  test('should default to runs of three bytes', () => {
    expect(DEFAULT_MIN_ZERO_RUN).toBe(3);
    expect(new ZeroRunStage().getMinRunLength()).toBe(3);
  });

  test('should encode runs at the minimum length and keep shorter ones literal', () => {
    const stage = new ZeroRunStage(3);
    const result = stage.encode(rawBody(hex('01 0000 02 000000 03')));

    expect(result.itemsReplaced).toBe(1);
    expect(result.bytesSaved).toBe(1);
    expect(result.body.segments).toEqual([
      literal(hex('01000002')),
      { kind: 'zero_run', length: 3 },
      literal(hex('03')),
    ]);
  });

  test('should report nothing when every run is too short', () => {
    const stage = new ZeroRunStage(3);
    const result = stage.encode(rawBody(hex('0000 01 0000')));

    expect(result.itemsReplaced).toBe(0);
    expect(result.body.segments).toEqual([literal(hex('0000010000'))]);
  });

  test('should encode a payload made only of zeros as one run', () => {
    const stage = new ZeroRunStage();
    const result = stage.encode(rawBody(new Uint8Array(40)));

    expect(result.body.segments).toEqual([{ kind: 'zero_run', length: 40 }]);
    expect(result.bytesSaved).toBe(38);
  });

  test('should honour a custom minimum', () => {
    const stage = new ZeroRunStage(1);
    const result = stage.encode(rawBody(hex('0100')));

    expect(result.body.segments).toEqual([
      literal(hex('01')),
      { kind: 'zero_run', length: 1 },
    ]);
    expect(result.bytesSaved).toBe(-1);
  });

  test('should skip codes left by earlier stages', () => {
    const stage = new ZeroRunStage();
    const body: StreamBody = {
      selectorIndex: 0,
      segments: [
        { kind: 'reference', stage: 'address', index: 0 },
        literal(new Uint8Array(5)),
      ],
    };

    expect(stage.encode(body).body).toEqual({
      selectorIndex: 0,
      segments: [
        { kind: 'reference', stage: 'address', index: 0 },
        { kind: 'zero_run', length: 5 },
      ],
    });
  });

  test('should expand runs on decode', () => {
    const stage = new ZeroRunStage();
    const decoded = stage.decode({
      selectorIndex: null,
      segments: [literal(hex('01')), { kind: 'zero_run', length: 4 }],
    });

    expect(decoded.segments).toEqual([literal(hex('01')), literal(new Uint8Array(4))]);
  });

  test('should allow zero runs in the layout', () => {
    const layout = new ZeroRunStage().extendLayout({
      selectorWidth: 1,
      structured: false,
      referenceWidths: {},
      allowZeroRuns: false,
    });

    expect(layout).toEqual({
      selectorWidth: 1,
      structured: true,
      referenceWidths: {},
      allowZeroRuns: true,
    });
  });

  test.each([0, -1, 2.5])('should reject a minimum run length of %d', length => {
    try {
      new ZeroRunStage(length);
      throw new Error('Expected INVALID_CONFIG');
    } catch (error) {
      expect(isCodecError(error, CodecErrorCode.INVALID_CONFIG)).toBe(true);
    }
  });
});
