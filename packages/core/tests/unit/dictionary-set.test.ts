import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { encode } from '@msgpack/msgpack';
import {
  freezeDictionarySet,
  loadDictionarySet,
  readDictionarySetFile,
  saveDictionarySet,
  writeDictionarySetFile,
} from '../../src/dictionary-set.js';
import { Dictionary } from '../../src/dictionary.js';
import { compress, decompress } from '../../src/pipeline.js';
import { CodecErrorCode, isCodecError } from '../../src/codec-errors.js';
import type { DictionarySet } from '../../src/codec-interfaces.js';
import { hex } from '../shared/helpers/test-utils.js';

function expectInvalidDictionary(fn: () => unknown): void {
  try {
    fn();
  } catch (error) {
    expect(isCodecError(error, CodecErrorCode.INVALID_DICTIONARY)).toBe(true);
    return;
  }
  throw new Error('Expected INVALID_DICTIONARY');
}

const DICTIONARIES: DictionarySet = {
  selector: Dictionary.fromPatterns([hex('a9059cbb'), hex('095ea7b3')], {
    kind: 'selector',
    capacity: 256,
    indexWidth: 1,
  }),
  pattern: Dictionary.fromPatterns([hex('f6f6f6f6'), hex('00000000')], {
    kind: 'pattern',
    capacity: 16,
    indexWidth: 1,
  }),
};

describe('Dictionary sets', () => {
  test('should restore every dictionary from one record', () => {
    const restored = loadDictionarySet(saveDictionarySet(DICTIONARIES));

    expect(restored.address).toBeUndefined();
    expect(restored.selector?.getEntries()).toEqual(DICTIONARIES.selector?.getEntries());
    expect(restored.pattern?.getEntries()).toEqual(DICTIONARIES.pattern?.getEntries());
    expect(Object.isFrozen(restored)).toBe(true);
  });

  test('should decode streams written with the saved dictionaries', () => {
    const payload = hex('095ea7b3 f6f6f6f6 0000000000000000 01');
    const encoded = compress(payload, DICTIONARIES);

    const restored = loadDictionarySet(saveDictionarySet(DICTIONARIES));
    expect(decompress(encoded, restored)).toEqual(payload);
  });

  test('should reject a dictionary filed under another kind', () => {
    const selectors = Dictionary.empty('selector', 256, 1);
    expectInvalidDictionary(() => freezeDictionarySet({ pattern: selectors }));
  });

  test('should reject malformed records', () => {
    expectInvalidDictionary(() => loadDictionarySet(Uint8Array.from([0xc1])));
    expectInvalidDictionary(() => loadDictionarySet(encode({ format: 1 })));
    expectInvalidDictionary(() => loadDictionarySet(encode({ format: 9, dictionaries: [] })));
    expectInvalidDictionary(() => loadDictionarySet(encode({ format: 1, dictionaries: 'none' })));
  });

  test('should reject two dictionaries of the same kind', () => {
    const record = DICTIONARIES.selector?.toRecord();
    expectInvalidDictionary(() =>
      loadDictionarySet(encode({ format: 1, dictionaries: [record, record] }))
    );
  });

  describe('files', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fs.mkdtemp(join(tmpdir(), 'calldata-dictionaries-'));
    });

    afterEach(async () => {
      await fs.rm(directory, { recursive: true, force: true });
    });

    test('should write and read a dictionary set file', async () => {
      const path = join(directory, 'nested', 'dictionaries.msgpack');

      await writeDictionarySetFile(path, DICTIONARIES);
      const restored = await readDictionarySetFile(path);

      expect(restored.selector?.lookup(hex('095ea7b3'))).toBe(1);
      expect(restored.pattern?.size).toBe(2);
    });

    test('should fail on a missing file', async () => {
      await expect(readDictionarySetFile(join(directory, 'missing.msgpack'))).rejects.toThrow();
    });
  });
});
