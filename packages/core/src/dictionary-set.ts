/**
 * Dictionary set persistence
 *
 * All dictionaries of a trained codec travel together as one MessagePack
 * record, so a compressed stream and the snapshot that produced it can be
 * shipped and restored as a unit.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { encode, decode } from '@msgpack/msgpack';
import { CodecError, CodecErrorCode } from './codec-errors.js';
import { Dictionary, parseDictionaryRecord } from './dictionary.js';
import type { DictionarySet } from './codec-interfaces.js';
import { DICTIONARY_KINDS, type DictionaryKind } from './codec-types.js';

const DICTIONARY_SET_FORMAT = 1;

export function freezeDictionarySet(
  dictionaries: Partial<Record<DictionaryKind, Dictionary>>
): DictionarySet {
  const snapshot: Partial<Record<DictionaryKind, Dictionary>> = {};
  for (const kind of DICTIONARY_KINDS) {
    const dictionary = dictionaries[kind];
    if (!dictionary) {
      continue;
    }
    if (dictionary.kind !== kind) {
      throw new CodecError(
        CodecErrorCode.INVALID_DICTIONARY,
        `Dictionary of kind ${dictionary.kind} cannot be used as the ${kind} dictionary`
      );
    }
    snapshot[kind] = dictionary;
  }
  return Object.freeze(snapshot);
}

export function saveDictionarySet(dictionaries: DictionarySet): Uint8Array {
  const records = DICTIONARY_KINDS.flatMap(kind => {
    const dictionary = dictionaries[kind];
    return dictionary ? [dictionary.toRecord()] : [];
  });
  return encode({ format: DICTIONARY_SET_FORMAT, dictionaries: records });
}

export function loadDictionarySet(source: Uint8Array): DictionarySet {
  let raw: unknown;
  try {
    raw = decode(source);
  } catch (error) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      `Dictionary set is not valid MessagePack: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (typeof raw !== 'object' || raw === null || !('dictionaries' in raw)) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      'Dictionary set record has no dictionaries'
    );
  }
  const format = 'format' in raw ? raw.format : undefined;
  if (format !== DICTIONARY_SET_FORMAT) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      `Unsupported dictionary set format: ${String(format)}`
    );
  }
  if (!Array.isArray(raw.dictionaries)) {
    throw new CodecError(
      CodecErrorCode.INVALID_DICTIONARY,
      'Dictionary set entries must be a list'
    );
  }

  const loaded: Partial<Record<DictionaryKind, Dictionary>> = {};
  for (const entry of raw.dictionaries) {
    const record = parseDictionaryRecord(entry);
    if (loaded[record.kind]) {
      throw new CodecError(
        CodecErrorCode.INVALID_DICTIONARY,
        `Dictionary set holds two ${record.kind} dictionaries`
      );
    }
    loaded[record.kind] = Dictionary.fromRecord(record);
  }
  return freezeDictionarySet(loaded);
}

export async function writeDictionarySetFile(
  path: string,
  dictionaries: DictionarySet
): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, saveDictionarySet(dictionaries));
}

export async function readDictionarySetFile(path: string): Promise<DictionarySet> {
  const contents = await fs.readFile(path);
  return loadDictionarySet(new Uint8Array(contents));
}
