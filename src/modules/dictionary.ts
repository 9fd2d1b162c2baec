/**
 * Substitution dictionary loading.
 *
 * The bundled dictionary lives in data/homoglyphs.json; operators can point
 * LOOKALIKE_DICTIONARY or --dictionary at another file of the same shape.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';
import type { SubstitutionDictionary } from '../core/types.js';

const log = createModuleLogger('dictionary');

// src/modules and dist/modules both sit two levels below the package root
export const DEFAULT_DICTIONARY_PATH = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '../../data/homoglyphs.json'
);

function isSingleCodePoint(value: string): boolean {
  return Array.from(value).length === 1;
}

/**
 * Validate a parsed JSON value and freeze it into an ordered map.
 * Key order and substitute order are kept, which makes generation reproducible.
 */
export function buildDictionary(raw: unknown, source = 'inline'): SubstitutionDictionary {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw Errors.invalidDictionary(source, 'expected an object of character -> substitutes');
  }

  const entries = new Map<string, readonly string[]>();
  for (const [key, value] of Object.entries(raw)) {
    if (!isSingleCodePoint(key)) {
      throw Errors.invalidDictionary(source, `key '${key}' is not a single character`);
    }
    if (!Array.isArray(value) || value.length === 0) {
      throw Errors.invalidDictionary(source, `'${key}' must map to a non-empty array`);
    }

    const substitutes: string[] = [];
    for (const sub of value) {
      if (typeof sub !== 'string' || !isSingleCodePoint(sub)) {
        throw Errors.invalidDictionary(source, `'${key}' has a substitute that is not a single character`);
      }
      if (sub === key || substitutes.includes(sub)) {
        throw Errors.invalidDictionary(source, `'${key}' lists '${sub}' twice or as its own substitute`);
      }
      substitutes.push(sub);
    }
    entries.set(key, Object.freeze(substitutes));
  }

  return entries;
}

export async function loadDictionary(path: string = DEFAULT_DICTIONARY_PATH): Promise<SubstitutionDictionary> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (err) {
    throw Errors.invalidDictionary(path, 'file could not be read', err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw Errors.invalidDictionary(path, 'file is not valid JSON', err);
  }

  const dictionary = buildDictionary(raw, path);
  log.debug({ path, characters: dictionary.size }, 'Loaded substitution dictionary');
  return dictionary;
}
