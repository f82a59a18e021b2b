/**
 * universities.ts — The university catalogue (src/config/universities.json).
 *
 * Each entry names the list page, the output code and the selectors the
 * generic list scanner and extractor need.  The bundled catalogue is checked
 * once, on first use; a malformed entry is a ConfigError naming the entry.
 * `loadUniversities(file)` reads an alternative catalogue from disk.
 */

import { readFileSync } from 'fs';
import bundledCatalogue from '../config/universities.json';
import { ConfigError, UnknownUniversityError, describeError } from './errors';
import type { UniversityInfo, UniversitySelectors, Visibility } from './types';

let cached: Map<string, UniversityInfo> | null = null;

/** Read and validate a catalogue file.  Keys must be unique. */
export function loadUniversities(file: string): Map<string, UniversityInfo> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read university catalogue ${file}: ${describeError(err)}`);
  }
  return parseCatalogue(parsed, file);
}

export function parseCatalogue(parsed: unknown, source: string): Map<string, UniversityInfo> {
  if (!Array.isArray(parsed)) {
    throw new ConfigError(`University catalogue ${source} must be a JSON array`);
  }

  const catalogue = new Map<string, UniversityInfo>();
  parsed.forEach((entry: unknown, index) => {
    const university = parseUniversity(entry, `${source}[${index}]`);
    if (catalogue.has(university.key)) {
      throw new ConfigError(`Duplicate university key "${university.key}" in ${source}`);
    }
    catalogue.set(university.key, university);
  });
  return catalogue;
}

function catalogue(): Map<string, UniversityInfo> {
  if (!cached) cached = parseCatalogue(bundledCatalogue, 'universities.json');
  return cached;
}

/** Look up a university by its command-line key (case-insensitive). */
export function getUniversity(key: string): UniversityInfo {
  const university = catalogue().get(key.trim().toLowerCase());
  if (!university) {
    throw new UnknownUniversityError(key, [...catalogue().keys()]);
  }
  return university;
}

export function listUniversities(): UniversityInfo[] {
  return [...catalogue().values()];
}

// ─── Validation ────────────────────────────────────────────

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseUniversity(entry: unknown, where: string): UniversityInfo {
  if (!isObject(entry)) {
    throw new ConfigError(`${where} must be an object`);
  }
  const selectors = entry.selectors;
  if (!isObject(selectors)) {
    throw new ConfigError(`${where}.selectors must be an object`);
  }

  return Object.freeze({
    key: requireString(entry, 'key', where).toLowerCase(),
    code: requireString(entry, 'code', where),
    name: requireString(entry, 'name', where),
    listUrl: requireString(entry, 'listUrl', where),
    visibility: optionalVisibility(entry, where),
    workers: optionalPositiveInt(entry, 'workers', where),
    timeoutMs: optionalPositiveInt(entry, 'timeoutMs', where),
    applyUrl: optionalString(entry, 'applyUrl', where),
    selectors: parseSelectors(selectors, `${where}.selectors`),
  });
}

function parseSelectors(raw: JsonObject, where: string): UniversitySelectors {
  return {
    listLink: requireString(raw, 'listLink', where),
    clickKey: optionalAttributeName(raw, 'clickKey', where),
    nextPage: optionalString(raw, 'nextPage', where),
    detailReady: optionalString(raw, 'detailReady', where),
    title: optionalString(raw, 'title', where),
    deadline: optionalString(raw, 'deadline', where),
    openDate: optionalString(raw, 'openDate', where),
    applyLink: optionalString(raw, 'applyLink', where),
    field: optionalString(raw, 'field', where),
  };
}

function requireString(raw: JsonObject, name: string, where: string): string {
  const value = optionalString(raw, name, where);
  if (value === undefined) {
    throw new ConfigError(`${where}.${name} is required`);
  }
  return value;
}

function optionalString(raw: JsonObject, name: string, where: string): string | undefined {
  const value = raw[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${where}.${name} must be a non-empty string`);
  }
  return value.trim();
}

function optionalAttributeName(raw: JsonObject, name: string, where: string): string | undefined {
  const value = optionalString(raw, name, where);
  if (value !== undefined && !/^[A-Za-z_][\w:.-]*$/.test(value)) {
    throw new ConfigError(`${where}.${name} must be an HTML attribute name`);
  }
  return value;
}

function optionalPositiveInt(raw: JsonObject, name: string, where: string): number | undefined {
  const value = raw[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${where}.${name} must be a positive integer`);
  }
  return value;
}

function optionalVisibility(raw: JsonObject, where: string): Visibility | undefined {
  const value = raw.visibility;
  if (value === undefined || value === null) return undefined;
  if (value === 'headless' || value === 'headful') return value;
  throw new ConfigError(`${where}.visibility must be "headless" or "headful"`);
}
