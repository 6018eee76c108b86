// ABOUTME: The one place that knows where values live inside Echo Nest responses.
// ABOUTME: Each helper narrows a raw sub-structure or fails with EchoNestError.

import { EchoNestError } from './errors';
import type { RawArtist, RawDocument, RawUrls } from './types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isDocumentList(value: unknown): value is RawDocument[] {
  return Array.isArray(value) && value.every(isRecord);
}

function malformed(path: string): EchoNestError {
  return new EchoNestError(`Malformed response: "${path}" is missing or has the wrong shape`);
}

export function requireNumber(value: unknown, path: string): number {
  if (typeof value !== 'number') {
    throw malformed(path);
  }
  return value;
}

export function requireDocuments(value: unknown, path: string): RawDocument[] {
  if (!isDocumentList(value)) {
    throw malformed(path);
  }
  return value;
}

export function requireUrls(value: unknown, path: string): RawUrls {
  if (!isRecord(value)) {
    throw malformed(path);
  }
  return value;
}

export function requireArtist(value: unknown, path: string): RawArtist {
  if (!isRecord(value)) {
    throw malformed(path);
  }
  return value;
}

/** The identifier an artist structure is addressed by: its id, else its name */
export function artistIdentifier(artist: RawArtist): string | null {
  if (typeof artist.id === 'string' && artist.id) {
    return artist.id;
  }
  if (typeof artist.name === 'string' && artist.name) {
    return artist.name;
  }
  return null;
}

/** A list of artist structures, each carrying an id or a name */
export function requireArtists(value: unknown, path: string): RawArtist[] {
  if (!isDocumentList(value) || !value.every((artist) => artistIdentifier(artist) !== null)) {
    throw malformed(path);
  }
  return value;
}

/**
 * Foreign id of an artist in `idSpace`. Accepts both the flat form
 * (`{ musicbrainz: '...' }`) and the `foreign_ids` bucket form
 * (`{ foreign_ids: [{ catalog, foreign_id }] }`).
 */
export function findForeignId(artist: RawArtist, idSpace: string): string | null {
  const direct = artist[idSpace];
  if (typeof direct === 'string') {
    return direct;
  }

  const foreignIds: unknown = artist.foreign_ids;
  if (!Array.isArray(foreignIds)) {
    return null;
  }

  for (const entry of foreignIds) {
    if (isRecord(entry) && entry.catalog === idSpace && typeof entry.foreign_id === 'string') {
      return entry.foreign_id;
    }
  }
  return null;
}

/** All `catalog -> foreign_id` pairs carried by a `foreign_ids` bucket */
export function listForeignIds(artist: RawArtist): Array<[string, string]> {
  const foreignIds: unknown = artist.foreign_ids;
  if (!Array.isArray(foreignIds)) {
    return [];
  }

  const pairs: Array<[string, string]> = [];
  for (const entry of foreignIds) {
    if (isRecord(entry) && typeof entry.catalog === 'string' && typeof entry.foreign_id === 'string') {
      pairs.push([entry.catalog, entry.foreign_id]);
    }
  }
  return pairs;
}
