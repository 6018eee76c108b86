// ABOUTME: Artist queries that return lists of artists: search, top hottt and similar.
// ABOUTME: Each builds a parameter mapping from the supplied options and makes one call.

import { ECHONEST_CONFIG } from '@tastemaker/config';
import { Artist } from './artist';
import type { RemoteCallGateway } from './client';
import { requireArtists } from './decode';
import { applyBuckets, applyFlag, applyRangeFilters, toList, type BucketOptions, type RangeFilters } from './params';
import type { RequestParams } from './types';

export interface SearchOptions extends RangeFilters, BucketOptions {
  name?: string;
  description?: string;
  results?: number;
  /** Only match the name exactly */
  exact?: boolean;
  /** Match names that sound like `name` */
  soundsLike?: boolean;
  /** e.g. 'hotttnesss-desc' */
  sort?: string;
}

export interface TopHotttOptions extends BucketOptions {
  start?: number;
  results?: number;
}

export interface SimilarQueryOptions extends RangeFilters, BucketOptions {
  names?: string | readonly string[];
  ids?: string | readonly string[];
  start?: number;
  results?: number;
}

async function fetchArtists(
  action: string,
  params: RequestParams,
  gateway: RemoteCallGateway
): Promise<Artist[]> {
  const envelope = await gateway.call(`artist/${action}`, params);
  const artists = requireArtists(envelope.response.artists, 'response.artists');
  return artists.map((raw) => Artist.fromRaw(raw, gateway));
}

/**
 * Search for artists by name, description or constraint.
 *
 * @example
 * const artists = await search({ name: 'the national', results: 5 }, gateway);
 */
export async function search(options: SearchOptions, gateway: RemoteCallGateway): Promise<Artist[]> {
  const {
    name,
    description,
    results = ECHONEST_CONFIG.defaultResults,
    buckets,
    limit,
    exact,
    soundsLike,
    sort,
    ...filters
  } = options;

  const params: RequestParams = {};
  if (name) {
    params.name = name;
  }
  if (description) {
    params.description = description;
  }
  if (results) {
    params.results = results;
  }
  applyBuckets(params, { buckets, limit });
  applyFlag(params, 'exact', exact);
  applyFlag(params, 'sounds_like', soundsLike);
  applyRangeFilters(params, filters);
  if (sort) {
    params.sort = sort;
  }

  return fetchArtists('search', params, gateway);
}

/** The currently hotttest artists */
export async function topHottt(options: TopHotttOptions, gateway: RemoteCallGateway): Promise<Artist[]> {
  const { start = 0, results = ECHONEST_CONFIG.defaultResults, buckets, limit } = options;

  const params: RequestParams = {};
  if (start) {
    params.start = start;
  }
  if (results) {
    params.results = results;
  }
  applyBuckets(params, { buckets, limit });

  return fetchArtists('top_hottt', params, gateway);
}

/**
 * Artists similar to one or more seed artists, given by id, name or both.
 * A single id or name is sent the same way as a one-element list.
 */
export async function similar(options: SimilarQueryOptions, gateway: RemoteCallGateway): Promise<Artist[]> {
  const { names, ids, start = 0, results = ECHONEST_CONFIG.defaultResults, buckets, limit, ...filters } = options;

  const params: RequestParams = {};
  if (ids && ids.length > 0) {
    params.id = toList(ids);
  }
  if (names && names.length > 0) {
    params.name = toList(names);
  }
  applyRangeFilters(params, filters);
  if (start) {
    params.start = start;
  }
  if (results) {
    params.results = results;
  }
  applyBuckets(params, { buckets, limit });

  return fetchArtists('similar', params, gateway);
}
