// ABOUTME: Request-parameter builders shared by the artist accessors and query functions.
// ABOUTME: Only supplied, truthy values reach the request; flags travel as the string "true".

import type { RequestParams } from './types';

export interface RangeFilters {
  maxFamiliarity?: number;
  minFamiliarity?: number;
  maxHotttnesss?: number;
  minHotttnesss?: number;
}

export interface BucketOptions {
  /** Extra data to include per artist, e.g. `['hotttnesss', 'id:musicbrainz']` */
  buckets?: readonly string[];
  /** Restrict results to the id spaces named in `buckets` */
  limit?: boolean;
}

// A zero bound is indistinguishable from "not supplied" and is dropped.
// Range semantics (max below min and so on) are left to the service.
export function applyRangeFilters(params: RequestParams, filters: RangeFilters): void {
  if (filters.maxFamiliarity) {
    params.max_familiarity = filters.maxFamiliarity;
  }
  if (filters.minFamiliarity) {
    params.min_familiarity = filters.minFamiliarity;
  }
  if (filters.maxHotttnesss) {
    params.max_hotttnesss = filters.maxHotttnesss;
  }
  if (filters.minHotttnesss) {
    params.min_hotttnesss = filters.minHotttnesss;
  }
}

export function applyBuckets(params: RequestParams, { buckets, limit }: BucketOptions): void {
  if (buckets && buckets.length > 0) {
    params.bucket = [...buckets];
  }
  applyFlag(params, 'limit', limit);
}

export function applyFlag(params: RequestParams, key: string, value: boolean | undefined): void {
  if (value) {
    params[key] = 'true';
  }
}

export function toList(value: string | readonly string[]): string[] {
  return typeof value === 'string' ? [value] : [...value];
}
