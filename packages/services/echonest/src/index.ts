// Echo Nest service - artist lookup, search and related-entity retrieval

import type { EchoNestConfig } from '@tastemaker/config';
import { Artist, type ProfileOptions } from './artist';
import { EchoNestClient, type RemoteCallGateway } from './client';
import {
  search,
  similar,
  topHottt,
  type SearchOptions,
  type SimilarQueryOptions,
  type TopHotttOptions,
} from './queries';

export { Artist, isArtistId } from './artist';
export type {
  ArtistAttribute,
  ArtistAttributes,
  CacheOption,
  LicensedListOptions,
  ListOptions,
  ProfileOptions,
  SimilarOptions,
} from './artist';

export { AttributeCache } from './cache';

export { EchoNestClient, isEnvelope } from './client';
export type { RemoteCallGateway } from './client';

export { EchoNestError, isEchoNestError } from './errors';
export type { EchoNestErrorOptions } from './errors';

export type { BucketOptions, RangeFilters } from './params';

export { search, similar, topHottt } from './queries';
export type { SearchOptions, SimilarQueryOptions, TopHotttOptions } from './queries';

export { Result } from './result';
export type { ResultKind } from './result';

export type {
  EchoNestEnvelope,
  EchoNestResponseBody,
  EchoNestStatus,
  ParamValue,
  RawArtist,
  RawDocument,
  RawUrls,
  RequestParams,
} from './types';

// Convenience class that binds one gateway to every artist operation
export class EchoNestService {
  public readonly gateway: RemoteCallGateway;

  constructor(config: EchoNestConfig | { gateway: RemoteCallGateway }) {
    this.gateway = 'gateway' in config ? config.gateway : new EchoNestClient(config);
  }

  /** An artist handle; nothing is fetched until an accessor is called */
  artist(identifier: string): Artist {
    return new Artist(identifier, this.gateway);
  }

  async loadArtist(identifier: string, options: ProfileOptions = {}) {
    return Artist.load(identifier, this.gateway, options);
  }

  async search(options: SearchOptions) {
    return search(options, this.gateway);
  }

  async topHottt(options: TopHotttOptions = {}) {
    return topHottt(options, this.gateway);
  }

  async similar(options: SimilarQueryOptions) {
    return similar(options, this.gateway);
  }
}
