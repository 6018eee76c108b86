// ABOUTME: The Artist entity: an identifier plus lazily fetched, memoized attributes.
// ABOUTME: Each accessor makes at most one remote call and caches the raw value it extracted.

import { ECHONEST_CONFIG } from '@tastemaker/config';
import { AttributeCache } from './cache';
import type { RemoteCallGateway } from './client';
import {
  artistIdentifier,
  findForeignId,
  isDocumentList,
  isRecord,
  listForeignIds,
  requireArtist,
  requireArtists,
  requireDocuments,
  requireNumber,
  requireUrls,
} from './decode';
import { EchoNestError } from './errors';
import { applyBuckets, applyRangeFilters, type BucketOptions, type RangeFilters } from './params';
import { Result, type ResultKind } from './result';
import type { EchoNestResponseBody, RawArtist, RawDocument, RawUrls, RequestParams } from './types';

/** Raw values held per attribute once fetched */
export interface ArtistAttributes {
  hotttnesss: number;
  familiarity: number;
  audio: RawDocument[];
  biographies: RawDocument[];
  blogs: RawDocument[];
  images: RawDocument[];
  news: RawDocument[];
  reviews: RawDocument[];
  video: RawDocument[];
  similar: RawArtist[];
  urls: RawUrls;
}

export type ArtistAttribute = keyof ArtistAttributes;

const DOCUMENT_KINDS = {
  audio: 'audio',
  biographies: 'biography',
  blogs: 'blogs',
  images: 'image',
  news: 'news',
  reviews: 'review',
  video: 'video',
} as const satisfies Record<string, ResultKind>;

type DocumentAttribute = keyof typeof DOCUMENT_KINDS;

const DOCUMENT_ATTRIBUTES = Object.keys(DOCUMENT_KINDS).filter(
  (key): key is DocumentAttribute => key in DOCUMENT_KINDS
);

// Echo Nest ids come as AR + 16 chars, or in the long music:// form.
// Foreign ids look like musicbrainz:artist:<uuid>.
const SHORT_ID = /^AR[0-9A-Z]{16}$/;
const LONG_ID = /^music:\/\/id\.echonest\.com\/.+?\/AR\/AR[0-9A-Z]{16}$/;
const FOREIGN_ID = /^[^:\s]+:artist:[^:\s]+$/;

export function isArtistId(identifier: string): boolean {
  return SHORT_ID.test(identifier) || LONG_ID.test(identifier) || FOREIGN_ID.test(identifier);
}

export interface CacheOption {
  /** Use the cached value when present (default true) */
  cache?: boolean;
}

export interface ListOptions extends CacheOption {
  results?: number;
  start?: number;
}

export interface LicensedListOptions extends ListOptions {
  /** License filter, e.g. 'cc-by-sa'; sent only when given */
  license?: string;
}

export interface SimilarOptions extends ListOptions, RangeFilters, BucketOptions {}

export interface ProfileOptions {
  buckets?: readonly string[];
}

/**
 * An Echo Nest artist.
 *
 * @example
 * const a = new Artist('ARH6W4X1187B99274F', gateway);
 * const b = new Artist('the national', gateway);
 * const c = new Artist('musicbrainz:artist:a74b1b7f-71a5-4011-9441-d0b5e4122711', gateway);
 * const hotttnesss = await a.getHotttnesss();
 */
export class Artist {
  private identifier: string;
  private fields: RawArtist = {};
  private readonly cache = new AttributeCache<ArtistAttributes>();
  private readonly foreignIds = new AttributeCache<Record<string, string | null>>();

  name?: string;

  /**
   * @param identifier - Echo Nest id, foreign id or plain artist name
   * @param fields - raw fields already known for this artist, e.g. from a search result
   */
  constructor(
    identifier: string,
    private readonly gateway: RemoteCallGateway,
    fields: RawArtist = {}
  ) {
    this.identifier = identifier;
    this.absorb(fields);
  }

  /** Build an artist from a raw structure returned by the service */
  static fromRaw(raw: RawArtist, gateway: RemoteCallGateway): Artist {
    const identifier = artistIdentifier(raw);
    if (!identifier) {
      throw new EchoNestError('Malformed response: artist has neither "id" nor "name"');
    }
    return new Artist(identifier, gateway, raw);
  }

  /** Build an artist and resolve its profile (name, id and any requested buckets) */
  static async load(
    identifier: string,
    gateway: RemoteCallGateway,
    options: ProfileOptions = {}
  ): Promise<Artist> {
    const artist = new Artist(identifier, gateway);
    await artist.loadProfile(options);
    return artist;
  }

  get id(): string {
    return this.identifier;
  }

  /** A raw field supplied at construction or by a profile load */
  rawField(field: string): unknown {
    return this.fields[field];
  }

  isCached(attribute: ArtistAttribute): boolean {
    return this.cache.has(attribute);
  }

  cachedValue<K extends ArtistAttribute>(attribute: K): ArtistAttributes[K] | undefined {
    return this.cache.get(attribute);
  }

  hasForeignId(idSpace: string): boolean {
    return this.foreignIds.has(idSpace);
  }

  async loadProfile({ buckets = [] }: ProfileOptions = {}): Promise<this> {
    const params: RequestParams = {};
    if (buckets.length > 0) {
      params.bucket = [...buckets];
    }
    const body = await this.getAttribute('profile', params);
    this.absorb(requireArtist(body.artist, 'artist'));
    return this;
  }

  /** How hottt the artist currently is, 0..1 */
  async getHotttnesss({ cache = true }: CacheOption = {}): Promise<number> {
    return this.cache.resolve('hotttnesss', cache, async () => {
      const body = await this.getAttribute('hotttnesss');
      return requireNumber(body.artist?.hotttnesss, 'artist.hotttnesss');
    });
  }

  /** How familiar the artist is to the world, 0..1 */
  async getFamiliarity({ cache = true }: CacheOption = {}): Promise<number> {
    return this.cache.resolve('familiarity', cache, async () => {
      const body = await this.getAttribute('familiarity');
      return requireNumber(body.artist?.familiarity, 'artist.familiarity');
    });
  }

  async getAudio(options: ListOptions = {}): Promise<Result[]> {
    return this.getDocuments('audio', options);
  }

  async getBiographies(options: LicensedListOptions = {}): Promise<Result[]> {
    return this.getDocuments('biographies', options);
  }

  async getBlogs(options: ListOptions = {}): Promise<Result[]> {
    return this.getDocuments('blogs', options);
  }

  async getImages(options: LicensedListOptions = {}): Promise<Result[]> {
    return this.getDocuments('images', options);
  }

  async getNews(options: ListOptions = {}): Promise<Result[]> {
    return this.getDocuments('news', options);
  }

  async getReviews(options: ListOptions = {}): Promise<Result[]> {
    return this.getDocuments('reviews', options);
  }

  async getVideo(options: ListOptions = {}): Promise<Result[]> {
    return this.getDocuments('video', options);
  }

  /** Links to the artist on other sites, as a single `urls` result */
  async getUrls({ cache = true }: CacheOption = {}): Promise<Result> {
    const urls = await this.cache.resolve('urls', cache, async () => {
      const body = await this.getAttribute('urls');
      return requireUrls(body.urls, 'urls');
    });
    return new Result('urls', urls);
  }

  /**
   * Artists similar to this one. Each is a fresh Artist built from the raw
   * similarity entry, so only the buckets that entry carries are pre-cached.
   * The cache key is `similar` whatever the filters, as with every accessor.
   */
  async getSimilar(options: SimilarOptions = {}): Promise<Artist[]> {
    const {
      results = ECHONEST_CONFIG.defaultResults,
      start = 0,
      cache = true,
      buckets,
      limit,
      ...filters
    } = options;

    const similar = await this.cache.resolve('similar', cache, async () => {
      const params: RequestParams = { results, start };
      applyRangeFilters(params, filters);
      applyBuckets(params, { buckets, limit });
      const body = await this.getAttribute('similar', params);
      return requireArtists(body.artists, 'artists');
    });

    return similar.map((raw) => Artist.fromRaw(raw, this.gateway));
  }

  /**
   * The artist's id in another catalog, or null when the service knows none.
   * Cached under the id space itself, so each namespace is fetched once.
   */
  async getForeignId(
    idSpace: string = ECHONEST_CONFIG.defaultIdSpace,
    { cache = true }: CacheOption = {}
  ): Promise<string | null> {
    return this.foreignIds.resolve(idSpace, cache, async () => {
      const body = await this.getAttribute('profile', { bucket: [`id:${idSpace}`] });
      return findForeignId(requireArtist(body.artist, 'artist'), idSpace);
    });
  }

  toString(): string {
    return this.name ?? this.identifier;
  }

  toJSON(): { id: string; name: string | null } {
    return { id: this.identifier, name: this.name ?? null };
  }

  private async getDocuments(attribute: DocumentAttribute, options: LicensedListOptions): Promise<Result[]> {
    const { results = ECHONEST_CONFIG.defaultResults, start = 0, cache = true, license } = options;

    const documents = await this.cache.resolve(attribute, cache, async () => {
      const params: RequestParams = { results, start };
      if (license) {
        params.license = license;
      }
      const body = await this.getAttribute(attribute, params);
      return requireDocuments(body[attribute], attribute);
    });

    const kind = DOCUMENT_KINDS[attribute];
    return documents.map((document) => new Result(kind, document));
  }

  private identityParams(): RequestParams {
    return isArtistId(this.identifier) ? { id: this.identifier } : { name: this.identifier };
  }

  private async getAttribute(attribute: string, params: RequestParams = {}): Promise<EchoNestResponseBody> {
    console.log(`[EchoNest] Fetching artist/${attribute} for ${this.identifier}`);
    const envelope = await this.gateway.call(`artist/${attribute}`, {
      ...this.identityParams(),
      ...params,
    });
    return envelope.response;
  }

  /**
   * Take in raw fields: id and name become properties, known attributes
   * and foreign ids seed the caches, everything stays readable via rawField.
   */
  private absorb(fields: RawArtist): void {
    if (typeof fields.id === 'string' && fields.id) {
      this.identifier = fields.id;
    }
    if (typeof fields.name === 'string') {
      this.name = fields.name;
    }
    this.fields = { ...this.fields, ...fields };

    if (typeof fields.hotttnesss === 'number') {
      this.cache.set('hotttnesss', fields.hotttnesss);
    }
    if (typeof fields.familiarity === 'number') {
      this.cache.set('familiarity', fields.familiarity);
    }
    if (isRecord(fields.urls)) {
      this.cache.set('urls', fields.urls);
    }
    for (const attribute of DOCUMENT_ATTRIBUTES) {
      const value = fields[attribute];
      if (isDocumentList(value)) {
        this.cache.set(attribute, value);
      }
    }
    for (const [catalog, foreignId] of listForeignIds(fields)) {
      this.foreignIds.set(catalog, foreignId);
    }
  }
}
