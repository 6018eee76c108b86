// ABOUTME: Echo Nest v4 response shapes for the artist endpoints.
// ABOUTME: Only the paths the client navigates are typed; everything else stays raw.

/** A value the gateway can put on the query string */
export type ParamValue = string | number | readonly string[];

/** Ordered request parameters; insertion order is the wire order */
export type RequestParams = Record<string, ParamValue>;

/** One document (audio, biography, blog, image, news, review, video) */
export type RawDocument = Record<string, unknown>;

/** The `urls` structure: link kind to URL, e.g. `{ lastfm_url: '...' }` */
export type RawUrls = Record<string, unknown>;

/**
 * An artist structure as returned by search, similar, top_hottt and profile.
 * Carries `id` and `name` plus whatever buckets were requested
 * (`hotttnesss`, `familiarity`, `foreign_ids`, document lists...).
 */
export type RawArtist = Record<string, unknown>;

export interface EchoNestStatus {
  code: number;
  message: string;
  version?: string;
}

/** The body found under the top-level `response` key */
export interface EchoNestResponseBody {
  status?: EchoNestStatus;
  artist?: RawArtist;
  artists?: RawArtist[];
  audio?: RawDocument[];
  biographies?: RawDocument[];
  blogs?: RawDocument[];
  images?: RawDocument[];
  news?: RawDocument[];
  reviews?: RawDocument[];
  video?: RawDocument[];
  urls?: RawUrls;
  start?: number;
  total?: number;
  [field: string]: unknown;
}

/** Decoded JSON of every Echo Nest call */
export interface EchoNestEnvelope {
  response: EchoNestResponseBody;
}
