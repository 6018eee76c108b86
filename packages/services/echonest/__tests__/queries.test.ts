// ABOUTME: Tests for the artist query functions and the EchoNestService facade.

import { describe, it, expect, beforeEach } from 'vitest';
import { Artist } from '../src/artist';
import { EchoNestError } from '../src/errors';
import { EchoNestService } from '../src/index';
import { search, similar, topHottt } from '../src/queries';
import { createMockGateway, envelope, okStatus } from './mocks';

const artistsResponse = {
  status: okStatus,
  artists: [
    { id: 'ARAAAAAAAAAAAAAAA1', name: 'Test Band One', hotttnesss: 0.71 },
    { id: 'ARAAAAAAAAAAAAAAA2', name: 'Test Band Two' },
    { id: 'ARAAAAAAAAAAAAAAA3', name: 'Test Band Three' },
  ],
};

describe('artist queries', () => {
  let gateway: ReturnType<typeof createMockGateway>;

  beforeEach(() => {
    gateway = createMockGateway({
      'artist/search': artistsResponse,
      'artist/top_hottt': artistsResponse,
      'artist/similar': artistsResponse,
    });
  });

  describe('search', () => {
    it('sends only the supplied arguments', async () => {
      const artists = await search({ name: 'the national', results: 5 }, gateway);

      expect(gateway.call).toHaveBeenCalledWith('artist/search', { name: 'the national', results: 5 });
      expect(artists).toHaveLength(3);
    });

    it('builds one artist per raw item', async () => {
      const artists = await search({ name: 'test band' }, gateway);

      expect(artists.every((a) => a instanceof Artist)).toBe(true);
      expect(artists.map((a) => a.id)).toEqual(['ARAAAAAAAAAAAAAAA1', 'ARAAAAAAAAAAAAAAA2', 'ARAAAAAAAAAAAAAAA3']);
      expect(artists[0].name).toBe('Test Band One');
      expect(artists[0].rawField('hotttnesss')).toBe(0.71);
    });

    it('defaults results to 15', async () => {
      await search({}, gateway);

      expect(gateway.call).toHaveBeenCalledWith('artist/search', { results: 15 });
    });

    it('sends boolean flags only when true, as "true"', async () => {
      await search({ name: 'test band', exact: true, soundsLike: false, limit: true, buckets: ['id:musicbrainz'] }, gateway);

      expect(gateway.call).toHaveBeenCalledWith('artist/search', {
        name: 'test band',
        results: 15,
        bucket: ['id:musicbrainz'],
        limit: 'true',
        exact: 'true',
      });
    });

    it('drops zero-valued filters and passes the rest unvalidated', async () => {
      await search(
        {
          description: 'indie',
          minFamiliarity: 0,
          maxFamiliarity: 0.3,
          minHotttnesss: 0.8,
          maxHotttnesss: 0.5,
          sort: 'hotttnesss-desc',
          soundsLike: true,
        },
        gateway
      );

      expect(gateway.call).toHaveBeenCalledWith('artist/search', {
        description: 'indie',
        results: 15,
        sounds_like: 'true',
        max_familiarity: 0.3,
        max_hotttnesss: 0.5,
        min_hotttnesss: 0.8,
        sort: 'hotttnesss-desc',
      });
    });

    it('propagates gateway failures unchanged', async () => {
      const failure = new EchoNestError('Invalid parameter', { serviceCode: 5 });
      gateway.call.mockRejectedValueOnce(failure);

      await expect(search({ name: 'test band' }, gateway)).rejects.toBe(failure);
    });

    it('fails when the response has no artists list', async () => {
      gateway.call.mockResolvedValueOnce(envelope({ status: okStatus }));

      await expect(search({ name: 'test band' }, gateway)).rejects.toThrow(EchoNestError);
    });

    it('fails when an entry carries neither id nor name', async () => {
      gateway.call.mockResolvedValueOnce(
        envelope({ status: okStatus, artists: [{ id: 'ARAAAAAAAAAAAAAAA1' }, { hotttnesss: 0.5 }] })
      );

      await expect(search({ name: 'test band' }, gateway)).rejects.toThrow(
        'Echo Nest API error: Malformed response: "artists" is missing or has the wrong shape'
      );
    });
  });

  describe('topHottt', () => {
    it('omits start when it is zero', async () => {
      await topHottt({}, gateway);

      expect(gateway.call).toHaveBeenCalledWith('artist/top_hottt', { results: 15 });
    });

    it('passes start, results and buckets through', async () => {
      const artists = await topHottt({ start: 10, results: 3, buckets: ['hotttnesss'], limit: false }, gateway);

      expect(gateway.call).toHaveBeenCalledWith('artist/top_hottt', {
        start: 10,
        results: 3,
        bucket: ['hotttnesss'],
      });
      expect(artists).toHaveLength(3);
    });
  });

  describe('similar', () => {
    it('normalizes a single id into a list', async () => {
      await similar({ ids: 'ARAAAAAAAAAAAAAAA1' }, gateway);
      await similar({ ids: ['ARAAAAAAAAAAAAAAA1'] }, gateway);

      const [first, second] = gateway.call.mock.calls;
      expect(first[1]).toEqual(second[1]);
      expect(first[1]).toEqual({ id: ['ARAAAAAAAAAAAAAAA1'], results: 15 });
    });

    it('normalizes names and keeps list order', async () => {
      await similar({ names: ['test band one', 'test band two'], ids: 'ARAAAAAAAAAAAAAAA3' }, gateway);

      expect(gateway.call).toHaveBeenCalledWith('artist/similar', {
        id: ['ARAAAAAAAAAAAAAAA3'],
        name: ['test band one', 'test band two'],
        results: 15,
      });
    });

    it('passes filters, paging and limit through', async () => {
      await similar(
        { names: 'test band', minHotttnesss: 0.4, maxFamiliarity: 0.8, start: 15, results: 30, limit: true },
        gateway
      );

      expect(gateway.call).toHaveBeenCalledWith('artist/similar', {
        name: ['test band'],
        max_familiarity: 0.8,
        min_hotttnesss: 0.4,
        start: 15,
        results: 30,
        limit: 'true',
      });
    });

    it('returns artists whose caches hold only the raw fields', async () => {
      const [first, second] = await similar({ names: 'test band' }, gateway);

      expect(first.isCached('hotttnesss')).toBe(true);
      expect(second.isCached('hotttnesss')).toBe(false);
      expect(second.isCached('similar')).toBe(false);
    });
  });
});

describe('EchoNestService', () => {
  it('binds every operation to one gateway', async () => {
    const gateway = createMockGateway({
      'artist/search': artistsResponse,
      'artist/hotttnesss': { status: okStatus, artist: { hotttnesss: 0.33 } },
    });
    const service = new EchoNestService({ gateway });

    const [found] = await service.search({ name: 'test band one', results: 1 });
    const hotttnesss = await service.artist('the national').getHotttnesss();

    expect(found.name).toBe('Test Band One');
    expect(hotttnesss).toBe(0.33);
    expect(gateway.call).toHaveBeenNthCalledWith(1, 'artist/search', { name: 'test band one', results: 1 });
    expect(gateway.call).toHaveBeenNthCalledWith(2, 'artist/hotttnesss', { name: 'the national' });
  });

  it('loads an artist profile', async () => {
    const gateway = createMockGateway({
      'artist/profile': { status: okStatus, artist: { id: 'ARAAAAAAAAAAAAAAA1', name: 'Test Band One' } },
    });
    const service = new EchoNestService({ gateway });

    const artist = await service.loadArtist('test band one');

    expect(artist.id).toBe('ARAAAAAAAAAAAAAAA1');
    expect(artist.name).toBe('Test Band One');
  });
});
