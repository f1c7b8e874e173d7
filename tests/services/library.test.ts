import { describe, it, expect, beforeEach } from 'vitest';
import {
  ALBUM_REMOVE_LIMIT,
  MusicLibraryClient,
  isValidId,
  normalizeId,
  parseFollowedArtistPage,
  parsePlaylist,
  parsePlaylistPage,
  parseSavedAlbum,
  parseUserProfile,
} from '../../src/services/library.js';
import { ResilientRequestExecutor } from '../../src/services/executor.js';
import { TokenAuthority } from '../../src/services/token-authority.js';
import { TokenEndpoint } from '../../src/services/token-endpoint.js';
import { MemoryCredentialStore } from '../../src/services/credential-store.js';
import { RateLimitTracker } from '../../src/services/rate-limit-tracker.js';
import { BatchOrchestrator } from '../../src/services/batch.js';
import { ApiError } from '../../src/lib/errors.js';
import { FakeTransport, jsonResponse } from '../helpers/fake-transport.js';

const PLAYLIST_A = 'a'.repeat(22);
const PLAYLIST_B = 'B'.repeat(22);

function albumId(n: number): string {
  return `al${String(n).padStart(20, '0')}`;
}

function artistJson(id: string, name: string): Record<string, unknown> {
  return { id, name, genres: ['jazz'], followers: { total: 5 }, popularity: 40 };
}

function playlistJson(index: number): Record<string, unknown> {
  return {
    id: `pl${String(index).padStart(20, '0')}`,
    name: `Playlist ${index}`,
    owner: { id: 'user-1', display_name: 'Sam' },
    public: true,
    collaborative: false,
    tracks: { total: index },
  };
}

function page(from: number, count: number, total: number, next: string | null): Record<string, unknown> {
  return {
    items: Array.from({ length: count }, (_, i) => playlistJson(from + i)),
    total,
    limit: 50,
    offset: from,
    next,
  };
}

describe('MusicLibraryClient', () => {
  let api: FakeTransport;
  let client: MusicLibraryClient;

  beforeEach(() => {
    api = new FakeTransport();
    const accounts = new FakeTransport();
    const store = new MemoryCredentialStore({ accessToken: 'a1', refreshToken: 'r1', expiresAt: Date.now() + 3_600_000 });
    const executor = new ResilientRequestExecutor({
      baseUrl: 'https://api.test/v1',
      transport: api,
      credentials: new TokenAuthority({
        store,
        endpoint: new TokenEndpoint({ clientId: 'test-client', accountsBaseUrl: 'https://accounts.test', transport: accounts }),
      }),
      tracker: new RateLimitTracker(),
    });
    client = new MusicLibraryClient(executor, new BatchOrchestrator({ batchDelayMs: 0 }));
  });

  describe('getCurrentUser', () => {
    it('should fetch the profile', async () => {
      api.enqueue(jsonResponse(200, { id: 'user-1', display_name: 'Sam', product: 'premium' }));

      const user = await client.getCurrentUser();

      expect(user).toEqual({ id: 'user-1', display_name: 'Sam', country: undefined, product: 'premium' });
      expect(api.requests[0]).toMatchObject({ method: 'GET', url: 'https://api.test/v1/me' });
    });

    it('should reject a malformed profile', async () => {
      api.enqueue(jsonResponse(200, { display_name: 'No id' }));

      await expect(client.getCurrentUser()).rejects.toThrow('Unexpected profile response from the Web API');
    });
  });

  describe('listPlaylists', () => {
    it('should walk every page', async () => {
      api.enqueue(
        jsonResponse(200, page(0, 50, 60, 'https://api.test/v1/me/playlists?offset=50&limit=50')),
        jsonResponse(200, page(50, 10, 60, null))
      );

      const playlists = await client.listPlaylists();

      expect(playlists).toHaveLength(60);
      expect(playlists[59].name).toBe('Playlist 59');
      expect(api.requests.map((r) => r.query)).toEqual([
        { limit: 50, offset: 0 },
        { limit: 50, offset: 50 },
      ]);
    });

    it('should stop once the limit is reached', async () => {
      api.enqueue(jsonResponse(200, page(0, 50, 200, 'https://api.test/v1/me/playlists?offset=50&limit=50')));

      const playlists = await client.listPlaylists({ limit: 5 });

      expect(playlists.map((p) => p.name)).toEqual(['Playlist 0', 'Playlist 1', 'Playlist 2', 'Playlist 3', 'Playlist 4']);
      expect(api.requests).toHaveLength(1);
    });

    it('should skip deleted playlists', async () => {
      api.enqueue(jsonResponse(200, { items: [null, playlistJson(1)], total: 2, limit: 50, offset: 0, next: null }));

      const playlists = await client.listPlaylists();

      expect(playlists.map((p) => p.name)).toEqual(['Playlist 1']);
    });

    it('should return an empty list for an empty library', async () => {
      api.enqueue(jsonResponse(200, { items: [], total: 0, limit: 50, offset: 0, next: null }));

      await expect(client.listPlaylists()).resolves.toEqual([]);
    });
  });

  describe('unfollowPlaylist', () => {
    it('should delete the follow', async () => {
      api.enqueue(jsonResponse(200, ''));

      await client.unfollowPlaylist(PLAYLIST_A);

      expect(api.requests[0]).toMatchObject({
        method: 'DELETE',
        url: `https://api.test/v1/playlists/${PLAYLIST_A}/followers`,
      });
    });

    it('should refuse an invalid id without a request', async () => {
      await expect(client.unfollowPlaylist('not-an-id')).rejects.toThrow('Invalid playlist id: not-an-id');
      expect(api.requests).toHaveLength(0);
    });
  });

  describe('removePlaylists', () => {
    it('should report every id in order', async () => {
      api.enqueue(jsonResponse(200, ''), jsonResponse(404, { error: { status: 404, message: 'Non existing id' } }));

      const results = await client.removePlaylists([PLAYLIST_A, 'bad', PLAYLIST_B]);

      expect(results.map((r) => [r.itemId, r.succeeded])).toEqual([
        [PLAYLIST_A, true],
        ['bad', false],
        [PLAYLIST_B, false],
      ]);
      expect(results[1].error?.message).toBe('Invalid playlist id: bad');
      expect(results[2].error).toBeInstanceOf(ApiError);
      expect(results[2].error?.message).toBe('Non existing id');
      expect(api.requests.map((r) => r.url)).toEqual([
        `https://api.test/v1/playlists/${PLAYLIST_A}/followers`,
        `https://api.test/v1/playlists/${PLAYLIST_B}/followers`,
      ]);
    });
  });
});

describe('MusicLibraryClient saved albums and followed artists', () => {
  let api: FakeTransport;
  let client: MusicLibraryClient;

  beforeEach(() => {
    api = new FakeTransport();
    const store = new MemoryCredentialStore({ accessToken: 'a1', refreshToken: 'r1', expiresAt: Date.now() + 3_600_000 });
    const executor = new ResilientRequestExecutor({
      baseUrl: 'https://api.test/v1',
      transport: api,
      credentials: new TokenAuthority({
        store,
        endpoint: new TokenEndpoint({
          clientId: 'test-client',
          accountsBaseUrl: 'https://accounts.test',
          transport: new FakeTransport(),
        }),
      }),
      tracker: new RateLimitTracker(),
    });
    client = new MusicLibraryClient(executor, new BatchOrchestrator({ batchDelayMs: 0 }));
  });

  describe('listSavedAlbums', () => {
    it('should page through /me/albums and skip null entries', async () => {
      api.enqueue(
        jsonResponse(200, {
          items: [
            {
              added_at: '2024-05-01T10:00:00Z',
              album: {
                id: albumId(1),
                name: 'Blue',
                artists: [{ id: 'ar1', name: 'Band' }],
                total_tracks: 9,
                release_date: '2020-01-01',
              },
            },
            null,
          ],
          total: 1,
          limit: 50,
          offset: 0,
          next: null,
        })
      );

      const albums = await client.listSavedAlbums();

      expect(albums).toEqual([
        {
          added_at: '2024-05-01T10:00:00Z',
          album: {
            id: albumId(1),
            name: 'Blue',
            artists: [{ id: 'ar1', name: 'Band' }],
            total_tracks: 9,
            release_date: '2020-01-01',
          },
        },
      ]);
      expect(api.requests[0]).toMatchObject({
        method: 'GET',
        url: 'https://api.test/v1/me/albums',
        query: { limit: 50, offset: 0 },
      });
    });
  });

  describe('removeSavedAlbums', () => {
    it('should send ids in groups of twenty and report each id in input order', async () => {
      const first = Array.from({ length: ALBUM_REMOVE_LIMIT }, (_, i) => albumId(i));
      const last = albumId(ALBUM_REMOVE_LIMIT);
      api.enqueue(jsonResponse(200, ''), jsonResponse(404, { error: { status: 404, message: 'Non existing id' } }));

      const results = await client.removeSavedAlbums([...first, 'bad', last], { maxConcurrency: 1 });

      expect(results).toHaveLength(22);
      expect(results.map((r) => r.index)).toEqual(Array.from({ length: 22 }, (_, i) => i));
      expect(results.slice(0, 20).every((r) => r.succeeded)).toBe(true);
      expect(results[20]).toMatchObject({ itemId: 'bad', succeeded: false });
      expect(results[20].error?.message).toBe('Invalid album id: bad');
      expect(results[21]).toMatchObject({ itemId: last, succeeded: false });
      expect(results[21].error).toBeInstanceOf(ApiError);
      expect(results[21].error?.message).toBe('Non existing id');
      expect(api.requests.map((r) => [r.method, r.url, r.query])).toEqual([
        ['DELETE', 'https://api.test/v1/me/albums', { ids: first.join(',') }],
        ['DELETE', 'https://api.test/v1/me/albums', { ids: last }],
      ]);
    });

    it('should not send anything when every id is invalid', async () => {
      const results = await client.removeSavedAlbums(['x', 'y']);

      expect(results.map((r) => r.error?.message)).toEqual(['Invalid album id: x', 'Invalid album id: y']);
      expect(api.requests).toHaveLength(0);
    });
  });

  describe('listFollowedArtists', () => {
    it('should follow the after cursor', async () => {
      api.enqueue(
        jsonResponse(200, {
          artists: {
            items: [artistJson('r1', 'First')],
            next: 'https://api.test/v1/me/following?type=artist&after=r1',
            cursors: { after: 'r1' },
            total: 2,
            limit: 50,
          },
        }),
        jsonResponse(200, {
          artists: { items: [artistJson('r2', 'Second')], next: null, cursors: { after: null }, total: 2, limit: 50 },
        })
      );

      const artists = await client.listFollowedArtists();

      expect(artists).toEqual([
        { id: 'r1', name: 'First', genres: ['jazz'], followers: { total: 5 } },
        { id: 'r2', name: 'Second', genres: ['jazz'], followers: { total: 5 } },
      ]);
      expect(api.requests.map((r) => r.query)).toEqual([
        { type: 'artist', limit: 50, after: undefined },
        { type: 'artist', limit: 50, after: 'r1' },
      ]);
    });

    it('should stop once the limit is reached', async () => {
      api.enqueue(
        jsonResponse(200, {
          artists: {
            items: [artistJson('r1', 'First'), artistJson('r2', 'Second')],
            next: 'https://api.test/v1/me/following?type=artist&after=r2',
            cursors: { after: 'r2' },
            total: 9,
            limit: 50,
          },
        })
      );

      const artists = await client.listFollowedArtists({ limit: 1 });

      expect(artists.map((a) => a.name)).toEqual(['First']);
      expect(api.requests).toHaveLength(1);
    });
  });

  describe('unfollowArtists', () => {
    it('should unfollow a group of artists in one request', async () => {
      const ids = [albumId(1), albumId(2)];
      api.enqueue(jsonResponse(200, ''));

      const results = await client.unfollowArtists(ids);

      expect(results.map((r) => [r.itemId, r.succeeded])).toEqual([
        [ids[0], true],
        [ids[1], true],
      ]);
      expect(api.requests).toHaveLength(1);
      expect(api.requests[0]).toMatchObject({
        method: 'DELETE',
        url: 'https://api.test/v1/me/following',
        query: { type: 'artist', ids: ids.join(',') },
      });
    });
  });
});

describe('resource ids', () => {
  it('should accept 22 base62 characters', () => {
    expect(isValidId('37i9dQZF1DXcBWIGoYBM5M')).toBe(true);
    expect(isValidId('short')).toBe(false);
    expect(isValidId('37i9dQZF1DXcBWIGoYBM5-')).toBe(false);
  });

  it('should extract ids from URIs and links', () => {
    expect(normalizeId('spotify:playlist:37i9dQZF1DXcBWIGoYBM5M', 'playlist')).toBe('37i9dQZF1DXcBWIGoYBM5M');
    expect(normalizeId('https://open.spotify.com/playlist/37i9dQZF1DXcBWIGoYBM5M?si=abc', 'playlist')).toBe(
      '37i9dQZF1DXcBWIGoYBM5M'
    );
    expect(normalizeId(' 37i9dQZF1DXcBWIGoYBM5M ', 'playlist')).toBe('37i9dQZF1DXcBWIGoYBM5M');
  });

  it('should only unwrap URIs of the requested kind', () => {
    expect(normalizeId('spotify:album:4aawyAB9vmqN3uQ7FjRGTy', 'album')).toBe('4aawyAB9vmqN3uQ7FjRGTy');
    expect(normalizeId('https://open.spotify.com/artist/0OdUWJ0sBjDrqHygGUXeCF', 'artist')).toBe(
      '0OdUWJ0sBjDrqHygGUXeCF'
    );
    expect(normalizeId('spotify:album:4aawyAB9vmqN3uQ7FjRGTy', 'artist')).toBe('spotify:album:4aawyAB9vmqN3uQ7FjRGTy');
  });
});

describe('response parsers', () => {
  it('should default optional playlist fields', () => {
    expect(parsePlaylist({ id: 'p', name: 'n' })).toEqual({
      id: 'p',
      name: 'n',
      owner: { id: '', display_name: null },
      public: null,
      collaborative: false,
      tracks: { total: 0 },
      snapshot_id: undefined,
    });
  });

  it('should reject a page without items', () => {
    expect(() => parsePlaylistPage({ total: 3 })).toThrow('Unexpected playlist page response from the Web API');
  });

  it('should reject a saved album without an album', () => {
    expect(() => parseSavedAlbum({ added_at: '2024-01-01T00:00:00Z' })).toThrow(
      'Unexpected album response from the Web API'
    );
  });

  it('should reject a followed-artists body without the artists wrapper', () => {
    expect(() => parseFollowedArtistPage({ items: [] })).toThrow(
      'Unexpected followed artists page response from the Web API'
    );
  });

  it('should default a missing display name to null', () => {
    expect(parseUserProfile({ id: 'user-1' }).display_name).toBeNull();
  });
});
