/**
 * Music Library Client
 * Profile, playlist, saved-album and followed-artist operations on top of the request executor.
 */

import type {
  Album,
  Artist,
  ArtistRef,
  CursorPaging,
  Paging,
  Playlist,
  PlaylistOwner,
  SavedAlbum,
  UserProfile,
} from '../types/api.js';
import type { ResilientRequestExecutor } from './executor.js';
import { BatchOrchestrator, failed, succeeded, type BatchItemResult, type BatchOptions } from './batch.js';
import { ApiError, UnexpectedError } from '../lib/errors.js';

export const PAGE_SIZE = 50;
/** Ids accepted by one DELETE /me/albums call */
export const ALBUM_REMOVE_LIMIT = 20;
/** Ids accepted by one DELETE /me/following call */
export const ARTIST_UNFOLLOW_LIMIT = 50;

export type ResourceKind = 'playlist' | 'album' | 'artist';

const ID_PATTERN = /^[0-9A-Za-z]{22}$/;

/**
 * Base62, 22 characters
 */
export function isValidId(id: string): boolean {
  return ID_PATTERN.test(id);
}

/**
 * Accepts a bare id, a `spotify:<kind>:<id>` URI or an open.spotify.com link
 */
export function normalizeId(input: string, kind: ResourceKind): string {
  const trimmed = input.trim();
  const uri = new RegExp(`^spotify:${kind}:([^:]+)$`).exec(trimmed);
  if (uri) {
    return uri[1];
  }
  const link = new RegExp(`^https?://open\\.spotify\\.com/${kind}/([^/?#]+)`).exec(trimmed);
  if (link) {
    return link[1];
  }
  return trimmed;
}

function invalidId(kind: ResourceKind, id: string): ApiError {
  return new ApiError(400, `Invalid ${kind} id: ${id}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(what: string): ApiError {
  return new ApiError(502, `Unexpected ${what} response from the Web API`);
}

export function parseUserProfile(data: unknown): UserProfile {
  if (!isRecord(data) || typeof data.id !== 'string') {
    throw malformed('profile');
  }
  return {
    id: data.id,
    display_name: typeof data.display_name === 'string' ? data.display_name : null,
    country: typeof data.country === 'string' ? data.country : undefined,
    product: typeof data.product === 'string' ? data.product : undefined,
  };
}

function parseOwner(data: unknown): PlaylistOwner {
  if (!isRecord(data) || typeof data.id !== 'string') {
    return { id: '', display_name: null };
  }
  return {
    id: data.id,
    display_name: typeof data.display_name === 'string' ? data.display_name : null,
  };
}

export function parsePlaylist(data: unknown): Playlist {
  if (!isRecord(data) || typeof data.id !== 'string' || typeof data.name !== 'string') {
    throw malformed('playlist');
  }
  const tracks = isRecord(data.tracks) && typeof data.tracks.total === 'number' ? data.tracks.total : 0;
  return {
    id: data.id,
    name: data.name,
    owner: parseOwner(data.owner),
    public: typeof data.public === 'boolean' ? data.public : null,
    collaborative: data.collaborative === true,
    tracks: { total: tracks },
    snapshot_id: typeof data.snapshot_id === 'string' ? data.snapshot_id : undefined,
  };
}

function parseArtistRefs(data: unknown): ArtistRef[] {
  if (!Array.isArray(data)) {
    return [];
  }
  return data.flatMap((item: unknown) =>
    isRecord(item) && typeof item.id === 'string' && typeof item.name === 'string'
      ? [{ id: item.id, name: item.name }]
      : []
  );
}

export function parseAlbum(data: unknown): Album {
  if (!isRecord(data) || typeof data.id !== 'string' || typeof data.name !== 'string') {
    throw malformed('album');
  }
  return {
    id: data.id,
    name: data.name,
    artists: parseArtistRefs(data.artists),
    total_tracks: typeof data.total_tracks === 'number' ? data.total_tracks : 0,
    release_date: typeof data.release_date === 'string' ? data.release_date : undefined,
  };
}

export function parseSavedAlbum(data: unknown): SavedAlbum {
  if (!isRecord(data)) {
    throw malformed('saved album');
  }
  return {
    added_at: typeof data.added_at === 'string' ? data.added_at : null,
    album: parseAlbum(data.album),
  };
}

export function parseArtist(data: unknown): Artist {
  if (!isRecord(data) || typeof data.id !== 'string' || typeof data.name !== 'string') {
    throw malformed('artist');
  }
  const genres = Array.isArray(data.genres)
    ? data.genres.filter((genre: unknown): genre is string => typeof genre === 'string')
    : [];
  const followers = isRecord(data.followers) && typeof data.followers.total === 'number' ? data.followers.total : 0;
  return { id: data.id, name: data.name, genres, followers: { total: followers } };
}

function parseOffsetPage<T>(data: unknown, parseItem: (item: unknown) => T, what: string): Paging<T> {
  if (!isRecord(data) || !Array.isArray(data.items)) {
    throw malformed(what);
  }
  // Deleted resources come back as null entries.
  const items = data.items.filter((item: unknown) => item !== null).map(parseItem);
  return {
    items,
    total: typeof data.total === 'number' ? data.total : items.length,
    limit: typeof data.limit === 'number' ? data.limit : items.length,
    offset: typeof data.offset === 'number' ? data.offset : 0,
    next: typeof data.next === 'string' ? data.next : null,
  };
}

export function parsePlaylistPage(data: unknown): Paging<Playlist> {
  return parseOffsetPage(data, parsePlaylist, 'playlist page');
}

export function parseSavedAlbumPage(data: unknown): Paging<SavedAlbum> {
  return parseOffsetPage(data, parseSavedAlbum, 'saved album page');
}

/**
 * `GET /me/following` wraps its cursor page in an `artists` object
 */
export function parseFollowedArtistPage(data: unknown): CursorPaging<Artist> {
  const page = isRecord(data) ? data.artists : undefined;
  if (!isRecord(page) || !Array.isArray(page.items)) {
    throw malformed('followed artists page');
  }
  const items = page.items.filter((item: unknown) => item !== null).map(parseArtist);
  const after = isRecord(page.cursors) && typeof page.cursors.after === 'string' ? page.cursors.after : null;
  return {
    items,
    total: typeof page.total === 'number' ? page.total : items.length,
    limit: typeof page.limit === 'number' ? page.limit : items.length,
    next: typeof page.next === 'string' ? page.next : null,
    cursors: { after },
  };
}

export interface ListOptions {
  /** Stop after this many items */
  limit?: number;
  signal?: AbortSignal;
}

export type RemovalOptions = Omit<BatchOptions<unknown>, 'getId'>;

interface IndexedId {
  id: string;
  index: number;
}

export class MusicLibraryClient {
  private executor: ResilientRequestExecutor;
  private batch: BatchOrchestrator;

  constructor(executor: ResilientRequestExecutor, batch: BatchOrchestrator = new BatchOrchestrator()) {
    this.executor = executor;
    this.batch = batch;
  }

  async getCurrentUser(signal?: AbortSignal): Promise<UserProfile> {
    return this.executor.request({ method: 'GET', path: '/me' }, parseUserProfile, { signal });
  }

  /**
   * Walk the current user's playlists page by page
   */
  async listPlaylists(options: ListOptions = {}): Promise<Playlist[]> {
    return this.collectOffsetPages('/me/playlists', parsePlaylistPage, options);
  }

  async unfollowPlaylist(playlistId: string, signal?: AbortSignal): Promise<void> {
    if (!isValidId(playlistId)) {
      throw invalidId('playlist', playlistId);
    }
    await this.executor.execute(
      { method: 'DELETE', path: `/playlists/${playlistId}/followers` },
      { signal }
    );
  }

  /**
   * Unfollow many playlists; one result per id, in input order
   */
  async removePlaylists(
    playlistIds: readonly string[],
    options: RemovalOptions = {}
  ): Promise<BatchItemResult<void>[]> {
    return this.batch.run(
      playlistIds,
      (id, context) => this.unfollowPlaylist(id, context.signal),
      { ...options, getId: (id) => id }
    );
  }

  async listSavedAlbums(options: ListOptions = {}): Promise<SavedAlbum[]> {
    return this.collectOffsetPages('/me/albums', parseSavedAlbumPage, options);
  }

  /**
   * Remove albums from the library, ALBUM_REMOVE_LIMIT ids per request.
   * Every id in a request shares that request's outcome.
   */
  async removeSavedAlbums(albumIds: readonly string[], options: RemovalOptions = {}): Promise<BatchItemResult<void>[]> {
    return this.removeInGroups('album', albumIds, ALBUM_REMOVE_LIMIT, options, async (ids, signal) => {
      await this.executor.execute({ method: 'DELETE', path: '/me/albums', query: { ids: ids.join(',') } }, { signal });
    });
  }

  /**
   * Walk followed artists with the `after` cursor
   */
  async listFollowedArtists(options: ListOptions = {}): Promise<Artist[]> {
    const max = options.limit ?? Number.POSITIVE_INFINITY;
    const artists: Artist[] = [];
    let after: string | undefined;

    while (artists.length < max) {
      const page = await this.executor.request(
        { method: 'GET', path: '/me/following', query: { type: 'artist', limit: PAGE_SIZE, after } },
        parseFollowedArtistPage,
        { signal: options.signal }
      );

      artists.push(...page.items);

      if (page.next === null || page.cursors.after === null || page.items.length === 0) {
        break;
      }
      after = page.cursors.after;
    }

    return artists.slice(0, max);
  }

  async unfollowArtists(artistIds: readonly string[], options: RemovalOptions = {}): Promise<BatchItemResult<void>[]> {
    return this.removeInGroups('artist', artistIds, ARTIST_UNFOLLOW_LIMIT, options, async (ids, signal) => {
      await this.executor.execute(
        { method: 'DELETE', path: '/me/following', query: { type: 'artist', ids: ids.join(',') } },
        { signal }
      );
    });
  }

  private async collectOffsetPages<T>(
    path: string,
    parsePage: (data: unknown) => Paging<T>,
    options: ListOptions
  ): Promise<T[]> {
    const max = options.limit ?? Number.POSITIVE_INFINITY;
    const collected: T[] = [];
    let offset = 0;

    while (collected.length < max) {
      const page = await this.executor.request(
        { method: 'GET', path, query: { limit: PAGE_SIZE, offset } },
        parsePage,
        { signal: options.signal }
      );

      collected.push(...page.items);
      offset += PAGE_SIZE;

      if (page.next === null || page.items.length === 0 || offset >= page.total) {
        break;
      }
    }

    return collected.slice(0, max);
  }

  /**
   * Invalid ids fail on their own without a request; valid ids are sent in
   * groups of `groupSize`, one batch item per group, and results are reported per id.
   */
  private async removeInGroups(
    kind: ResourceKind,
    ids: readonly string[],
    groupSize: number,
    options: RemovalOptions,
    send: (ids: string[], signal?: AbortSignal) => Promise<void>
  ): Promise<BatchItemResult<void>[]> {
    const results: BatchItemResult<void>[] = [];
    const valid: IndexedId[] = [];

    ids.forEach((id, index) => {
      if (isValidId(id)) {
        valid.push({ id, index });
      } else {
        results.push(failed<void>(id, index, invalidId(kind, id)));
      }
    });

    const groups: IndexedId[][] = [];
    for (let start = 0; start < valid.length; start += groupSize) {
      groups.push(valid.slice(start, start + groupSize));
    }

    const groupResults = await this.batch.run(
      groups,
      (group, context) => send(group.map((member) => member.id), context.signal),
      { ...options, getId: (group) => group.map((member) => member.id).join(',') }
    );

    groupResults.forEach((groupResult, groupIndex) => {
      for (const member of groups[groupIndex]) {
        results.push(
          groupResult.succeeded
            ? succeeded<void>(member.id, member.index, undefined)
            : failed<void>(member.id, member.index, groupResult.error ?? new UnexpectedError(`Request for ${groupResult.itemId} failed`))
        );
      }
    });

    return results.sort((a, b) => a.index - b.index);
  }
}
