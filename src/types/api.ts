/**
 * Web API resource shapes used for request routing and output
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface UserProfile {
  id: string;
  display_name: string | null;
  country?: string;
  product?: string;
}

export interface PlaylistOwner {
  id: string;
  display_name?: string | null;
}

export interface Playlist {
  id: string;
  name: string;
  owner: PlaylistOwner;
  public: boolean | null;
  collaborative: boolean;
  tracks: { total: number };
  snapshot_id?: string;
}

export interface Paging<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  next: string | null;
}

export interface ArtistRef {
  id: string;
  name: string;
}

export interface Album {
  id: string;
  name: string;
  artists: ArtistRef[];
  total_tracks: number;
  release_date?: string;
}

export interface SavedAlbum {
  added_at: string | null;
  album: Album;
}

export interface Artist {
  id: string;
  name: string;
  genres: string[];
  followers: { total: number };
}

/**
 * Cursor-based page (followed artists)
 */
export interface CursorPaging<T> {
  items: T[];
  total: number;
  limit: number;
  next: string | null;
  cursors: { after: string | null };
}
