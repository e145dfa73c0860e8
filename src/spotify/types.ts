// Wire shapes of the Spotify Web API, limited to the fields tracksift reads.

export interface SpotifyImage {
  url: string;
  height?: number | null;
  width?: number | null;
}

export interface SpotifyArtistRef {
  id: string;
  name: string;
}

export interface SpotifyArtist extends SpotifyArtistRef {
  genres?: string[];
}

export interface SpotifyAlbum {
  id: string;
  name: string;
  images?: SpotifyImage[];
  release_date?: string;
}

export interface SpotifyTrack {
  id: string | null;
  name: string;
  uri?: string;
  is_local?: boolean;
  artists: SpotifyArtistRef[];
  album: SpotifyAlbum;
}

export interface PlaylistTrackItem {
  added_at?: string;
  track: SpotifyTrack | null;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
  description?: string | null;
  images?: SpotifyImage[] | null;
  tracks?: { total: number };
}

export interface SpotifyUser {
  id: string;
  display_name: string | null;
}

export interface PagingResponse<T> {
  items: T[];
  limit: number;
  offset: number;
  total: number;
  next: string | null;
}

export interface ArtistsResponse {
  artists: Array<SpotifyArtist | null>;
}

export interface CreatePlaylistRequest {
  name: string;
  description?: string;
  public: boolean;
}
