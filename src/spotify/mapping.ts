import type { Playlist } from "../domain/playlist";
import {
  EMPTY_AUDIO_FEATURES,
  UNKNOWN_GENRE,
  type AudioFeatures,
  type Track,
} from "../domain/track";
import type { EnrichmentTrack } from "../enrichment/orchestrator";
import type { SpotifyImage, SpotifyPlaylist, SpotifyTrack } from "./types";

export type PlayableTrack = SpotifyTrack & { id: string };

export type TrackView = EnrichmentTrack & { dto: PlayableTrack };

function firstImageUrl(images: SpotifyImage[] | null | undefined): string {
  return images?.[0]?.url ?? "";
}

export function isPlayableTrack(track: SpotifyTrack | null): track is PlayableTrack {
  return Boolean(track && track.id && track.is_local !== true);
}

export function toTrackView(dto: PlayableTrack): TrackView {
  return {
    id: dto.id,
    primaryArtistId: dto.artists[0]?.id ?? "",
    genre: "",
    dto,
  };
}

export function mapTrack(
  dto: PlayableTrack,
  genre: string,
  features: AudioFeatures | undefined
): Track {
  return {
    id: dto.id,
    name: dto.name,
    artists: dto.artists.map((a) => ({ id: a.id, name: a.name })),
    album: {
      id: dto.album.id,
      name: dto.album.name,
      imageUrl: firstImageUrl(dto.album.images),
      releaseDate: dto.album.release_date ?? "",
    },
    genre: genre || UNKNOWN_GENRE,
    ...EMPTY_AUDIO_FEATURES,
    ...features,
  };
}

export function mapPlaylist(dto: SpotifyPlaylist): Playlist {
  return {
    id: dto.id,
    name: dto.name,
    description: dto.description ?? "",
    imageUrl: firstImageUrl(dto.images),
    trackCount: dto.tracks?.total ?? 0,
  };
}
