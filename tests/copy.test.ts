import { beforeAll, describe, expect, it, vi } from "vitest";
import { allOf, genreFilter, yearRangeFilter } from "../src/domain/filters";
import type { Playlist } from "../src/domain/playlist";
import { setLogLevel } from "../src/lib/logger";
import { copyFilteredTracks, selectTracks } from "../src/services/copy";
import type { PlaylistService } from "../src/spotify/playlists";
import { makeTrack } from "./helpers";

const target: Playlist = { id: "p-new", name: "rock", description: "", imageUrl: "", trackCount: 0 };

function fakePlaylists(created = true) {
  const getOrCreatePlaylist = vi.fn(async (_name: string, _description?: string, _signal?: AbortSignal) => ({
    playlist: target,
    created,
  }));
  const addTracksToPlaylist = vi.fn(
    async (_id: string, uris: readonly string[], _signal?: AbortSignal) => uris.length
  );
  const service: PlaylistService = {
    getUserPlaylists: vi.fn(async () => []),
    getPlaylist: vi.fn(async () => target),
    createPlaylist: vi.fn(async () => target),
    addTracksToPlaylist,
    findPlaylistByName: vi.fn(async () => null),
    getOrCreatePlaylist,
  };
  return { service, getOrCreatePlaylist, addTracksToPlaylist };
}

const tracks = [
  makeTrack({ id: "t1", genre: "rock" }),
  makeTrack({ id: "t2", genre: "pop" }),
  makeTrack({ id: "t3", genre: "Rock" }),
  makeTrack({ id: "t1", genre: "rock" }),
];

describe("copy filtered tracks", () => {
  beforeAll(() => {
    setLogLevel("silent");
  });

  it("selects matching tracks once each, in order", () => {
    expect(selectTracks(tracks, allOf([genreFilter("rock")])).map((t) => t.id)).toEqual(["t1", "t3"]);
  });

  it("copies matches into the suggested playlist", async () => {
    const playlists = fakePlaylists();

    const result = await copyFilteredTracks({
      playlists: playlists.service,
      tracks,
      filter: allOf([genreFilter("rock")]),
    });

    expect(playlists.getOrCreatePlaylist).toHaveBeenCalledWith("rock", "Filtered by Genre: rock", undefined);
    expect(playlists.addTracksToPlaylist).toHaveBeenCalledWith(
      "p-new",
      ["spotify:track:t1", "spotify:track:t3"],
      undefined
    );
    expect(result).toMatchObject({ created: true, copied: 2 });
    expect(result.playlist?.id).toBe("p-new");
  });

  it("uses an explicit playlist name", async () => {
    const playlists = fakePlaylists(false);

    const result = await copyFilteredTracks({
      playlists: playlists.service,
      tracks,
      filter: allOf([genreFilter("rock")]),
      playlistName: "  Guitars  ",
    });

    expect(playlists.getOrCreatePlaylist.mock.calls[0]?.[0]).toBe("Guitars");
    expect(result.created).toBe(false);
  });

  it("touches no playlist when nothing matches", async () => {
    const playlists = fakePlaylists();

    const result = await copyFilteredTracks({
      playlists: playlists.service,
      tracks,
      filter: allOf([yearRangeFilter(2020)]),
    });

    expect(result).toEqual({ playlist: null, created: false, matched: [], copied: 0 });
    expect(playlists.getOrCreatePlaylist).not.toHaveBeenCalled();
  });

  it("only reports matches on a dry run", async () => {
    const playlists = fakePlaylists();

    const result = await copyFilteredTracks({
      playlists: playlists.service,
      tracks,
      filter: allOf([genreFilter("pop")]),
      dryRun: true,
    });

    expect(result.matched.map((t) => t.id)).toEqual(["t2"]);
    expect(result.copied).toBe(0);
    expect(playlists.addTracksToPlaylist).not.toHaveBeenCalled();
  });
});
