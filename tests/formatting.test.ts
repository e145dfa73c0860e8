import { describe, expect, it } from "vitest";
import {
  formatGroups,
  formatPlaylists,
  formatTrackLine,
  formatTracksAsJson,
  normalizeFormat,
} from "../src/formatting";
import { features, makeTrack } from "./helpers";

describe("formatting", () => {
  it("accepts text and json formats only", () => {
    expect(normalizeFormat(undefined)).toBe("text");
    expect(normalizeFormat("JSON")).toBe("json");
    expect(() => normalizeFormat("csv")).toThrow("Only --format text or --format json is supported.");
  });

  it("formats a track line with and without audio features", () => {
    const bare = makeTrack({ name: "Alpha" });
    expect(formatTrackLine(bare, 0)).toBe("  1. Alpha - Artist (Album, 1999) {rock}");

    const enriched = makeTrack({ name: "Beta", ...features({ valence: 0.8, energy: 0.9, tempo: 127.6 }) });
    expect(formatTrackLine(enriched, 1)).toBe(
      "  2. Beta - Artist (Album, 1999) {rock} [Upbeat/Happy, 128 BPM]"
    );
  });

  it("formats groups with counts", () => {
    const groups = new Map([["rock", [makeTrack({ name: "Alpha" })]]]);
    expect(formatGroups(groups)).toBe("rock (1)\n  1. Alpha - Artist (Album, 1999) {rock}");
  });

  it("lists playlists", () => {
    expect(formatPlaylists([])).toBe("No playlists found.");
    expect(
      formatPlaylists([{ id: "p1", name: "Focus", description: "", imageUrl: "", trackCount: 3 }])
    ).toBe("1 playlists:\n  1. Focus (3 tracks) [p1]");
  });

  it("renders tracks and group ids as JSON", () => {
    const track = makeTrack({ id: "t1", ...features({ valence: 0.8, energy: 0.9 }) });
    const parsed: unknown = JSON.parse(
      formatTracksAsJson({ id: "pl1", name: "Focus" }, [track], new Map([["1990s", [track]]]))
    );

    expect(parsed).toMatchObject({
      playlist_id: "pl1",
      playlist_name: "Focus",
      count: 1,
      tracks: [{ id: "t1", genre: "rock", release_year: 1999, mood: "Upbeat/Happy" }],
      groups: { "1990s": ["t1"] },
    });
  });

  it("reports no mood for tracks without audio features", () => {
    const parsed: unknown = JSON.parse(
      formatTracksAsJson({ id: "pl1", name: "Focus" }, [makeTrack({ id: "t1" })])
    );

    expect(parsed).toMatchObject({ tracks: [{ id: "t1", mood: null }] });
  });
});
