import { getReleaseYear, type Track } from "./track";

export type GenreFilter = {
  kind: "genre";
  genre: string;
};

export type YearRangeFilter = {
  kind: "year-range";
  minYear: number;
  maxYear?: number | undefined;
};

/**
 * A match set computed up front, e.g. by the AI filter.
 */
export type TrackIdsFilter = {
  kind: "track-ids";
  prompt: string;
  suggestedName: string;
  trackIds: ReadonlySet<string>;
};

export type TrackFilter = GenreFilter | YearRangeFilter | TrackIdsFilter;

export function genreFilter(genre: string): GenreFilter {
  return { kind: "genre", genre: genre.trim() };
}

export function yearRangeFilter(minYear: number, maxYear?: number): YearRangeFilter {
  if (maxYear !== undefined && maxYear < minYear) {
    throw new RangeError(`Invalid year range: ${minYear}-${maxYear}`);
  }
  return { kind: "year-range", minYear, maxYear };
}

export function trackIdsFilter(
  prompt: string,
  suggestedName: string,
  trackIds: Iterable<string>
): TrackIdsFilter {
  return { kind: "track-ids", prompt, suggestedName, trackIds: new Set(trackIds) };
}

export function matchesFilter(filter: TrackFilter, track: Track): boolean {
  switch (filter.kind) {
    case "genre":
      return track.genre.toLowerCase() === filter.genre.toLowerCase();
    case "year-range": {
      const year = getReleaseYear(track);
      if (year === null || year < filter.minYear) return false;
      return filter.maxYear === undefined || year <= filter.maxYear;
    }
    case "track-ids":
      return filter.trackIds.has(track.id);
  }
}

export function filterName(filter: TrackFilter): string {
  switch (filter.kind) {
    case "genre":
      return `Genre: ${filter.genre}`;
    case "year-range":
      return filter.maxYear !== undefined
        ? `Songs ${filter.minYear}-${filter.maxYear}`
        : `Songs from ${filter.minYear} onwards`;
    case "track-ids":
      return `AI: ${filter.prompt}`;
  }
}

export function suggestedPlaylistName(filter: TrackFilter): string {
  switch (filter.kind) {
    case "genre":
      return filter.genre;
    case "year-range":
      return filter.maxYear !== undefined
        ? `Classics ${filter.minYear}-${filter.maxYear}`
        : `Modern Classics (${filter.minYear}+)`;
    case "track-ids":
      return filter.suggestedName;
  }
}

/**
 * AND of several filters. Named after all of them, suggested name from the first.
 */
export type CombinedFilter = {
  filters: readonly TrackFilter[];
  name: string;
  suggestedName: string;
  matches(track: Track): boolean;
};

export function allOf(filters: readonly TrackFilter[]): CombinedFilter {
  const [first] = filters;
  if (!first) {
    throw new Error("At least one filter is required");
  }
  return {
    filters,
    name: filters.map(filterName).join(" + "),
    suggestedName: suggestedPlaylistName(first),
    matches: (track) => filters.every((f) => matchesFilter(f, track)),
  };
}
