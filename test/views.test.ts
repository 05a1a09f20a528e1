import { describe, expect, it } from "vitest";
import { FINGERPRINT_FEATURES } from "../web/src/lib/tracks";
import {
	availableDecades,
	cleanArtists,
	decadeMeans,
	defaultFocusDecade,
	describeScatter,
	filterByDecades,
	fingerprint,
	minMaxNormalize,
	resolveFocusDecade,
	sampleTracks,
	scatterPoints,
	topSongs,
	yearlyMeans,
} from "../web/src/lib/views";
import { makeTrack, tableOf } from "./helpers";

const mixedTable = tableOf([
	makeTrack(0, { name: "A", year: 1962 }),
	makeTrack(1, { name: "B", year: 1985 }),
	makeTrack(2, { name: "C", year: 1968 }),
	makeTrack(3, { name: "D", year: 2004 }),
	makeTrack(4, { name: "E", year: 1981 }),
]);

describe("availableDecades", () => {
	it("lists the distinct decades in ascending order", () => {
		expect(availableDecades(mixedTable)).toEqual([1960, 1980, 2000]);
	});
});

describe("filterByDecades", () => {
	it("returns an empty table for an empty selection", () => {
		const filtered = filterByDecades(mixedTable, []);
		expect(filtered.tracks).toEqual([]);
		expect(filtered.decades).toEqual([]);
	});

	it("returns every track in order when all decades are selected", () => {
		const filtered = filterByDecades(mixedTable, new Set(mixedTable.decades));
		expect(filtered.tracks).toEqual(mixedTable.tracks);
		expect(filtered.decades).toEqual(mixedTable.decades);
	});

	it("keeps only the selected decades, preserving source order", () => {
		const filtered = filterByDecades(mixedTable, [1980, 1960]);
		expect(filtered.tracks.map((track) => track.name)).toEqual(["A", "B", "C", "E"]);
		expect(filtered.decades).toEqual([1960, 1980]);
	});

	it("ignores selected decades that have no tracks", () => {
		const filtered = filterByDecades(mixedTable, [1990]);
		expect(filtered.tracks).toEqual([]);
	});

	it("does not modify the source table", () => {
		filterByDecades(mixedTable, [2000]);
		expect(mixedTable.tracks).toHaveLength(5);
	});
});

describe("yearlyMeans", () => {
	it("averages each feature per year in ascending year order", () => {
		const table = tableOf([
			makeTrack(0, { year: 1990, danceability: 0.5, energy: 0.5 }),
			makeTrack(1, { year: 1985, danceability: 1, energy: 0.5 }),
			makeTrack(2, { year: 1990, danceability: 0.25, energy: 0.5 }),
		]);

		expect(yearlyMeans(table, ["danceability", "energy"])).toEqual([
			{ year: 1985, means: { danceability: 1, energy: 0.5 } },
			{ year: 1990, means: { danceability: 0.375, energy: 0.5 } },
		]);
	});

	it("emits exactly the distinct years present, without gaps", () => {
		const years = yearlyMeans(mixedTable, ["valence"]).map((row) => row.year);
		expect(years).toEqual([1962, 1968, 1981, 1985, 2004]);
	});

	it("returns nothing for an empty table", () => {
		expect(yearlyMeans(tableOf([]), ["energy"])).toEqual([]);
	});
});

describe("decadeMeans", () => {
	it("averages the tracks of one decade", () => {
		const table = tableOf([
			makeTrack(0, { year: 1971, tempo: 100 }),
			makeTrack(1, { year: 1979, tempo: 140 }),
			makeTrack(2, { year: 1980, tempo: 200 }),
		]);
		expect(decadeMeans(table, 1970, ["tempo"])).toEqual({ tempo: 120 });
	});

	it("returns null when the decade has no tracks", () => {
		expect(decadeMeans(mixedTable, 1990, ["tempo"])).toBeNull();
	});
});

describe("minMaxNormalize", () => {
	it("maps the smallest value to 0 and the largest to 1", () => {
		expect(minMaxNormalize([2, 4, 6])).toEqual([0, 0.5, 1]);
	});

	it("maps a constant vector to zeros", () => {
		expect(minMaxNormalize([3, 3, 3])).toEqual([0, 0, 0]);
	});

	it("returns an empty vector for no input", () => {
		expect(minMaxNormalize([])).toEqual([]);
	});
});

describe("fingerprint", () => {
	it("normalizes the decade means across the five features", () => {
		const table = tableOf([
			makeTrack(0, {
				year: 1993,
				danceability: 0.5,
				energy: 1,
				valence: 0,
				acousticness: 0.25,
				speechiness: 0.75,
			}),
			makeTrack(1, { year: 2001, danceability: 0.9 }),
		]);

		expect(fingerprint(table, 1990, FINGERPRINT_FEATURES)).toEqual([
			{ feature: "danceability", mean: 0.5, value: 0.5 },
			{ feature: "energy", mean: 1, value: 1 },
			{ feature: "valence", mean: 0, value: 0 },
			{ feature: "acousticness", mean: 0.25, value: 0.25 },
			{ feature: "speechiness", mean: 0.75, value: 0.75 },
		]);
	});

	it("keeps every value within [0, 1]", () => {
		const table = tableOf([
			makeTrack(0, { year: 1975, danceability: 0.3, energy: 0.9, valence: 0.6, acousticness: 0.1, speechiness: 0.05 }),
			makeTrack(1, { year: 1977, danceability: 0.7, energy: 0.4, valence: 0.2, acousticness: 0.8, speechiness: 0.2 }),
		]);
		const values = fingerprint(table, 1970, FINGERPRINT_FEATURES).map((point) => point.value);

		expect(values).toHaveLength(5);
		expect(Math.min(...values)).toBe(0);
		expect(Math.max(...values)).toBe(1);
	});

	it("returns all zeros when every mean is equal", () => {
		const table = tableOf([
			makeTrack(0, {
				year: 1966,
				danceability: 0.4,
				energy: 0.4,
				valence: 0.4,
				acousticness: 0.4,
				speechiness: 0.4,
			}),
		]);

		expect(fingerprint(table, 1960, FINGERPRINT_FEATURES).map((point) => point.value)).toEqual([
			0, 0, 0, 0, 0,
		]);
	});

	it("returns nothing for a decade without tracks", () => {
		expect(fingerprint(mixedTable, 2010, FINGERPRINT_FEATURES)).toEqual([]);
	});
});

describe("topSongs", () => {
	const table = tableOf([
		makeTrack(0, { popularity: 10 }),
		makeTrack(1, { popularity: 90 }),
		makeTrack(2, { popularity: 90 }),
		makeTrack(3, { popularity: 5 }),
	]);

	it("sorts by popularity and keeps source order for ties", () => {
		const top = topSongs(table, 1990, 2);
		expect(top.map((song) => song.track.index)).toEqual([1, 2]);
		expect(top.map((song) => song.rank)).toEqual([1, 2]);
	});

	it("returns at most five tracks by default", () => {
		const many = tableOf(
			Array.from({ length: 8 }, (_, index) => makeTrack(index, { popularity: index * 10 })),
		);
		expect(topSongs(many, 1990).map((song) => song.track.popularity)).toEqual([
			70, 60, 50, 40, 30,
		]);
	});

	it("only considers the requested decade", () => {
		const top = topSongs(mixedTable, 1960);
		expect(top.map((song) => song.track.name)).toEqual(["A", "C"]);
	});

	it("cleans the artist list for display", () => {
		const withArtists = tableOf([makeTrack(0, { artists: "['A', 'B']" })]);
		expect(topSongs(withArtists, 1990)[0].artistsDisplay).toBe("A, B");
	});

	it("returns nothing for an empty decade or a non-positive count", () => {
		expect(topSongs(table, 1970)).toEqual([]);
		expect(topSongs(table, 1990, 0)).toEqual([]);
	});
});

describe("cleanArtists", () => {
	it("strips brackets and quotes", () => {
		expect(cleanArtists("['The Beatles']")).toBe("The Beatles");
		expect(cleanArtists("['A', 'B']")).toBe("A, B");
	});

	it("strips runs of brackets at either end", () => {
		expect(cleanArtists("[['X']]")).toBe("X");
		expect(cleanArtists("]'Y'[")).toBe("Y");
	});

	it("leaves brackets that are not at the ends", () => {
		expect(cleanArtists(" ['A'] ")).toBe(" [A] ");
		expect(cleanArtists("['A [live]']")).toBe("A [live]");
	});

	it("removes quotes inside names", () => {
		expect(cleanArtists("['Guns N' Roses']")).toBe("Guns N Roses");
	});

	it("passes plain text through", () => {
		expect(cleanArtists("Plain Artist")).toBe("Plain Artist");
	});
});

describe("sampleTracks", () => {
	const build = (count: number) =>
		tableOf(Array.from({ length: count }, (_, index) => makeTrack(index)));

	it("returns small tables unchanged", () => {
		const small = build(500);
		expect(sampleTracks(small, 2000)).toBe(small);
	});

	it("returns a table of exactly maxSize unchanged", () => {
		const exact = build(2000);
		expect(sampleTracks(exact)).toBe(exact);
	});

	it("draws exactly maxSize distinct tracks from larger tables", () => {
		const sampled = sampleTracks(build(5000), 2000, 42);
		const indices = sampled.tracks.map((track) => track.index);

		expect(indices).toHaveLength(2000);
		expect(new Set(indices).size).toBe(2000);
		expect(indices.every((index, position) => position === 0 || index > indices[position - 1])).toBe(
			true,
		);
	});

	it("draws the same rows for the same seed", () => {
		const large = build(5000);
		const first = sampleTracks(large, 2000, 42).tracks.map((track) => track.index);
		const second = sampleTracks(large, 2000, 42).tracks.map((track) => track.index);
		const other = sampleTracks(large, 2000, 7).tracks.map((track) => track.index);

		expect(second).toEqual(first);
		expect(other).not.toEqual(first);
	});

	it("uses the default size and seed", () => {
		const large = build(2500);
		expect(sampleTracks(large).tracks).toEqual(sampleTracks(large, 2000, 42).tracks);
	});
});

describe("scatterPoints", () => {
	it("projects the chosen features with decade and name", () => {
		const table = tableOf([makeTrack(0, { name: "Pulse", year: 1977, loudness: -4, popularity: 63 })]);
		expect(scatterPoints(table, "loudness", "popularity")).toEqual([
			{ x: -4, y: 63, decade: 1970, name: "Pulse" },
		]);
	});
});

describe("focus decade", () => {
	it("defaults to the latest decade", () => {
		expect(defaultFocusDecade([1960, 1990, 1970])).toBe(1990);
		expect(defaultFocusDecade([])).toBeNull();
	});

	it("keeps a requested decade that is still available", () => {
		expect(resolveFocusDecade(1970, [1960, 1970, 1980])).toBe(1970);
	});

	it("falls back when the requested decade is filtered out", () => {
		expect(resolveFocusDecade(1990, [1960, 1970])).toBe(1970);
		expect(resolveFocusDecade(undefined, [1960])).toBe(1960);
		expect(resolveFocusDecade(1960, [])).toBeNull();
	});
});

describe("describeScatter", () => {
	it("titles the chart as Y vs. X", () => {
		expect(describeScatter("danceability", "energy")).toBe("Energy vs. Danceability");
	});
});
