import {
	SCATTER_SAMPLE_SEED,
	SCATTER_SAMPLE_SIZE,
	TOP_SONG_COUNT,
} from "./config";
import { createRandom, sampleIndices } from "./random";
import { createTable } from "./tracks";
import type {
	DecadeSelection,
	NumericField,
	ScatterFeature,
	Track,
	TrackTable,
} from "./tracks";

export type FeatureMeans<F extends NumericField> = Readonly<Record<F, number>>;

export type YearlyMeans<F extends NumericField> = Readonly<{
	year: number;
	means: FeatureMeans<F>;
}>;

export type FingerprintPoint<F extends NumericField> = Readonly<{
	feature: F;
	mean: number;
	/** Min-max scaled mean, in [0, 1]. */
	value: number;
}>;

export type TopSong = Readonly<{
	rank: number;
	track: Track;
	artistsDisplay: string;
}>;

export type ScatterPoint = Readonly<{
	x: number;
	y: number;
	decade: number;
	name: string;
}>;

export function availableDecades(table: TrackTable): ReadonlyArray<number> {
	return table.decades;
}

export function filterByDecades(
	table: TrackTable,
	decades: DecadeSelection,
): TrackTable {
	const selected = new Set<number>(decades);
	if (selected.size === 0) return createTable(table.source, []);
	return createTable(
		table.source,
		table.tracks.filter((track) => selected.has(track.decade)),
	);
}

function meansOf<F extends NumericField>(
	tracks: ReadonlyArray<Track>,
	features: ReadonlyArray<F>,
): Record<F, number> {
	const means = {} as Record<F, number>;
	for (const feature of features) {
		let sum = 0;
		for (const track of tracks) sum += track[feature];
		means[feature] = sum / tracks.length;
	}
	return means;
}

export function yearlyMeans<F extends NumericField>(
	table: TrackTable,
	features: ReadonlyArray<F>,
): ReadonlyArray<YearlyMeans<F>> {
	const byYear = new Map<number, Track[]>();
	for (const track of table.tracks) {
		const bucket = byYear.get(track.year);
		if (bucket) {
			bucket.push(track);
		} else {
			byYear.set(track.year, [track]);
		}
	}
	return Array.from(byYear.keys())
		.sort((a, b) => a - b)
		.map((year) => ({
			year,
			means: meansOf(byYear.get(year) ?? [], features),
		}));
}

export function decadeMeans<F extends NumericField>(
	table: TrackTable,
	decade: number,
	features: ReadonlyArray<F>,
): FeatureMeans<F> | null {
	const tracks = table.tracks.filter((track) => track.decade === decade);
	if (tracks.length === 0) return null;
	return meansOf(tracks, features);
}

/**
 * Scales values onto [0, 1]. A zero range maps every value to 0, matching a
 * min-max scaler that leaves constant columns unscaled.
 */
export function minMaxNormalize(values: ReadonlyArray<number>): number[] {
	if (values.length === 0) return [];
	const min = Math.min(...values);
	const max = Math.max(...values);
	const spread = max - min;
	if (spread === 0) return values.map(() => 0);
	return values.map((value) => (value - min) / spread);
}

export function fingerprint<F extends NumericField>(
	table: TrackTable,
	decade: number,
	features: ReadonlyArray<F>,
): ReadonlyArray<FingerprintPoint<F>> {
	const means = decadeMeans(table, decade, features);
	if (!means) return [];
	const ordered = features.map((feature) => means[feature]);
	const scaled = minMaxNormalize(ordered);
	return features.map((feature, index) => ({
		feature,
		mean: ordered[index],
		value: scaled[index],
	}));
}

const EDGE_BRACKETS = /^[[\]]+|[[\]]+$/g;

/** `"['A', 'B']"` becomes `"A, B"`. */
export function cleanArtists(raw: string): string {
	return raw.replace(EDGE_BRACKETS, "").replaceAll("'", "");
}

export function topSongs(
	table: TrackTable,
	decade: number,
	n: number = TOP_SONG_COUNT,
): ReadonlyArray<TopSong> {
	if (n <= 0) return [];
	return table.tracks
		.filter((track) => track.decade === decade)
		.sort((a, b) => b.popularity - a.popularity)
		.slice(0, n)
		.map((track, index) => ({
			rank: index + 1,
			track,
			artistsDisplay: cleanArtists(track.artists),
		}));
}

export function sampleTracks(
	table: TrackTable,
	maxSize: number = SCATTER_SAMPLE_SIZE,
	seed: number = SCATTER_SAMPLE_SEED,
): TrackTable {
	if (table.tracks.length <= maxSize) return table;
	const picked = sampleIndices(table.tracks.length, maxSize, createRandom(seed));
	return createTable(
		table.source,
		picked.map((index) => table.tracks[index]),
	);
}

export function scatterPoints(
	table: TrackTable,
	x: ScatterFeature,
	y: ScatterFeature,
): ReadonlyArray<ScatterPoint> {
	return table.tracks.map((track) => ({
		x: track[x],
		y: track[y],
		decade: track.decade,
		name: track.name,
	}));
}

export function defaultFocusDecade(decades: ReadonlyArray<number>): number | null {
	if (decades.length === 0) return null;
	return Math.max(...decades);
}

export function resolveFocusDecade(
	requested: number | null | undefined,
	decades: ReadonlyArray<number>,
): number | null {
	if (requested != null && decades.includes(requested)) return requested;
	return defaultFocusDecade(decades);
}

function capitalize(value: string): string {
	if (value.length === 0) return value;
	return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export function describeScatter(x: ScatterFeature, y: ScatterFeature): string {
	return `${capitalize(y)} vs. ${capitalize(x)}`;
}
