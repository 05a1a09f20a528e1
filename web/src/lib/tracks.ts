export const AUDIO_FEATURES = [
	"danceability",
	"energy",
	"valence",
	"acousticness",
	"speechiness",
	"loudness",
	"tempo",
] as const;

export type AudioFeature = (typeof AUDIO_FEATURES)[number];

/** Any numeric column a chart may plot. */
export type NumericField = AudioFeature | "popularity";

export const TREND_FEATURES = [
	"danceability",
	"energy",
	"valence",
	"acousticness",
] as const satisfies ReadonlyArray<AudioFeature>;

export const FINGERPRINT_FEATURES = [
	"danceability",
	"energy",
	"valence",
	"acousticness",
	"speechiness",
] as const satisfies ReadonlyArray<AudioFeature>;

export const SCATTER_FEATURES = [
	"danceability",
	"energy",
	"valence",
	"acousticness",
	"loudness",
	"tempo",
	"popularity",
] as const satisfies ReadonlyArray<NumericField>;

export type TrendFeature = (typeof TREND_FEATURES)[number];
export type FingerprintFeature = (typeof FINGERPRINT_FEATURES)[number];
export type ScatterFeature = (typeof SCATTER_FEATURES)[number];

export const DEFAULT_SCATTER_X: ScatterFeature = "danceability";
export const DEFAULT_SCATTER_Y: ScatterFeature = "energy";

export type Track = Readonly<
	{
		/** Zero-based row position in the source file. */
		index: number;
		name: string;
		/** Raw list text as stored in the file, e.g. `['A', 'B']`. */
		artists: string;
		year: number;
		decade: number;
		popularity: number;
	} & Record<AudioFeature, number>
>;

export type TrackTable = Readonly<{
	source: string;
	tracks: ReadonlyArray<Track>;
	/** Distinct decades present, ascending. */
	decades: ReadonlyArray<number>;
}>;

export type DecadeSelection = ReadonlySet<number> | ReadonlyArray<number>;

export function isScatterFeature(value: string): value is ScatterFeature {
	return SCATTER_FEATURES.some((feature) => feature === value);
}

export function distinctDecades(tracks: ReadonlyArray<Track>): number[] {
	const unique = new Set<number>();
	for (const track of tracks) unique.add(track.decade);
	return Array.from(unique).sort((a, b) => a - b);
}

export function createTable(
	source: string,
	tracks: ReadonlyArray<Track>,
): TrackTable {
	return Object.freeze({
		source,
		tracks: Object.freeze([...tracks]),
		decades: Object.freeze(distinctDecades(tracks)),
	});
}
