import { REQUIRED_COLUMNS, deriveDecade } from "../web/src/lib/loader";
import { createTable } from "../web/src/lib/tracks";
import type { AudioFeature, Track, TrackTable } from "../web/src/lib/tracks";

type RowValues = Partial<
	Record<"name" | "artists" | "year" | "popularity" | AudioFeature, string | number>
>;

const DEFAULT_ROW = {
	name: "Test Song",
	artists: "['Test Artist']",
	year: 1990,
	popularity: 50,
	danceability: 0.5,
	energy: 0.5,
	valence: 0.5,
	acousticness: 0.5,
	speechiness: 0.1,
	loudness: -6,
	tempo: 120,
} satisfies Required<RowValues>;

export const HEADER = REQUIRED_COLUMNS.join(",");

function quote(value: string): string {
	return /[",\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

export function csvRow(values: RowValues = {}): string {
	const row = { ...DEFAULT_ROW, ...values };
	return REQUIRED_COLUMNS.map((column) => quote(String(row[column]))).join(",");
}

export function csvOf(rows: RowValues[], header: string = HEADER): string {
	return [header, ...rows.map((row) => csvRow(row))].join("\n");
}

export function makeTrack(
	index: number,
	overrides: Partial<Omit<Track, "index" | "decade">> = {},
): Track {
	const year = overrides.year ?? DEFAULT_ROW.year;
	return {
		...DEFAULT_ROW,
		...overrides,
		index,
		year,
		decade: deriveDecade(year),
	};
}

export function tableOf(tracks: Track[]): TrackTable {
	return createTable("test.csv", tracks);
}
