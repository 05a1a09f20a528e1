import Papa from "papaparse";
import { MIN_DECADE } from "./config";
import { DataSourceError, SchemaError } from "./errors";
import { AUDIO_FEATURES, createTable } from "./tracks";
import type { AudioFeature, Track, TrackTable } from "./tracks";

export const REQUIRED_COLUMNS = [
	"name",
	"artists",
	"year",
	"popularity",
	...AUDIO_FEATURES,
] as const;

const INTEGER_COLUMNS = new Set<string>(["year", "popularity"]);

type CsvRow = Record<string, string | undefined>;

export type ReadSource = (source: string) => Promise<string>;

export interface TrackLoaderLogger {
	info: (message: string) => void;
}

export interface TrackLoaderOptions {
	readSource?: ReadSource;
	logger?: TrackLoaderLogger;
}

export interface TrackLoader {
	/** Resolves to the same table for every call with the same source. */
	load(source: string): Promise<TrackTable>;
	has(source: string): boolean;
}

export function deriveDecade(year: number): number {
	return Math.floor(year / 10) * 10;
}

function readNumber(
	source: string,
	row: CsvRow,
	column: string,
	rowNumber: number,
): number {
	const raw = row[column]?.trim() ?? "";
	const value = raw.length > 0 ? Number(raw) : Number.NaN;
	if (!Number.isFinite(value)) {
		throw new SchemaError(
			source,
			`Invalid number in column "${column}" at row ${rowNumber}: "${raw}"`,
		);
	}
	if (INTEGER_COLUMNS.has(column) && !Number.isInteger(value)) {
		throw new SchemaError(
			source,
			`Expected an integer in column "${column}" at row ${rowNumber}: "${raw}"`,
		);
	}
	return value;
}

function readText(
	source: string,
	row: CsvRow,
	column: string,
	rowNumber: number,
): string {
	const value = row[column];
	if (value === undefined) {
		throw new SchemaError(
			source,
			`Missing value for column "${column}" at row ${rowNumber}`,
		);
	}
	return value;
}

function readFeatures(
	source: string,
	row: CsvRow,
	rowNumber: number,
): Record<AudioFeature, number> {
	const features: Record<AudioFeature, number> = {
		danceability: 0,
		energy: 0,
		valence: 0,
		acousticness: 0,
		speechiness: 0,
		loudness: 0,
		tempo: 0,
	};
	for (const feature of AUDIO_FEATURES) {
		features[feature] = readNumber(source, row, feature, rowNumber);
	}
	return features;
}

/**
 * Parses the track CSV and derives the decade column. Rows released before
 * {@link MIN_DECADE} are dropped; any malformed numeric field fails the whole
 * parse with a {@link SchemaError}.
 */
export function parseTracksCsv(text: string, source: string): TrackTable {
	const result = Papa.parse<CsvRow>(text, {
		header: true,
		skipEmptyLines: "greedy",
		transformHeader: (header) => header.trim(),
	});

	const fields = result.meta.fields ?? [];
	const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
	if (missing.length > 0) {
		throw new SchemaError(
			source,
			`Missing required column${missing.length === 1 ? "" : "s"}: ${missing.join(", ")}`,
		);
	}

	const fatal = result.errors.find(
		(error) => error.type === "Quotes" || error.type === "FieldMismatch",
	);
	if (fatal) {
		const rowNumber = fatal.row !== undefined ? fatal.row + 1 : "unknown";
		throw new SchemaError(
			source,
			`Malformed CSV at row ${rowNumber}: ${fatal.message}`,
		);
	}

	const tracks: Track[] = [];
	result.data.forEach((row, index) => {
		const rowNumber = index + 1;
		const year = readNumber(source, row, "year", rowNumber);
		const popularity = readNumber(source, row, "popularity", rowNumber);
		const features = readFeatures(source, row, rowNumber);
		const decade = deriveDecade(year);
		if (decade < MIN_DECADE) return;
		tracks.push(
			Object.freeze({
				index,
				name: readText(source, row, "name", rowNumber),
				artists: readText(source, row, "artists", rowNumber),
				year,
				decade,
				popularity,
				...features,
			}),
		);
	});

	return createTable(source, tracks);
}

async function fetchText(source: string): Promise<string> {
	const response = await fetch(source, {
		headers: {
			Accept: "text/csv",
		},
	});
	if (!response.ok) {
		throw new Error(
			`Request to ${source} failed: ${response.status} ${response.statusText}`,
		);
	}
	return response.text();
}

export function createTrackLoader(options: TrackLoaderOptions = {}): TrackLoader {
	const readSource = options.readSource ?? fetchText;
	const logger = options.logger ?? console;
	const tables = new Map<string, Promise<TrackTable>>();

	async function read(source: string): Promise<TrackTable> {
		let text: string;
		try {
			text = await readSource(source);
		} catch (error) {
			const detail = error instanceof Error ? error.message : String(error);
			throw new DataSourceError(source, `Unable to read ${source}: ${detail}`, {
				cause: error,
			});
		}
		const table = parseTracksCsv(text, source);
		logger.info(`Loaded ${table.tracks.length} tracks from ${source}`);
		return table;
	}

	return {
		load(source) {
			const existing = tables.get(source);
			if (existing) return existing;
			const pending = read(source).catch((error: unknown) => {
				tables.delete(source);
				throw error;
			});
			tables.set(source, pending);
			return pending;
		},
		has(source) {
			return tables.has(source);
		},
	};
}
