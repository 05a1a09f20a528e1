export const MIN_DECADE = 1960;
export const TOP_SONG_COUNT = 5;
export const SCATTER_SAMPLE_SIZE = 2000;
export const SCATTER_SAMPLE_SEED = 42;

const DATASET_FILENAME = "data.csv";

type DatasetEnv = Pick<ImportMetaEnv, "BASE_URL" | "VITE_DATASET_URL">;

export function resolveDatasetUrl(env: DatasetEnv = import.meta.env): string {
	const override = env.VITE_DATASET_URL?.trim();
	if (override) return override;
	const base = env.BASE_URL || "/";
	const normalizedBase = base.endsWith("/") ? base : `${base}/`;
	return `${normalizedBase}data/${DATASET_FILENAME}`;
}
