import react from "@vitejs/plugin-react";
import autoprefixer from "autoprefixer";
import { readFile } from "fs/promises";
import path from "path";
import tailwindcss from "tailwindcss";
import { fileURLToPath } from "url";
import type { Plugin } from "vite";
import { defineConfig } from "vite";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DATASET_FILENAME = "data.csv";
const DATASET_ROUTE = `/data/${DATASET_FILENAME}`;
const datasetPath = path.resolve(__dirname, "..", "data", DATASET_FILENAME);

function trackDatasetPlugin(basePath: string): Plugin {
	const route = `${basePath.replace(/\/$/, "")}${DATASET_ROUTE}`;
	return {
		name: "track-dataset",
		configureServer(server) {
			server.middlewares.use(async (req, res, next) => {
				if (!req.url?.startsWith(route)) {
					next();
					return;
				}
				try {
					const file = await readFile(datasetPath);
					res.statusCode = 200;
					res.setHeader("Content-Type", "text/csv; charset=utf-8");
					res.end(file);
				} catch (error) {
					server.config.logger.error(
						`track-dataset: unable to read ${datasetPath}: ${error instanceof Error ? error.message : error}`,
					);
					res.statusCode = 404;
					res.setHeader("Content-Type", "text/plain");
					res.end(`${DATASET_FILENAME} not found`);
				}
			});
		},
		buildStart() {
			this.addWatchFile(datasetPath);
		},
		async generateBundle() {
			const source = await readFile(datasetPath, "utf-8");
			this.emitFile({
				type: "asset",
				fileName: DATASET_ROUTE.slice(1),
				source,
			});
		},
	};
}

export default defineConfig(({ command }) => {
	const isBuild = command === "build";
	const basePath = isBuild ? "/decades-of-hits/" : "/";

	return {
		root: __dirname,
		base: basePath,
		plugins: [react(), trackDatasetPlugin(basePath)],
		css: {
			postcss: {
				plugins: [
					tailwindcss({ config: path.resolve(__dirname, "tailwind.config.ts") }),
					autoprefixer(),
				],
			},
		},
		server: {
			port: 5173,
			open: false,
		},
		build: {
			outDir: path.resolve(__dirname, "..", "docs"),
			emptyOutDir: true,
		},
	};
});
