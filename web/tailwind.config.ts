import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Config } from "tailwindcss";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const color = (name: string) => `hsl(var(--${name}) / <alpha-value>)`;

export default {
	content: [path.join(__dirname, "index.html"), path.join(__dirname, "src/**/*.{ts,tsx}")],
	theme: {
		extend: {
			colors: {
				background: color("background"),
				foreground: color("foreground"),
				border: color("border"),
				input: color("input"),
				ring: color("ring"),
				card: {
					DEFAULT: color("card"),
					foreground: color("card-foreground"),
				},
				primary: {
					DEFAULT: color("primary"),
					foreground: color("primary-foreground"),
				},
				muted: {
					DEFAULT: color("muted"),
					foreground: color("muted-foreground"),
				},
				accent: {
					DEFAULT: color("accent"),
					foreground: color("accent-foreground"),
				},
				destructive: color("destructive"),
			},
		},
	},
	plugins: [],
} satisfies Config;
