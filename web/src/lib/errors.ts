export class DataSourceError extends Error {
	readonly source: string;

	constructor(source: string, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "DataSourceError";
		this.source = source;
	}
}

export class SchemaError extends Error {
	readonly source: string;

	constructor(source: string, message: string) {
		super(message);
		this.name = "SchemaError";
		this.source = source;
	}
}
