/**
 * Base class for every error raised by this package
 */
export class RestaurantDataError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class TableExistsError extends RestaurantDataError {
	constructor(public readonly table: string, cause?: unknown) {
		super(`relation "${table}" already exists`, { cause });
	}
}

/**
 * The CSV file could not be read (missing, a directory, no permission)
 */
export class CsvFileError extends RestaurantDataError {
	constructor(
		public readonly path: string,
		public readonly code: string | undefined,
		cause?: unknown
	) {
		super(`Cannot read CSV file ${path}${code ? ` (${code})` : ""}`, { cause });
	}
}

export class FieldCountError extends RestaurantDataError {
	constructor(
		public readonly line: number,
		public readonly expected: number,
		public readonly actual: number
	) {
		super(`Line ${line}: expected ${expected} fields, got ${actual}`);
	}
}

export class FieldTypeError extends RestaurantDataError {
	constructor(
		public readonly line: number,
		public readonly column: string,
		public readonly value: string,
		public readonly expectedType: "float" | "integer"
	) {
		super(
			`Line ${line}: invalid ${expectedType} value "${value}" for column ${column}`
		);
	}
}

/**
 * Broken CSV syntax (stray or unclosed quotes) reported by the parser
 */
export class CsvSyntaxError extends RestaurantDataError {
	constructor(
		public readonly line: number,
		reason: string,
		cause?: unknown
	) {
		super(`Line ${line}: ${reason}`, { cause });
	}
}

/**
 * Reads the `code` of a system or driver error (errno name, SQLSTATE),
 * looking through wrapping errors
 */
export function errorCode(error: unknown): string | undefined {
	let current: unknown = error;
	for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
		if ("code" in current && typeof current.code === "string") {
			return current.code;
		}
		current = current.cause;
	}
	return undefined;
}
