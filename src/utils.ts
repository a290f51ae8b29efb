import * as fs from "fs";
import * as path from "path";
import { CsvError, parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import {
	CsvFileError,
	CsvSyntaxError,
	errorCode,
	FieldCountError,
	FieldTypeError,
	RestaurantDataError,
} from "./errors";
import { RESTAURANT_COLUMNS } from "./schema";
import type { ParsedCsv, RestaurantRecord, RowError } from "./types";

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

type CsvField = string | null;

interface CsvEntry {
	fields: CsvField[];
	line: number;
}

function toSyntaxError(error: CsvError): CsvSyntaxError {
	const line = typeof error.lines === "number" ? error.lines : 0;
	return new CsvSyntaxError(line, error.message, error);
}

/**
 * Narrow one `info: true` record coming out of csv-parse
 */
function toCsvEntry(entry: unknown): CsvEntry {
	if (
		typeof entry === "object" &&
		entry !== null &&
		"record" in entry &&
		Array.isArray(entry.record) &&
		"info" in entry &&
		typeof entry.info === "object" &&
		entry.info !== null &&
		"lines" in entry.info &&
		typeof entry.info.lines === "number"
	) {
		const fields: CsvField[] = [];
		for (const field of entry.record) {
			fields.push(typeof field === "string" ? field : null);
		}
		return { fields, line: entry.info.lines };
	}
	throw new RestaurantDataError("Unexpected record shape from CSV parser");
}

function parseScore(value: CsvField, line: number): number | null {
	if (value === null || value.trim() === "") return null;
	const trimmed = value.trim();
	const score = Number(trimmed);
	if (!FLOAT_PATTERN.test(trimmed) || !Number.isFinite(score)) {
		throw new FieldTypeError(line, "Restaurant_score", value, "float");
	}
	return score;
}

function parseReviewCount(value: CsvField, line: number): number | null {
	if (value === null || value.trim() === "") return null;
	const trimmed = value.trim();
	const count = Number(trimmed);
	if (!INTEGER_PATTERN.test(trimmed) || count < INT_MIN || count > INT_MAX) {
		throw new FieldTypeError(line, "Number_of_reviews", value, "integer");
	}
	return count;
}

/**
 * Map one CSV record positionally onto the restaurant_data columns
 */
function toRestaurantRecord(entry: CsvEntry): RestaurantRecord {
	const { fields, line } = entry;
	if (fields.length !== RESTAURANT_COLUMNS.length) {
		throw new FieldCountError(line, RESTAURANT_COLUMNS.length, fields.length);
	}

	const [name, location, cuisine, score, reviews] = fields;
	return {
		restaurantName: name,
		restaurantLocation: location,
		restaurantCuisine: cuisine,
		restaurantScore: parseScore(score, line),
		numberOfReviews: parseReviewCount(reviews, line),
	};
}

/**
 * Parse restaurant CSV text. The first record is the header and is dropped.
 *
 * An unquoted empty field is NULL; a quoted one (`""`) is an empty string.
 * Without `collectErrors` the first bad row throws. Row errors report the
 * line a record ends on, which for a quoted field spanning several lines is
 * its last line.
 */
export function parseRestaurantCsv(
	csvData: string,
	options: { collectErrors?: boolean } = {}
): ParsedCsv {
	const records: RestaurantRecord[] = [];
	const errors: RowError[] = [];

	let parsed: unknown;
	try {
		parsed = parse(csvData, {
			delimiter: ",",
			skip_empty_lines: true,
			relax_column_count: true,
			info: true,
			cast: (value, context) =>
				value === "" && !context.quoting ? null : value,
			skip_records_with_error: options.collectErrors === true,
			on_skip: (error) => {
				if (!error) return;
				const syntaxError = toSyntaxError(error);
				// One entry per record; a record can trip the parser more than once
				if (errors.at(-1)?.line !== syntaxError.line) {
					errors.push({ line: syntaxError.line, message: syntaxError.message });
				}
			},
		});
	} catch (error) {
		if (error instanceof CsvError) {
			throw toSyntaxError(error);
		}
		throw error;
	}
	const entries: unknown[] = Array.isArray(parsed) ? parsed : [];

	// Header row
	for (const raw of entries.slice(1)) {
		const entry = toCsvEntry(raw);
		try {
			records.push(toRestaurantRecord(entry));
		} catch (error) {
			if (
				options.collectErrors &&
				(error instanceof FieldCountError || error instanceof FieldTypeError)
			) {
				errors.push({ line: entry.line, message: error.message });
				continue;
			}
			throw error;
		}
	}

	// Syntax errors are collected while parsing, row errors afterwards
	errors.sort((a, b) => a.line - b.line);
	return { records, errors };
}

/**
 * Read and parse a restaurant CSV file
 */
export function readRestaurantCsv(
	filename: string,
	options: { collectErrors?: boolean } = {}
): ParsedCsv {
	let csvData: string;
	try {
		csvData = fs.readFileSync(filename, "utf-8");
	} catch (error) {
		throw new CsvFileError(filename, errorCode(error), error);
	}

	const result = parseRestaurantCsv(csvData, options);
	console.log(`Read ${result.records.length} rows from ${filename}`);
	return result;
}

/**
 * Write restaurant records in the layout the loader reads back
 */
export function writeRestaurantCsv(
	records: RestaurantRecord[],
	filename: string
): void {
	const csvString = stringify(records, {
		header: true,
		columns: [
			{ key: "restaurantName", header: "Restaurant_name" },
			{ key: "restaurantLocation", header: "Restaurant_location" },
			{ key: "restaurantCuisine", header: "Restaurant_cuisine" },
			{ key: "restaurantScore", header: "Restaurant_score" },
			{ key: "numberOfReviews", header: "Number_of_reviews" },
		],
	});

	// Ensure the directory exists
	const dir = path.dirname(filename);
	if (!fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}

	fs.writeFileSync(filename, csvString);
	console.log(`${records.length} rows written to ${filename}`);
}
