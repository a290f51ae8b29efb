import type { PgQueryResultHKT } from "drizzle-orm/pg-core";
import type { RestaurantDatabase } from "./db";
import { RestaurantDataError } from "./errors";
import { RESTAURANT_TABLE, restaurantData } from "./schema";
import type { LoadOptions, LoadResult, RestaurantRecord } from "./types";
import { readRestaurantCsv } from "./utils";

export const DEFAULT_BATCH_SIZE = 1000;

/**
 * Insert restaurant rows, `batchSize` rows per statement
 */
export async function insertRestaurants<
	TQueryResult extends PgQueryResultHKT,
>(
	db: RestaurantDatabase<TQueryResult>,
	records: RestaurantRecord[],
	batchSize: number = DEFAULT_BATCH_SIZE
): Promise<number> {
	if (!Number.isInteger(batchSize) || batchSize < 1) {
		throw new RestaurantDataError(`Invalid batch size: ${batchSize}`);
	}

	for (let i = 0; i < records.length; i += batchSize) {
		const batch = records.slice(i, i + batchSize);
		await db.insert(restaurantData).values(batch);
		console.log(
			`Inserted batch ${Math.floor(i / batchSize) + 1} of ${Math.ceil(
				records.length / batchSize
			)} (${batch.length} rows)`
		);
	}

	return records.length;
}

/**
 * Bulk-load a header-prefixed CSV file into restaurant_data.
 *
 * All inserts run in one transaction, so an aborted load leaves the table
 * untouched. Rows are always appended unless `mode` is "replace"; loading
 * the same file twice duplicates every row.
 */
export async function bulkLoad<TQueryResult extends PgQueryResultHKT>(
	db: RestaurantDatabase<TQueryResult>,
	filename: string,
	options: LoadOptions = {}
): Promise<LoadResult> {
	const onInvalidRow = options.onInvalidRow ?? "abort";
	const mode = options.mode ?? "append";

	console.log(`Loading ${filename} into ${RESTAURANT_TABLE} (${mode})...`);
	const { records, errors } = readRestaurantCsv(filename, {
		collectErrors: onInvalidRow === "skip",
	});

	for (const error of errors) {
		console.error(`Skipping row: ${error.message}`);
	}

	const inserted = await db.transaction(async (tx) => {
		if (mode === "replace") {
			await tx.delete(restaurantData);
		}
		return insertRestaurants(tx, records, options.batchSize);
	});

	console.log(
		`Loaded ${inserted} rows into ${RESTAURANT_TABLE}` +
			(errors.length > 0 ? `, skipped ${errors.length}` : "")
	);

	return { inserted, skipped: errors.length, errors };
}
