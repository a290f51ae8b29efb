import { sql } from "drizzle-orm";
import {
	doublePrecision,
	integer,
	pgTable,
	text,
	type PgQueryResultHKT,
} from "drizzle-orm/pg-core";
import type { RestaurantDatabase } from "./db";
import { errorCode, TableExistsError } from "./errors";

export const RESTAURANT_TABLE = "restaurant_data";

/**
 * Restaurant listings. No key and no constraints: every row is
 * insertable on its own, duplicates and nulls included.
 */
export const restaurantData = pgTable(RESTAURANT_TABLE, {
	restaurantName: text("Restaurant_name"),
	restaurantLocation: text("Restaurant_location"),
	restaurantCuisine: text("Restaurant_cuisine"),
	restaurantScore: doublePrecision("Restaurant_score"),
	numberOfReviews: integer("Number_of_reviews"),
});

export const RESTAURANT_COLUMNS = [
	"Restaurant_name",
	"Restaurant_location",
	"Restaurant_cuisine",
	"Restaurant_score",
	"Number_of_reviews",
] as const;

export type RestaurantColumn = (typeof RESTAURANT_COLUMNS)[number];

const COLUMN_TYPES: Record<RestaurantColumn, string> = {
	Restaurant_name: "TEXT",
	Restaurant_location: "TEXT",
	Restaurant_cuisine: "TEXT",
	Restaurant_score: "FLOAT",
	Number_of_reviews: "INT",
};

export function createRestaurantTableSql(
	options: { ifNotExists?: boolean } = {}
): string {
	const columns = RESTAURANT_COLUMNS.map(
		(column) => `\t"${column}" ${COLUMN_TYPES[column]}`
	).join(",\n");
	const guard = options.ifNotExists ? "IF NOT EXISTS " : "";
	return `CREATE TABLE ${guard}${RESTAURANT_TABLE} (\n${columns}\n)`;
}

/**
 * Create the restaurant_data relation
 */
export async function createRestaurantTable<
	TQueryResult extends PgQueryResultHKT,
>(
	db: RestaurantDatabase<TQueryResult>,
	options: { ifNotExists?: boolean } = {}
): Promise<void> {
	try {
		await db.execute(sql.raw(createRestaurantTableSql(options)));
	} catch (error) {
		// 42P07: duplicate_table
		if (errorCode(error) === "42P07") {
			throw new TableExistsError(RESTAURANT_TABLE, error);
		}
		throw error;
	}
	console.log(`Table ${RESTAURANT_TABLE} is ready`);
}
