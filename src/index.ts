export * from "./types";
export * from "./errors";
export {
	restaurantData,
	RESTAURANT_COLUMNS,
	RESTAURANT_TABLE,
	createRestaurantTable,
	createRestaurantTableSql,
} from "./schema";
export type { RestaurantColumn } from "./schema";
export { bulkLoad, insertRestaurants, DEFAULT_BATCH_SIZE } from "./loader";
export { parseRestaurantCsv, readRestaurantCsv, writeRestaurantCsv } from "./utils";
export { connectDatabase } from "./db";
export type { DatabaseConnection, RestaurantDatabase } from "./db";
export { loadConfig, DEFAULT_CSV_PATH } from "./config";
export { buildProgram, runCli } from "./cli";
export type { CliDependencies } from "./cli";
