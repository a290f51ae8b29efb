export interface RestaurantRecord {
	restaurantName: string | null;
	restaurantLocation: string | null;
	restaurantCuisine: string | null;
	restaurantScore: number | null;
	numberOfReviews: number | null;
}

export type InvalidRowPolicy = "abort" | "skip";

export type LoadMode = "append" | "replace";

export interface LoadOptions {
	onInvalidRow?: InvalidRowPolicy;
	mode?: LoadMode;
	batchSize?: number;
}

export interface RowError {
	/** Line the record ends on */
	line: number;
	message: string;
}

export interface LoadResult {
	inserted: number;
	skipped: number;
	errors: RowError[];
}

export interface ParsedCsv {
	records: RestaurantRecord[];
	errors: RowError[];
}

export interface AppConfig {
	databaseUrl: string;
	csvPath: string;
	batchSize: number;
}
