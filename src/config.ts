import * as dotenv from "dotenv";
import { DEFAULT_BATCH_SIZE } from "./loader";
import type { AppConfig } from "./types";

// Mount point of the docker-entrypoint init volume
export const DEFAULT_CSV_PATH =
	"/docker-entrypoint-initdb.d/quandoo_berlin_results.csv";

/**
 * Read configuration from the environment (after loading .env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (env === process.env) {
		dotenv.config();
	}

	const databaseUrl = env.DATABASE_URL;
	if (!databaseUrl) {
		throw Error("No DATABASE_URL set");
	}

	let batchSize = DEFAULT_BATCH_SIZE;
	if (env.LOAD_BATCH_SIZE) {
		batchSize = Number(env.LOAD_BATCH_SIZE);
		if (!Number.isInteger(batchSize) || batchSize < 1) {
			throw Error(`Invalid LOAD_BATCH_SIZE: ${env.LOAD_BATCH_SIZE}`);
		}
	}

	return {
		databaseUrl,
		csvPath: env.RESTAURANT_CSV_PATH || DEFAULT_CSV_PATH,
		batchSize,
	};
}
