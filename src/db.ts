import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { Pool } from "pg";

/**
 * Any drizzle PostgreSQL database: node-postgres in production,
 * PGlite in the tests
 */
export type RestaurantDatabase<
	TQueryResult extends PgQueryResultHKT = PgQueryResultHKT,
> = PgDatabase<TQueryResult>;

export interface DatabaseConnection {
	db: NodePgDatabase;
	close: () => Promise<void>;
}

export function connectDatabase(databaseUrl: string): DatabaseConnection {
	const pool = new Pool({ connectionString: databaseUrl });
	pool.on("error", (error) => {
		console.error("Idle database client error:", error);
	});

	return {
		db: drizzle(pool),
		close: () => pool.end(),
	};
}
