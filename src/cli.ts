import { Command, CommanderError } from "commander";
import type { PgQueryResultHKT } from "drizzle-orm/pg-core";
import { loadConfig } from "./config";
import type { RestaurantDatabase } from "./db";
import { bulkLoad } from "./loader";
import { createRestaurantTable } from "./schema";

export interface CliDependencies<TQueryResult extends PgQueryResultHKT> {
	connect: (databaseUrl: string) => {
		db: RestaurantDatabase<TQueryResult>;
		close: () => Promise<void>;
	};
	env?: NodeJS.ProcessEnv;
}

export function buildProgram<TQueryResult extends PgQueryResultHKT>(
	deps: CliDependencies<TQueryResult>
): Command {
	const env = deps.env ?? process.env;
	const program = new Command();

	// Subcommands inherit this, so a usage error rejects instead of exiting
	program.exitOverride();

	program
		.name("restaurant-data")
		.description("Create and bulk-load the restaurant_data table");

	program
		.command("init")
		.description("Create the restaurant_data table")
		.option("--if-not-exists", "do not fail when the table already exists")
		.action(async (options: { ifNotExists?: boolean }) => {
			const config = loadConfig(env);
			const { db, close } = deps.connect(config.databaseUrl);
			try {
				await createRestaurantTable(db, { ifNotExists: options.ifNotExists });
			} finally {
				await close();
			}
		});

	program
		.command("load")
		.description("Bulk-load a header-prefixed CSV file into restaurant_data")
		.argument("[path]", "CSV file (defaults to RESTAURANT_CSV_PATH)")
		.option("--replace", "delete existing rows before loading")
		.option("--skip-invalid", "skip malformed rows instead of aborting")
		.option("--create", "create the table first if it does not exist")
		.action(
			async (
				csvPath: string | undefined,
				options: { replace?: boolean; skipInvalid?: boolean; create?: boolean }
			) => {
				const config = loadConfig(env);
				const { db, close } = deps.connect(config.databaseUrl);
				try {
					if (options.create) {
						await createRestaurantTable(db, { ifNotExists: true });
					}
					const result = await bulkLoad(db, csvPath ?? config.csvPath, {
						mode: options.replace ? "replace" : "append",
						onInvalidRow: options.skipInvalid ? "skip" : "abort",
						batchSize: config.batchSize,
					});
					console.log(
						`Done: ${result.inserted} inserted, ${result.skipped} skipped`
					);
				} finally {
					await close();
				}
			}
		);

	return program;
}

/**
 * Run the CLI on user arguments (without node and script path) and
 * resolve to the process exit code
 */
export async function runCli<TQueryResult extends PgQueryResultHKT>(
	args: string[],
	deps: CliDependencies<TQueryResult>
): Promise<number> {
	try {
		await buildProgram(deps).parseAsync(args, { from: "user" });
		return 0;
	} catch (error) {
		// Commander has already printed usage errors, help and version
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		console.error("Application error:", error);
		return 1;
	}
}
