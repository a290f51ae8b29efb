import * as fs from "fs";
import type { PGlite } from "@electric-sql/pglite";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { runCli } from "../../src/cli";
import { TableExistsError } from "../../src/errors";
import { createRestaurantTable, restaurantData } from "../../src/schema";
import {
	createTempDir,
	createTestDatabase,
	HEADER,
	writeCsvFixture,
} from "../fixtures/test-helpers";

const TEST_URL = "postgres://localhost/restaurant_test";

describe("restaurant-data CLI", () => {
	let client: PGlite;
	let db: ReturnType<typeof createTestDatabase>["db"];
	let dir: string;
	let close: Mock<() => Promise<void>>;
	let connect: Mock<(url: string) => { db: typeof db; close: typeof close }>;

	beforeEach(() => {
		({ client, db } = createTestDatabase());
		dir = createTempDir();
		close = vi.fn(async () => {});
		connect = vi.fn((_url: string) => ({ db, close }));
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		fs.rmSync(dir, { recursive: true, force: true });
		await client.close();
	});

	function run(args: string[], env: NodeJS.ProcessEnv = { DATABASE_URL: TEST_URL }) {
		return runCli(args, { connect, env });
	}

	it("exits with 1 when DATABASE_URL is missing", async () => {
		expect(await run(["init"], {})).toBe(1);
		expect(console.error).toHaveBeenCalledWith(
			"Application error:",
			expect.objectContaining({ message: "No DATABASE_URL set" })
		);
		expect(connect).not.toHaveBeenCalled();
	});

	it("creates the table with init and closes the connection", async () => {
		expect(await run(["init"])).toBe(0);

		expect(connect).toHaveBeenCalledWith(TEST_URL);
		expect(close).toHaveBeenCalledTimes(1);
		expect(await db.select().from(restaurantData)).toEqual([]);
	});

	it("fails init on an existing table unless --if-not-exists is given", async () => {
		await createRestaurantTable(db);

		expect(await run(["init"])).toBe(1);
		expect(console.error).toHaveBeenCalledWith(
			"Application error:",
			expect.any(TableExistsError)
		);
		expect(close).toHaveBeenCalledTimes(1);
		expect(await run(["init", "--if-not-exists"])).toBe(0);
	});

	it("loads a file, creating the table with --create", async () => {
		const file = writeCsvFixture(dir, "one.csv", [
			HEADER,
			'"A","Berlin","Italian",4.5,120',
		]);

		expect(await run(["load", file, "--create"])).toBe(0);
		expect(await db.select().from(restaurantData)).toEqual([
			{
				restaurantName: "A",
				restaurantLocation: "Berlin",
				restaurantCuisine: "Italian",
				restaurantScore: 4.5,
				numberOfReviews: 120,
			},
		]);
		expect(console.log).toHaveBeenCalledWith("Done: 1 inserted, 0 skipped");
	});

	it("falls back to RESTAURANT_CSV_PATH", async () => {
		const file = writeCsvFixture(dir, "env.csv", [HEADER, "A,Mitte,Thai,4,1"]);

		const code = await run(["load", "--create"], {
			DATABASE_URL: TEST_URL,
			RESTAURANT_CSV_PATH: file,
		});

		expect(code).toBe(0);
		expect(await db.select().from(restaurantData)).toHaveLength(1);
	});

	it("aborts on a malformed row unless --skip-invalid is given", async () => {
		await createRestaurantTable(db);
		const file = writeCsvFixture(dir, "bad.csv", [
			HEADER,
			"A,Mitte,Thai,4,1",
			"B,Mitte,Cafe,notanumber,10",
		]);

		expect(await run(["load", file])).toBe(1);
		expect(await db.select().from(restaurantData)).toEqual([]);

		expect(await run(["load", file, "--skip-invalid"])).toBe(0);
		expect(console.log).toHaveBeenCalledWith("Done: 1 inserted, 1 skipped");
		expect(await db.select().from(restaurantData)).toHaveLength(1);
	});

	it("appends by default and replaces with --replace", async () => {
		await createRestaurantTable(db);
		const file = writeCsvFixture(dir, "one.csv", [HEADER, "A,Mitte,Thai,4,1"]);

		await run(["load", file]);
		await run(["load", file]);
		expect(await db.select().from(restaurantData)).toHaveLength(2);

		expect(await run(["load", file, "--replace"])).toBe(0);
		expect(await db.select().from(restaurantData)).toHaveLength(1);
	});

	it("returns commander's exit code for an unknown option", async () => {
		vi.spyOn(process.stderr, "write").mockImplementation(() => true);

		expect(await run(["load", "--nope"])).toBe(1);
		expect(connect).not.toHaveBeenCalled();
	});
});
