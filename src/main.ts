import { runCli } from "./cli";
import { connectDatabase } from "./db";

/**
 * Main application function
 */
async function main() {
	process.exitCode = await runCli(process.argv.slice(2), {
		connect: connectDatabase,
	});
}

void main();
