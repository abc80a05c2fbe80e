#!/usr/bin/env node
import { cac } from "cac";
import * as commands from "./commands";

const cli = cac("srcinfo");

cli.command("decode [payload]", "Decode an A2S_INFO response given as hex bytes")
	.option("--file <path>", "Read the raw response bytes from a file")
	.option("--json", "Print the decoded record as JSON")
	.example("srcinfo decode 'ff ff ff ff 49 11 ...'")
	.action(commands.decode);

cli.command("version", "Print the version")
	.action(commands.version);

cli.on("command:*", () => {
	console.error(`Unknown command "${cli.args.join(" ")}".`);
	console.error("Run 'srcinfo --help' for usage.");
	process.exit(1);
});

cli.help();

try {
	cli.parse();
} catch (error) {
	console.error(error instanceof Error ? error.message : error);
	process.exit(1);
}
