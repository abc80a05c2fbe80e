import pkg from "../../package.json";
import { supportedVariants } from "../protocols/source/parsers";

function hexByte(value: number): string {
	return `0x${value.toString(16).padStart(2, "0")}`;
}

export function version() {
	console.log(`${pkg.name} ${pkg.version}`);

	for (const [marker, variant] of supportedVariants()) {
		console.log(`  decodes:        ${hexByte(marker)} ${variant}`);
	}

	// Set by release builds; local runs fall back to placeholders.
	const commit = process.env.GIT_COMMIT || "unknown-dev-build";
	const date = process.env.BUILD_DATE || new Date().toISOString();

	console.log(`  commit:         ${commit}`);
	console.log(`  build date:     ${date}`);
	console.log(`  node:           ${process.version} (${process.platform}-${process.arch})`);
}
