import { readFileSync } from "node:fs";
import { DecodeError } from "../lib/errors";
import {
	describeEnvironment,
	describeServerType,
	listFields,
} from "../protocols/source/describe";
import { parseInfo, type ServerInfo } from "../protocols/source/parsers";

export interface DecodeOptions {
	file?: string;
	json?: boolean;
}

/**
 * Parses hex text such as "ff ff ff ff 49 11 ..." into bytes.
 * Whitespace and a leading "0x" are ignored.
 */
export function parseHex(text: string): Buffer {
	const hex = text.replace(/\s/g, "").replace(/^0x/i, "");

	if (hex.length === 0) throw new Error("Empty payload");
	if (!/^[0-9a-f]+$/i.test(hex)) throw new Error("Payload is not valid hex");
	if (hex.length % 2 !== 0) throw new Error("Payload has an odd number of hex digits");

	return Buffer.from(hex, "hex");
}

export function formatInfo(info: ServerInfo): string {
	const rows = listFields(info).map(([label, value]): [string, string] => {
		if (label === "dedicated") return [label, `${value} (${describeServerType(value)})`];
		if (label === "operatingSystem") return [label, `${value} (${describeEnvironment(value)})`];
		return [label, value];
	});
	const width = Math.max(...rows.map(([label]) => label.length)) + 1;

	return rows
		.map(([label, value]) => `${`${label}:`.padEnd(width)} ${value}`)
		.join("\n");
}

export function toJson(info: ServerInfo): string {
	return JSON.stringify(
		info,
		(_key, value: unknown) =>
			typeof value === "bigint" ? value.toString() : value,
		2,
	);
}

function loadPayload(payload: string | undefined, options: DecodeOptions): Buffer {
	if (options.file) return readFileSync(options.file);
	if (payload === undefined) {
		throw new Error("No payload given. Pass hex bytes or --file <path>.");
	}
	return parseHex(payload);
}

export function decode(payload: string | undefined, options: DecodeOptions) {
	let info: ServerInfo;

	try {
		info = parseInfo(loadPayload(payload, options));
	} catch (e) {
		if (e instanceof DecodeError) {
			console.error(`Decode failed (${e.kind}): ${e.message}`);
		} else {
			console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
		}
		process.exit(1);
	}

	console.log(options.json ? toJson(info) : formatInfo(info));
}
