import { describe, expect, it } from "vitest";
import {
	describeEnvironment,
	describeServerType,
	listFields,
} from "./describe";
import { parseInfo } from "./parsers";

const toBuf = (hex: string) => Buffer.from(hex.replace(/\s/g, ""), "hex");

describe("describeServerType", () => {
	it("should map the server type codes", () => {
		expect(describeServerType("d")).toBe("dedicated");
		expect(describeServerType("L")).toBe("non-dedicated");
		expect(describeServerType("p")).toBe("sourcetv");
		expect(describeServerType("z")).toBe("unknown");
	});
});

describe("describeEnvironment", () => {
	it("should map the environment codes", () => {
		expect(describeEnvironment("l")).toBe("linux");
		expect(describeEnvironment("W")).toBe("windows");
		expect(describeEnvironment("m")).toBe("mac");
		expect(describeEnvironment("o")).toBe("mac");
		expect(describeEnvironment("\0")).toBe("unknown");
	});
});

describe("listFields", () => {
	it("should flatten GoldSrc mod info in wire order", () => {
		// "a:1" "N" "M" "F" "G", 1/2 players, protocol 47, 'l' 'l', open, mod
		const info = parseInfo(
			toBuf(
				"6d 613a3100 4e00 4d00 4600 4700 01 02 2f 6c 6c 00 01 " +
					"7500 6400 00 03000000 00100000 00 01 01 00",
			),
		);

		expect(listFields(info).slice(12)).toEqual([
			["isMod", "true"],
			["mod.infoUrl", "u"],
			["mod.downloadUrl", "d"],
			["mod.version", "3"],
			["mod.size", "4096"],
			["mod.serverSideOnly", "false"],
			["mod.customClientDll", "true"],
			["secure", "true"],
			["numberOfBots", "0"],
		]);
	});

	it("should print 64-bit values in decimal", () => {
		const info = parseInfo(
			toBuf(
				"49 11 4e00 4d00 4600 4700 0a00 00 00 00 64 6c 00 00 3100 " +
					"10 ffffffff 01000000",
			),
		);

		expect(listFields(info).at(-1)).toEqual(["serverId", "8589934591"]);
	});
});
