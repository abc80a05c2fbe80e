import { describe, expect, it } from "vitest";
import { BufferReader } from "./buffer-reader";
import { MalformedPacketError, OutOfDataError } from "./errors";

const toBuf = (hex: string) => Buffer.from(hex.replace(/\s/g, ""), "hex");

describe("BufferReader", () => {
	it("should read little-endian unsigned integers in sequence", () => {
		const reader = new BufferReader(toBuf("ff ffff ffffffff 3412"));

		expect(reader.readByte()).toBe(255);
		expect(reader.readUInt16LE()).toBe(65535);
		expect(reader.readUInt32LE()).toBe(4294967295);
		expect(reader.readUInt16LE()).toBe(0x1234);
		expect(reader.remaining()).toBe(0);
	});

	it("should combine two 32-bit words into a 64-bit value, low word first", () => {
		const reader = new BufferReader(toBuf("01000000 02000000"));

		expect(reader.readUInt64LE()).toBe(0x0000000200000001n);
		expect(reader.position).toBe(8);
	});

	it("should keep the full range of the high word", () => {
		const reader = new BufferReader(toBuf("ffffffff ffffffff"));
		expect(reader.readUInt64LE()).toBe(18446744073709551615n);
	});

	it("should read null-terminated strings without the terminator", () => {
		const reader = new BufferReader(toBuf("48656c6c6f00 00 41"));

		expect(reader.readString()).toBe("Hello");
		expect(reader.readString()).toBe("");
		expect(reader.position).toBe(7);
		expect(reader.remaining()).toBe(1);
	});

	it("should decode strings as UTF-8", () => {
		const reader = new BufferReader(Buffer.from("Zürich\0", "utf-8"));
		expect(reader.readString()).toBe("Zürich");
	});

	it("should start at the given offset", () => {
		const reader = new BufferReader(toBuf("49 07 08"), 1);

		expect(reader.position).toBe(1);
		expect(reader.remaining()).toBe(2);
		expect(reader.readByte()).toBe(7);
	});

	// --- COVERAGE: ERROR HANDLING ---

	it("should throw OutOfDataError when no byte remains", () => {
		const reader = new BufferReader(Buffer.alloc(0));
		expect(() => reader.readByte()).toThrow(OutOfDataError);
	});

	it("should report field, offset and sizes on a short read", () => {
		const reader = new BufferReader(toBuf("01 0203"));
		reader.readByte();

		let caught: unknown;
		try {
			reader.readUInt32LE("serverId");
		} catch (e) {
			caught = e;
		}

		expect(caught).toBeInstanceOf(OutOfDataError);
		if (!(caught instanceof OutOfDataError)) return;
		expect(caught.kind).toBe("OutOfData");
		expect(caught.field).toBe("serverId");
		expect(caught.offset).toBe(1);
		expect(caught.needed).toBe(4);
		expect(caught.available).toBe(2);
		expect(caught.message).toBe(
			"Out of data reading serverId at offset 1: need 4 byte(s), have 2",
		);
	});

	it("should not advance after a failed read", () => {
		const reader = new BufferReader(toBuf("01"));

		expect(() => reader.readUInt16LE()).toThrow(OutOfDataError);
		expect(reader.position).toBe(0);
		expect(reader.readByte()).toBe(1);
	});

	it("should fail a 64-bit read when the high word is missing", () => {
		const reader = new BufferReader(toBuf("01000000 0200"));
		expect(() => reader.readUInt64LE("gameId")).toThrow(
			"Out of data reading gameId at offset 4: need 4 byte(s), have 2",
		);
	});

	it("should throw OutOfDataError for a string read with nothing left", () => {
		const reader = new BufferReader(toBuf("4100"));
		reader.readString();

		expect(() => reader.readString("serverTags")).toThrow(OutOfDataError);
		expect(() => reader.readString("serverTags")).toThrow(
			"Out of data reading serverTags at offset 2: need 1 byte(s), have 0",
		);
	});

	it("should throw MalformedPacketError for an unterminated string", () => {
		const reader = new BufferReader(toBuf("00 414243"));
		reader.readString();

		expect(() => reader.readString("mapName")).toThrow(MalformedPacketError);
		expect(() => reader.readString("mapName")).toThrow(
			"Malformed packet: unterminated string mapName at offset 1",
		);
	});
});
