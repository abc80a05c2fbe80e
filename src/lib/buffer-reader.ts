import { MalformedPacketError, OutOfDataError } from "./errors";

export class BufferReader {
	private offset: number;

	constructor(
		private readonly buffer: Buffer,
		start = 0,
	) {
		this.offset = Math.min(Math.max(start, 0), buffer.length);
	}

	get position(): number {
		return this.offset;
	}

	// ==========================================
	// Source Engine / GoldSrc (Little Endian)
	// ==========================================

	/**
	 * Reads an unsigned 8-bit integer.
	 */
	readByte(field?: string): number {
		this.checkBounds(1, field);
		const val = this.buffer.readUInt8(this.offset);
		this.offset += 1;
		return val;
	}

	/**
	 * Reads an unsigned 16-bit integer (LE).
	 */
	readUInt16LE(field?: string): number {
		this.checkBounds(2, field);
		const val = this.buffer.readUInt16LE(this.offset);
		this.offset += 2;
		return val;
	}

	/**
	 * Reads an unsigned 32-bit integer (LE).
	 */
	readUInt32LE(field?: string): number {
		this.checkBounds(4, field);
		const val = this.buffer.readUInt32LE(this.offset);
		this.offset += 4;
		return val;
	}

	/**
	 * Reads a 64-bit unsigned integer sent as two 32-bit LE words, low word first.
	 */
	readUInt64LE(field?: string): bigint {
		const low = this.readUInt32LE(field);
		const high = this.readUInt32LE(field);
		return (BigInt(high) << 32n) | BigInt(low);
	}

	/**
	 * Reads a Null-Terminated string (Source Engine style).
	 * The terminator is consumed but not returned. An empty remainder is
	 * OutOfData; bytes without a terminator are MalformedPacket.
	 */
	readString(field?: string): string {
		this.checkBounds(1, field);
		const end = this.buffer.indexOf(0x00, this.offset);
		if (end === -1) throw new MalformedPacketError(this.offset, field);
		const str = this.buffer.toString("utf-8", this.offset, end);
		this.offset = end + 1;
		return str;
	}

	// ==========================================
	// Utilities
	// ==========================================

	remaining(): number {
		return this.buffer.length - this.offset;
	}

	private checkBounds(bytesNeeded: number, field?: string) {
		if (bytesNeeded > this.remaining()) {
			throw new OutOfDataError(
				this.offset,
				bytesNeeded,
				this.remaining(),
				field,
			);
		}
	}
}
