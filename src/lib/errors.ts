export type DecodeErrorKind =
	| "OutOfData"
	| "MalformedPacket"
	| "UnknownResponseType";

/**
 * Base class for every failure raised while decoding a server response.
 * `offset` is the absolute position in the payload where the failing read began.
 */
export abstract class DecodeError extends Error {
	abstract readonly kind: DecodeErrorKind;

	constructor(
		message: string,
		readonly offset: number,
		readonly field?: string,
	) {
		super(message);
		this.name = new.target.name;
	}
}

export class OutOfDataError extends DecodeError {
	readonly kind = "OutOfData";

	constructor(
		offset: number,
		readonly needed: number,
		readonly available: number,
		field?: string,
	) {
		super(
			`Out of data reading ${field ?? "value"} at offset ${offset}: need ${needed} byte(s), have ${available}`,
			offset,
			field,
		);
	}
}

export class MalformedPacketError extends DecodeError {
	readonly kind = "MalformedPacket";

	constructor(offset: number, field?: string) {
		super(
			`Malformed packet: unterminated string ${field ?? "value"} at offset ${offset}`,
			offset,
			field,
		);
	}
}

export class UnknownResponseTypeError extends DecodeError {
	readonly kind = "UnknownResponseType";

	constructor(
		readonly header: number,
		offset: number,
	) {
		super(
			`Unknown A2S_INFO header: 0x${header.toString(16)} at offset ${offset}`,
			offset,
			"header",
		);
	}
}
