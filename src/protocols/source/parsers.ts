import { BufferReader } from "../../lib/buffer-reader";
import { OutOfDataError, UnknownResponseTypeError } from "../../lib/errors";

// --- TYPES ---

interface CommonServerInfo {
	protocolVersion: number;
	serverName: string;
	mapName: string;
	gameDirectory: string;
	gameDescription: string;
	numberOfPlayers: number;
	maxPlayers: number;
	numberOfBots: number;
	dedicated: string;
	operatingSystem: string;
	passwordNeeded: boolean;
	secure: boolean;
}

export interface SourceServerInfo extends Readonly<CommonServerInfo> {
	readonly variant: "source";
	readonly appId: number;
	readonly gameVersion: string;

	// Extra Data Flags
	readonly serverPort?: number;
	readonly serverId?: bigint;
	readonly tvPort?: number;
	readonly tvName?: string;
	readonly serverTags?: string;
	readonly gameId?: bigint;
}

export interface GoldSrcModInfo {
	readonly infoUrl: string;
	readonly downloadUrl: string;
	readonly version: number;
	readonly size: number;
	readonly serverSideOnly: boolean;
	readonly customClientDll: boolean;
}

export interface GoldSrcServerInfo extends Readonly<CommonServerInfo> {
	readonly variant: "goldsrc";
	readonly serverAddress: string;
	readonly isMod: boolean;
	readonly mod?: GoldSrcModInfo;
}

export type ServerInfo = SourceServerInfo | GoldSrcServerInfo;

export type ResponseVariant = ServerInfo["variant"];

type Writable<T> = { -readonly [K in keyof T]: T[K] };

// --- CONSTANTS ---

export const HEADERS = {
	SINGLE: 0xffffffff,
	RESP_INFO: 0x49,
	RESP_INFO_GOLD: 0x6d,
} as const;

const VARIANTS: ReadonlyMap<number, ResponseVariant> = new Map<
	number,
	ResponseVariant
>([
	[HEADERS.RESP_INFO, "source"],
	[HEADERS.RESP_INFO_GOLD, "goldsrc"],
]);

/** Response markers the dispatcher accepts, in ascending order. */
export function supportedVariants(): [marker: number, variant: ResponseVariant][] {
	return [...VARIANTS].sort(([a], [b]) => a - b);
}

export const EDF = {
	GAME_PORT: 0x80,
	SERVER_ID: 0x10,
	SOURCE_TV: 0x40,
	SERVER_TAGS: 0x20,
	GAME_ID: 0x01,
} as const;

// --- PARSERS ---

/**
 * Decodes a complete A2S_INFO response. The payload starts at the header byte;
 * a leading single-packet prefix (FF FF FF FF) is skipped if still present.
 *
 * @throws {DecodeError} on truncated, malformed or unrecognised payloads.
 */
export function parseInfo(buffer: Buffer): ServerInfo {
	let start = 0;
	if (buffer.length >= 4 && buffer.readUInt32LE(0) === HEADERS.SINGLE) {
		start = 4;
	}

	if (start >= buffer.length) {
		throw new OutOfDataError(start, 1, 0, "header");
	}

	const header = buffer.readUInt8(start);
	const variant = VARIANTS.get(header);
	if (!variant) throw new UnknownResponseTypeError(header, start);

	const reader = new BufferReader(buffer, start + 1);

	switch (variant) {
		case "source":
			return parseSourceInfo(reader);
		case "goldsrc":
			return parseGoldSrcInfo(reader);
		default: {
			const unreachable: never = variant;
			throw new Error(`Unhandled response variant: ${unreachable}`);
		}
	}
}

/** Decodes the Source body; the reader must sit just past the 0x49 marker. */
export function parseSourceInfo(reader: BufferReader): SourceServerInfo {
	const protocolVersion = reader.readByte("protocolVersion");
	const serverName = reader.readString("serverName");
	const mapName = reader.readString("mapName");
	const gameDirectory = reader.readString("gameDirectory");
	const gameDescription = reader.readString("gameDescription");
	const appId = reader.readUInt16LE("appId");
	const numberOfPlayers = reader.readByte("numberOfPlayers");
	const maxPlayers = reader.readByte("maxPlayers");
	const numberOfBots = reader.readByte("numberOfBots");
	const dedicated = String.fromCharCode(reader.readByte("dedicated"));
	const operatingSystem = String.fromCharCode(
		reader.readByte("operatingSystem"),
	);
	const passwordNeeded = reader.readByte("passwordNeeded") === 1;
	const secure = reader.readByte("secure") === 1;
	const gameVersion = reader.readString("gameVersion");

	const info: Writable<SourceServerInfo> = {
		variant: "source",
		protocolVersion,
		serverName,
		mapName,
		gameDirectory,
		gameDescription,
		appId,
		numberOfPlayers,
		maxPlayers,
		numberOfBots,
		dedicated,
		operatingSystem,
		passwordNeeded,
		secure,
		gameVersion,
	};

	if (reader.remaining() === 0) return Object.freeze(info);

	// Each section's offset depends on every earlier enabled section, keep this order.
	const edf = reader.readByte("extraDataFlags");
	if (edf & EDF.GAME_PORT) info.serverPort = reader.readUInt16LE("serverPort");
	if (edf & EDF.SERVER_ID) info.serverId = reader.readUInt64LE("serverId");
	if (edf & EDF.SOURCE_TV) {
		info.tvPort = reader.readUInt16LE("tvPort");
		info.tvName = reader.readString("tvName");
	}
	if (edf & EDF.SERVER_TAGS) info.serverTags = reader.readString("serverTags");
	if (edf & EDF.GAME_ID) info.gameId = reader.readUInt64LE("gameId");

	return Object.freeze(info);
}

/** Decodes the GoldSrc body; the reader must sit just past the 0x6d marker. */
export function parseGoldSrcInfo(reader: BufferReader): GoldSrcServerInfo {
	const serverAddress = reader.readString("serverAddress");
	const serverName = reader.readString("serverName");
	const mapName = reader.readString("mapName");
	const gameDirectory = reader.readString("gameDirectory");
	const gameDescription = reader.readString("gameDescription");
	const numberOfPlayers = reader.readByte("numberOfPlayers");
	const maxPlayers = reader.readByte("maxPlayers");
	const protocolVersion = reader.readByte("protocolVersion");
	const dedicated = String.fromCharCode(reader.readByte("dedicated"));
	const operatingSystem = String.fromCharCode(
		reader.readByte("operatingSystem"),
	);
	const passwordNeeded = reader.readByte("passwordNeeded") === 1;
	const isMod = reader.readByte("isMod") === 1;

	let mod: GoldSrcModInfo | undefined;
	if (isMod) {
		const infoUrl = reader.readString("mod.infoUrl");
		const downloadUrl = reader.readString("mod.downloadUrl");
		reader.readByte("mod.reserved"); // NULL
		mod = {
			infoUrl,
			downloadUrl,
			version: reader.readUInt32LE("mod.version"),
			size: reader.readUInt32LE("mod.size"),
			serverSideOnly: reader.readByte("mod.serverSideOnly") === 1,
			customClientDll: reader.readByte("mod.customClientDll") === 1,
		};
	}

	const secure = reader.readByte("secure") === 1;
	const numberOfBots = reader.readByte("numberOfBots");

	const info: GoldSrcServerInfo = {
		variant: "goldsrc",
		serverAddress,
		serverName,
		mapName,
		gameDirectory,
		gameDescription,
		numberOfPlayers,
		maxPlayers,
		protocolVersion,
		dedicated,
		operatingSystem,
		passwordNeeded,
		isMod,
		...(mod && { mod: Object.freeze(mod) }),
		secure,
		numberOfBots,
	};

	return Object.freeze(info);
}
