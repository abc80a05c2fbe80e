import type {
	GoldSrcModInfo,
	GoldSrcServerInfo,
	ServerInfo,
	SourceServerInfo,
} from "./parsers";

type Scalar = string | number | bigint | boolean;
type Row = [label: string, value: Scalar | undefined];

export type ServerType = "dedicated" | "non-dedicated" | "sourcetv" | "unknown";
export type Environment = "linux" | "windows" | "mac" | "unknown";

export function describeServerType(code: string): ServerType {
	switch (code.toLowerCase()) {
		case "d":
			return "dedicated";
		case "l":
			return "non-dedicated";
		case "p":
			return "sourcetv";
		default:
			return "unknown";
	}
}

export function describeEnvironment(code: string): Environment {
	switch (code.toLowerCase()) {
		case "l":
			return "linux";
		case "w":
			return "windows";
		case "m":
		case "o":
			return "mac";
		default:
			return "unknown";
	}
}

function printable(value: Scalar): string {
	return typeof value === "string" ? value : value.toString();
}

function sourceRows(info: SourceServerInfo): Row[] {
	return [
		["variant", info.variant],
		["protocolVersion", info.protocolVersion],
		["serverName", info.serverName],
		["mapName", info.mapName],
		["gameDirectory", info.gameDirectory],
		["gameDescription", info.gameDescription],
		["appId", info.appId],
		["numberOfPlayers", info.numberOfPlayers],
		["maxPlayers", info.maxPlayers],
		["numberOfBots", info.numberOfBots],
		["dedicated", info.dedicated],
		["operatingSystem", info.operatingSystem],
		["passwordNeeded", info.passwordNeeded],
		["secure", info.secure],
		["gameVersion", info.gameVersion],
		["serverPort", info.serverPort],
		["serverId", info.serverId],
		["tvPort", info.tvPort],
		["tvName", info.tvName],
		["serverTags", info.serverTags],
		["gameId", info.gameId],
	];
}

function modRows(mod: GoldSrcModInfo | undefined): Row[] {
	if (!mod) return [];
	return [
		["mod.infoUrl", mod.infoUrl],
		["mod.downloadUrl", mod.downloadUrl],
		["mod.version", mod.version],
		["mod.size", mod.size],
		["mod.serverSideOnly", mod.serverSideOnly],
		["mod.customClientDll", mod.customClientDll],
	];
}

function goldSrcRows(info: GoldSrcServerInfo): Row[] {
	return [
		["variant", info.variant],
		["serverAddress", info.serverAddress],
		["serverName", info.serverName],
		["mapName", info.mapName],
		["gameDirectory", info.gameDirectory],
		["gameDescription", info.gameDescription],
		["numberOfPlayers", info.numberOfPlayers],
		["maxPlayers", info.maxPlayers],
		["protocolVersion", info.protocolVersion],
		["dedicated", info.dedicated],
		["operatingSystem", info.operatingSystem],
		["passwordNeeded", info.passwordNeeded],
		["isMod", info.isMod],
		...modRows(info.mod),
		["secure", info.secure],
		["numberOfBots", info.numberOfBots],
	];
}

/**
 * Flattens a decoded record into `[label, value]` pairs in wire order,
 * skipping optional fields the server did not send.
 * The GoldSrc mod sub-record is expanded as `mod.<key>`.
 */
export function listFields(info: ServerInfo): [string, string][] {
	const rows = info.variant === "source" ? sourceRows(info) : goldSrcRows(info);
	const listed: [string, string][] = [];

	for (const [label, value] of rows) {
		if (value !== undefined) listed.push([label, printable(value)]);
	}

	return listed;
}
