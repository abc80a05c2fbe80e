export { BufferReader } from "../../lib/buffer-reader";
export {
	DecodeError,
	type DecodeErrorKind,
	MalformedPacketError,
	OutOfDataError,
	UnknownResponseTypeError,
} from "../../lib/errors";
export {
	type Environment,
	type ServerType,
	describeEnvironment,
	describeServerType,
	listFields,
} from "./describe";
export {
	EDF,
	type GoldSrcModInfo,
	type GoldSrcServerInfo,
	HEADERS,
	type ResponseVariant,
	type ServerInfo,
	type SourceServerInfo,
	parseGoldSrcInfo,
	parseInfo,
	parseSourceInfo,
	supportedVariants,
} from "./parsers";
