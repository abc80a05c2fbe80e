export { decode } from "./decode";
export { version } from "./version";
