export * from "./agents/critic";
export * from "./agents/generator";
export { renderTemplate } from "./agents/template";
export * from "./agents/types";
export * from "./config/config";
export { main, type CliIO, type MainOptions, UsageError } from "./main";
export * from "./patch";
export * from "./pipeline/host";
export * from "./pipeline/loop";
export {
	extractBalanced,
	extractFencedBlock,
	extractJson,
	parseLenientJson,
	stripTrailingCommas,
} from "./utils/json-extract";
