export * from "./config";
export * from "./config/springPresets";
export * from "./engine";
export * from "./numeric";
export * from "./Rubber";
export * from "./types";
export * from "./utils/interval";
export { getLogger } from "./utils/Logger";
