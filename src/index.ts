export * from "./types.js";
export * from "./identity.js";
export * from "./cell.js";
export * from "./dispatch.js";
export * from "./resolver.js";
export * from "./container.js";
export * from "./trace.js";
export * from "./config.js";
export * from "./state.js";
