export * from "./types.js";
export * from "./links.js";
export * from "./dates.js";
export * from "./env.js";
export * from "./status.js";
export * from "./api.js";
