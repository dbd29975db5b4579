export * from "./types.js";
export * from "./errors.js";
export * from "./colors.js";
export * from "./geometry.js";
export * from "./backend.js";
export * from "./framebuffer.js";
export * from "./devices.js";
export * from "./encode.js";
