/**
 * Widget rendering for round screens
 */

export * from "./canvas.js";
export * from "./font.js";
export * from "./text.js";
export * from "./screen.js";
export * from "./ascii-renderer.js";
export * from "./widgets/index.js";
