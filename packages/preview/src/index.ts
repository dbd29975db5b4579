export * from "./config.js";
export * from "./render.js";
export * from "./scenarios.js";
