export * from "./shared.js";
export * from "./chrome.js";
export * from "./value.js";
export * from "./bar.js";
export * from "./gauge.js";
export * from "./graph.js";
export * from "./menu.js";
export * from "./compass.js";
export * from "./watch.js";
export * from "./face.js";
