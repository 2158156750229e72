export * from "./converters.js";
export * from "./absence.js";
export * from "./from-wire.js";
export * from "./to-wire.js";
