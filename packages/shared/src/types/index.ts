export * from "./session.js";
export * from "./frame.js";
export * from "./input.js";
export * from "./events.js";
export * from "./config.js";
