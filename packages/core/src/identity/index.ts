export * from "./ids.js";
export * from "./idGenerator.js";
