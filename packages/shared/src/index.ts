export * from "./store.js";
export * from "./types/api.js";
export * from "./types/graph.js";
