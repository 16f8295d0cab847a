export type * from "./types.js";
export type * from "./tokenizer.js";
export type * from "./heap.js";
export type * from "./splitter.js";
export type * from "./aggregator.js";
export type * from "./writer.js";
export * from "./errors.js";
export * from "./impl/index.js";
