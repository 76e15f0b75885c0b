export * from "./random/seeded-random";
export * from "./schemas/grid";
export * from "./schemas/parse";
export * from "./schemas/query";
export * from "./types/capabilities";
export * from "./types/error";
export * from "./types/geometry";
export * from "./types/result";
export * from "./utils/encoding";
