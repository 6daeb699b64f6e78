export * from "./http.ts";
export * from "./mock/mod.ts";
