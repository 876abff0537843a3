export * from "./catalogFilter";
export * from "./selection";
