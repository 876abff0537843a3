export * from "./artifacts";
export * from "./coordinator";
export * from "./fetchWorker";
export * from "./outcomeChannel";
export * from "./rateLimiter";
export * from "./remoteSource";
export * from "./workItems";
