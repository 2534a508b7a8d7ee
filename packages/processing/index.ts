export * from "./clean-trips";
export * from "./config";
export * from "./errors";
export * from "./fetch-data";
export * from "./trip-cache";
export * from "./trip-store";
export * from "./types";
export * from "./utils";
export * from "./zones";
