export * from "./common/scalars";
export * from "./domain/telemetry";
export * from "./domain/parameters";
export * from "./domain/session";
