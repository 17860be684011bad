import type { TransportFactory } from "@windlog/driver-core";
import { ReplayTransport } from "./replay-transport";

export { ReplayTransport };
export type { ReplayStatus } from "./replay-transport";
export { ReplayConnectionSchema, type ReplayConnection } from "./config";

export const createReplayTransport: TransportFactory = (cfg) => new ReplayTransport(cfg);

export default createReplayTransport;
