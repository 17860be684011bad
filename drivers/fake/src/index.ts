import type { TransportFactory } from "@windlog/driver-core";
import { FakeTransport } from "./fake-transport";

export { FakeTransport };

export const createFakeTransport: TransportFactory = (cfg) => new FakeTransport(cfg);

export default createFakeTransport;
