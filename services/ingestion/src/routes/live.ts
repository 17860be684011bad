import type { FastifyInstance } from "fastify";
import { buildLiveSnapshot } from "../core/live-view";
import type { LoggingSession } from "../core/pipeline";

interface LiveDeps {
  session: LoggingSession;
}

export function registerLiveRoutes(app: FastifyInstance, deps: LiveDeps): void {
  const { session } = deps;

  app.get("/live", () => buildLiveSnapshot(session.loop.status(), session.buffer, session.statistics));
}
