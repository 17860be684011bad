import type { FastifyInstance } from "fastify";
import type { LoggingSession } from "../core/pipeline";

interface SessionDeps {
  session: LoggingSession;
}

export function registerSessionRoutes(app: FastifyInstance, deps: SessionDeps): void {
  const { session } = deps;

  app.get("/session", () => {
    return {
      ...session.loop.status(),
      config: session.context.config,
      columns: session.registry.header(),
      rowsWritten: session.writer.rows,
      checkpoints: session.checkpointer.count
    };
  });
}
