import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { buildLiveSnapshot } from "../core/live-view";
import type { LoggingSession } from "../core/pipeline";

interface StreamDeps {
  session: LoggingSession;
  refreshMs: number;
}

function setSseHeaders(reply: FastifyReply): void {
  reply.raw.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive"
  });
  reply.raw.flushHeaders?.();
}

export function formatSse(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function registerStreamRoutes(app: FastifyInstance, deps: StreamDeps): void {
  const { session, refreshMs } = deps;

  app.get("/stream/live", (request: FastifyRequest, reply: FastifyReply) => {
    reply.hijack();
    setSseHeaders(reply);

    const send = (): void => {
      const snapshot = buildLiveSnapshot(session.loop.status(), session.buffer, session.statistics);
      reply.raw.write(formatSse("live", snapshot));
    };
    send();
    const timer = setInterval(send, refreshMs);

    const close = (): void => {
      clearInterval(timer);
      reply.raw.end();
    };

    request.raw.on("close", close);
  });
}
