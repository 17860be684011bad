import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { toRecordPayload } from "@windlog/schemas";
import type { SampleBuffer } from "../core/sample-buffer";

interface RecordRouteDeps {
  buffer: SampleBuffer;
}

interface RecordQuerystring {
  limit?: string | number;
}

const DEFAULT_LIMIT = 50;

export function registerRecordRoutes(app: FastifyInstance, deps: RecordRouteDeps): void {
  const { buffer } = deps;

  app.get("/records", (request: FastifyRequest<{ Querystring: RecordQuerystring }>, reply: FastifyReply) => {
    const limit = parseLimit(request.query.limit);
    if (limit === "INVALID") {
      return reply.status(400).send({ error: "Invalid limit" });
    }
    return buffer.recent(limit ?? DEFAULT_LIMIT).map(toRecordPayload);
  });
}

export function parseLimit(limit: string | number | undefined): number | undefined | "INVALID" {
  if (typeof limit === "undefined" || limit === "") {
    return undefined;
  }
  const numeric = typeof limit === "number" ? limit : Number(limit);
  if (!Number.isInteger(numeric) || numeric < 0) {
    return "INVALID";
  }
  return numeric;
}
