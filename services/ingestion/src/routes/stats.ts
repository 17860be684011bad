import type { FastifyInstance } from "fastify";
import type { StatisticsEngine } from "../core/statistics-engine";

interface StatsDeps {
  statistics: StatisticsEngine;
}

export function registerStatsRoutes(app: FastifyInstance, deps: StatsDeps): void {
  const { statistics } = deps;

  app.get("/stats", () => statistics.snapshot());
}
