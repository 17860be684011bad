import { fileURLToPath } from "node:url";
import { setupGracefulShutdown } from "@windlog/health";
import { loadConfig } from "./config";
import { buildServer } from "./server";

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    const server = await buildServer({ config });
    const { loop, statistics } = server.ingestion;

    setupGracefulShutdown(server, {
      drain: async (signal) => {
        server.ingestion.context.cancel(signal);
        const summary = await loop.run();
        server.log.info({ summary }, "ingestion: session closed");
      }
    });

    process.on("SIGUSR1", () => {
      server.log.info({ stats: statistics.snapshot() }, "ingestion: statistics");
    });

    await server.listen({ port: config.http.port, host: config.http.host });
    server.log.info(`ingestion listening on ${config.http.host}:${String(config.http.port)}`);

    const summary = await loop.run();
    server.log.info({ summary }, "ingestion: session finished");
    if (!server.ingestion.context.cancelled) {
      // Transport ran out of data; nothing left to serve.
      await server.close();
      process.exit(summary.lastError ? 1 : 0);
    }
  } catch (error) {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`ingestion failed to start: ${message}\n`);
    process.exit(1);
  }
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  void main();
}
