import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import { buildServer } from "./server";
import { closeDb } from "./infra/db/client";
import { startWorkers } from "./infra/queue/start-workers";

type ShutdownStep = { name: string; run: () => Promise<void> };

async function start() {
  const { app, env, container } = await buildServer();
  const workers = await startWorkers(container, env, app.log);

  // order matters: stop taking jobs, drain sockets and HTTP, then the pool
  const steps: ShutdownStep[] = [
    { name: "workers", run: async () => workers?.close() },
    { name: "http+ws", run: () => app.close() },
    { name: "database", run: closeDb },
  ];

  let shuttingDown = false;

  const shutdown = async (reason: string, exitCode = 0) => {
    if (shuttingDown) return;
    shuttingDown = true;

    app.log.info({ reason }, "Graceful shutdown started");

    for (const step of steps) {
      try {
        await step.run();
      } catch (err) {
        app.log.error({ err, step: step.name }, "Shutdown step failed");
      }
    }

    app.log.info({ reason }, "Graceful shutdown finished");

    if (reason === "SIGUSR2") {
      process.kill(process.pid, "SIGUSR2");
      return;
    }

    process.exit(exitCode);
  };

  for (const signal of ["SIGINT", "SIGTERM", "SIGUSR2"] as const) {
    process.once(signal, () => void shutdown(signal));
  }
  process.once("uncaughtException", (err) => {
    app.log.error({ err }, "uncaughtException");
    void shutdown("uncaughtException", 1);
  });
  process.once("unhandledRejection", (err) => {
    app.log.error({ err }, "unhandledRejection");
    void shutdown("unhandledRejection", 1);
  });

  try {
    await app.listen({ port: env.PORT, host: "0.0.0.0" });
  } catch (err) {
    app.log.error({ err }, "Failed to listen");
    await shutdown("listen-failed", 1);
  }
}

void start();
