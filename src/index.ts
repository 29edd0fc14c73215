import { buildApp } from "./app";
import { createServices } from "./services";
import { config } from "./shared/config";
import { logger } from "./shared/logger";
import { seedHospitals } from "./shared/seed";
import { Database } from "./shared/store/Database";
import { PgStore } from "./shared/store/postgres";
import type { HavenStore } from "./shared/store/types";

/**
 * PostgreSQL when DATABASE_URL is set, otherwise a seeded in-memory store
 */
async function openStore(): Promise<HavenStore> {
  if (config.databaseUrl) {
    const store = PgStore.connect(config.databaseUrl);
    await store.migrate();
    const hospitals = await store.hospitals.list();
    logger.info({ hospitals: hospitals.length }, "Database connected");
    return store;
  }

  const store = new Database();
  const seeded = await seedHospitals(store);
  logger.warn({ hospitals: seeded }, "DATABASE_URL not set; using in-memory store");
  return store;
}

/**
 * Start the server
 */
async function start() {
  const store = await openStore();
  const services = createServices({ store, config });
  const app = await buildApp(services);

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, "Shutting down");
    await app.close();
    await services.dispatcher.drain();
    await store.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.port, host: config.host });
  app.log.info(
    {
      http: `http://localhost:${config.port}`,
      docs: `http://localhost:${config.port}/docs`,
      store: config.databaseUrl ? "postgres" : "memory",
    },
    "Haven backend started"
  );
}

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start server");
  process.exit(1);
});
