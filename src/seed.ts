import { config } from "./shared/config";
import { logger } from "./shared/logger";
import { seedHospitals } from "./shared/seed";
import { PgStore } from "./shared/store/postgres";

/**
 * Create the schema and load the Nairobi hospitals into PostgreSQL
 */
async function main() {
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required to seed PostgreSQL");
  }

  const store = PgStore.connect(config.databaseUrl);
  try {
    await store.migrate();
    const count = await seedHospitals(store);
    logger.info({ hospitals: count }, "Seed complete");
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Seed failed");
  process.exit(1);
});
