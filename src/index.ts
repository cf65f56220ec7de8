import "dotenv/config";

import { createApp, createServices } from "./app";
import { createPool } from "./db/pool";
import { runMigrations } from "./db/runMigrations";
import { toAppConfig } from "./env";
import { validateEnvironment } from "./middleware/validateEnv";
import { createMemoryStore } from "./services/inMemoryStore";
import { createPgStore } from "./services/pgStore";
import { DataStore } from "./services/store";

async function openStore(databaseUrl: string | undefined, ssl: boolean): Promise<DataStore> {
  if (!databaseUrl) {
    console.warn("[server] No DATABASE_URL - using the in-memory store");
    return createMemoryStore();
  }
  const pool = createPool(databaseUrl, ssl);
  await runMigrations(pool);
  return createPgStore(pool);
}

async function main(): Promise<void> {
  const env = validateEnvironment();
  const config = toAppConfig(env);
  const store = await openStore(env.DATABASE_URL, env.DATABASE_SSL === "true");
  const services = createServices(store, config);

  const admin = await services.auth.bootstrapAdmin(env.ADMIN_USERNAME, env.ADMIN_PASSWORD);
  if (admin) {
    console.log(`[server] Created account "${admin}" from ADMIN_USERNAME; change its password after logging in`);
  } else if (await services.auth.needsSetup()) {
    console.log("[server] No accounts yet - POST /api/v1/auth/setup to create the first one");
  }

  const app = createApp(services, config);
  const port = Number(env.PORT);
  const server = app.listen(port, () => {
    console.log(`Meal tracker backend listening on port ${port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("[server] Failed to close store:", err);
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[server] Failed to start:", err);
  process.exit(1);
});
