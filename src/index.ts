import { ConfigError, loadConfig } from "./common/config.js";
import { describeError, log } from "./common/logger.js";
import { InMemoryFeederStore } from "./db/memory.js";
import { PostgresStore } from "./db/postgres.js";
import type { FeederStore } from "./db/store.js";
import { buildServer } from "./server.js";

function isEaddrInUse(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EADDRINUSE";
}

async function openStore(databaseUrl: string | undefined): Promise<FeederStore> {
  const pg = PostgresStore.fromEnv(databaseUrl);
  if (!pg) {
    log.warn("DATABASE_URL not set, using in-memory store; data is lost on restart");
    return new InMemoryFeederStore();
  }
  await pg.migrate();
  return pg;
}

async function boot(): Promise<void> {
  const config = loadConfig();
  const store = await openStore(config.databaseUrl);
  const { app } = await buildServer({ config, store });

  if (!config.deviceAuth.signatureEnabled) {
    log.warn("device signatures disabled; polls are accepted without X-Sign");
  }
  if (!config.security.adminApiToken) {
    log.warn("ADMIN_API_TOKEN not set; admin routes are open");
  }

  const shutdown = (signal: string) => {
    log.info("shutting down", { signal });
    app
      .close()
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("shutdown failed", { error: describeError(err) });
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ port: config.server.port, host: config.server.host });
  log.info("feeder sync server listening", {
    port: config.server.port,
    signatureEnabled: config.deviceAuth.signatureEnabled,
    store: store instanceof PostgresStore ? "postgres" : "memory"
  });
}

boot().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    log.error("invalid configuration", { issues: error.issues });
  } else if (isEaddrInUse(error)) {
    log.error("port already in use", { error: describeError(error) });
  } else {
    log.error("boot failed", { error: describeError(error) });
  }
  process.exit(1);
});
