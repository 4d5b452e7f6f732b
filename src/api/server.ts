import { createApp } from "./app";
import { loadConfig, loadEnvFiles } from "./core/config";

/**
 * Server entry point.
 *
 * Settings come from the environment (see .env.example):
 * - PORT / HOST: listen address (default 0.0.0.0:8000)
 * - DATABASE_URL or DB_*: catalog database
 * - SUGGEST_MIN_SIMILARITY: fuzzy-tier cutoff (default 0.3)
 */
async function start() {
  const envFile = loadEnvFiles();
  if (envFile) {
    console.log(`Loaded env from ${envFile}`);
  } else {
    console.warn("No .env file found. Using environment variables.");
  }

  const config = loadConfig();
  const app = await createApp(config);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info(`${signal} received, shutting down`);
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error(err, "Error during shutdown");
          process.exit(1);
        },
      );
    });
  }

  // Surfaces schema problems at startup; requests still run if it fails
  const health = await app.catalog.checkHealth();
  if (health.ok) {
    app.log.info("Database connection established and health check passed");
  } else {
    for (const issue of health.issues) {
      if (issue.level === "error") app.log.error(issue.message);
      else app.log.warn(issue.message);
    }
  }

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`Swagger docs available at ${config.domain}/api-docs`);
}

start().catch((err: unknown) => {
  console.error("Error starting server:", err);
  process.exit(1);
});
