import { buildApp } from "./app.js";
import { loadEnv } from "./config/env.js";
import { LiveReloadHub } from "./liveReload/liveReloadHub.js";
import { startTracing } from "./telemetry/otel.js";
import { createViewRenderer } from "./views/viewRenderer.js";

async function main() {
  const env = loadEnv();
  const tracing = startTracing(env.otel);

  // Both are created once and only read afterwards; every request handler shares them.
  const views = createViewRenderer(env.templatesDir, { watch: env.liveReload });
  const liveReload = env.liveReload ? new LiveReloadHub({ dirs: [env.templatesDir, env.staticDir] }) : undefined;

  const app = buildApp({
    views,
    staticDir: env.staticDir,
    liveReload,
    exposeInternalErrors: env.exposeInternalErrors,
    logger: { level: env.logLevel }
  });

  try {
    await app.listen({ port: env.port, host: env.host });
  } catch (err) {
    app.log.error({ err }, "Failed to start server");
    process.exit(1);
  }

  if (liveReload) {
    app.log.info({ dirs: [env.templatesDir, env.staticDir] }, "live reload enabled");
  }

  const shutdown = async () => {
    try {
      await app.close();
      await tracing.shutdown();
    } catch (err) {
      app.log.error({ err }, "Shutdown failed");
      process.exit(1);
    }
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("Fatal error", err);
  process.exit(1);
});
