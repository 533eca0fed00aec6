import Fastify, { type FastifyServerOptions } from "fastify";
import fastifyStatic from "@fastify/static";
import { pagesPlugin } from "./api/routes.js";
import { liveReloadPlugin } from "./liveReload/plugin.js";
import type { LiveReloadHub } from "./liveReload/liveReloadHub.js";
import type { ViewRenderer } from "./views/viewRenderer.js";
import { ViewRenderError } from "./views/viewRenderer.js";

export interface BuildAppOptions {
  views: ViewRenderer;
  staticDir: string;
  liveReload?: LiveReloadHub;
  exposeInternalErrors?: boolean;
  logger?: FastifyServerOptions["logger"];
}

function statusCodeOf(err: unknown) {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return 500;
}

export function buildApp(options: BuildAppOptions) {
  const app = Fastify({ logger: options.logger ?? true });

  app.setErrorHandler(async (err, request, reply) => {
    const statusCode = statusCodeOf(err);

    if (statusCode >= 400 && statusCode < 500) {
      // Preserve Fastify's client error codes (e.g., 404 from the static handler).
      reply.code(statusCode);
      return reply.send({ message: err.message });
    }

    if (err instanceof ViewRenderError) {
      request.log.error({ err, template: err.templateName }, "Template render failed");
    } else {
      request.log.error({ err }, "Request failed");
    }
    reply.code(500);
    return reply.send({
      message: options.exposeInternalErrors ? err.message : "Internal Server Error",
      requestId: request.id
    });
  });

  app.setNotFoundHandler(async (_request, reply) => {
    reply.code(404);
    return reply.send({ message: "Not Found" });
  });

  // Registered first so its onSend hook sees every HTML response.
  if (options.liveReload) {
    app.register(liveReloadPlugin, { hub: options.liveReload });
  }

  app.register(fastifyStatic, {
    root: options.staticDir,
    prefix: "/static/",
    decorateReply: false
  });

  app.register(pagesPlugin, { views: options.views });

  return app;
}
