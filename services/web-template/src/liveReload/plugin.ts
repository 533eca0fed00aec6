import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { ServerResponse } from "node:http";
import type { LiveReloadHub } from "./liveReloadHub.js";

export interface LiveReloadPluginOptions {
  hub: LiveReloadHub;
}

export const LIVE_RELOAD_EVENTS_PATH = "/__livereload";
export const LIVE_RELOAD_SCRIPT_PATH = "/__livereload.js";
export const LIVE_RELOAD_SNIPPET = `<script src="${LIVE_RELOAD_SCRIPT_PATH}"></script>`;

const CLIENT_SCRIPT = `(() => {
  const source = new EventSource(${JSON.stringify(LIVE_RELOAD_EVENTS_PATH)});
  source.addEventListener("reload", () => window.location.reload());
})();
`;

export function injectLiveReloadSnippet(html: string) {
  const idx = html.lastIndexOf("</body>");
  if (idx === -1) return html;
  return `${html.slice(0, idx)}${LIVE_RELOAD_SNIPPET}${html.slice(idx)}`;
}

const liveReloadPluginImpl: FastifyPluginAsync<LiveReloadPluginOptions> = async (app, opts) => {
  const streams = new Set<ServerResponse>();

  app.get(LIVE_RELOAD_SCRIPT_PATH, async (_request, reply) => {
    reply.type("application/javascript; charset=utf-8");
    reply.header("Cache-Control", "no-cache");
    return CLIENT_SCRIPT;
  });

  app.get(LIVE_RELOAD_EVENTS_PATH, async (_request, reply) => {
    const raw = reply.raw;
    reply.hijack();

    raw.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    raw.setHeader("Cache-Control", "no-cache, no-transform");
    raw.setHeader("Connection", "keep-alive");
    raw.flushHeaders?.();

    // Initial comment so browsers treat the stream as open quickly.
    raw.write(`: connected\n\n`);
    streams.add(raw);

    const unsubscribe = opts.hub.subscribe((changedPath) => {
      if (raw.destroyed) return;
      raw.write(`event: reload\n`);
      raw.write(`data: ${JSON.stringify({ path: changedPath })}\n\n`);
    });

    const heartbeat = setInterval(() => {
      if (raw.destroyed) return;
      raw.write(`: ping\n\n`);
    }, 15_000);

    raw.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
      streams.delete(raw);
    });
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    if (typeof payload !== "string") return payload;
    const contentType = reply.getHeader("content-type");
    if (typeof contentType !== "string" || !contentType.startsWith("text/html")) return payload;
    return injectLiveReloadSnippet(payload);
  });

  // Open event streams would otherwise keep app.close() waiting forever.
  app.addHook("preClose", async () => {
    for (const raw of streams) {
      raw.end();
    }
    streams.clear();
  });

  app.addHook("onReady", async () => {
    opts.hub.start(app.log);
  });

  app.addHook("onClose", async () => {
    opts.hub.close();
  });
};

export const liveReloadPlugin = fp(liveReloadPluginImpl, { name: "live-reload" });
