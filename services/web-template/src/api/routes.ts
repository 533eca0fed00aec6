import type { FastifyPluginAsync, FastifyReply } from "fastify";
import type { ViewContext, ViewRenderer } from "../views/viewRenderer.js";
import { isFragmentRequest } from "./fragment.js";

export interface PagesPluginOptions {
  views: ViewRenderer;
}

export const HOME_TEMPLATE = "index.html";
export const GREETING_FRAGMENT = "<p>Hello from the server!</p>";

export const pagesPlugin: FastifyPluginAsync<PagesPluginOptions> = async (app, opts) => {
  const sendHtml = (reply: FastifyReply, html: string) => {
    reply.type("text/html; charset=utf-8");
    return html;
  };

  const renderPage = (reply: FastifyReply, context: ViewContext) =>
    sendHtml(reply, opts.views.render(HOME_TEMPLATE, context));

  app.get("/health", async () => ({ status: "ok" }));

  app.get("/", async (_request, reply) => renderPage(reply, { title: "Home" }));

  app.get("/api/greet", async (request, reply) => {
    if (isFragmentRequest(request)) {
      return sendHtml(reply, GREETING_FRAGMENT);
    }
    return renderPage(reply, { title: "Greeting" });
  });
};
