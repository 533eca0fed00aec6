import nunjucks from "nunjucks";
import type { Environment } from "nunjucks";

export type ViewContext = Record<string, unknown>;

/**
 * Renders a named template against a context. Implementations throw when the
 * template cannot be found or fails to render.
 */
export interface ViewRenderer {
  render(name: string, context: ViewContext): string;
}

export class ViewRenderError extends Error {
  public readonly templateName: string;

  constructor(templateName: string, cause: unknown) {
    super(`Failed to render template "${templateName}": ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause
    });
    this.name = "ViewRenderError";
    this.templateName = templateName;
  }
}

export interface ViewRendererOptions {
  /** Re-read templates from disk when they change (used with live reload). */
  watch?: boolean;
}

export class NunjucksViewRenderer implements ViewRenderer {
  private readonly env: Environment;

  constructor(templatesDir: string, options: ViewRendererOptions = {}) {
    const loader = new nunjucks.FileSystemLoader(templatesDir, { noCache: Boolean(options.watch) });
    this.env = new nunjucks.Environment(loader, { autoescape: true, throwOnUndefined: false });
  }

  render(name: string, context: ViewContext): string {
    try {
      return this.env.render(name, context);
    } catch (err) {
      throw new ViewRenderError(name, err);
    }
  }
}

export function createViewRenderer(templatesDir: string, options?: ViewRendererOptions): ViewRenderer {
  return new NunjucksViewRenderer(templatesDir, options);
}
