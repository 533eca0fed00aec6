import { diag, DiagConsoleLogger, DiagLogLevel } from "@opentelemetry/api";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { resourceFromAttributes } from "@opentelemetry/resources";

export interface TracingOptions {
  endpoint?: string;
  serviceName: string;
  /** OTEL_DIAGNOSTIC_LOG_LEVEL; unknown or empty keeps diagnostics off. */
  diagLevel?: string;
}

/** The parts of the OpenTelemetry SDK the server drives. */
export interface TracingSdk {
  start(): void;
  shutdown(): Promise<void>;
}

export type CreateTracingSdk = (endpoint: string, serviceName: string) => TracingSdk;

export interface Tracing {
  readonly enabled: boolean;
  shutdown(): Promise<void>;
}

const DIAG_LEVELS: Record<string, DiagLogLevel> = {
  NONE: DiagLogLevel.NONE,
  ERROR: DiagLogLevel.ERROR,
  WARN: DiagLogLevel.WARN,
  INFO: DiagLogLevel.INFO,
  DEBUG: DiagLogLevel.DEBUG,
  VERBOSE: DiagLogLevel.VERBOSE,
  ALL: DiagLogLevel.ALL
};

export const TRACING_DISABLED: Tracing = {
  enabled: false,
  shutdown: async () => undefined
};

export function parseDiagLevel(raw: string | undefined): DiagLogLevel | undefined {
  const key = (raw ?? "").trim().toUpperCase();
  return Object.hasOwn(DIAG_LEVELS, key) ? DIAG_LEVELS[key] : undefined;
}

export function configureDiagnostics(raw: string | undefined) {
  const level = parseDiagLevel(raw);
  if (level === undefined) return false;
  diag.setLogger(new DiagConsoleLogger(), level);
  return true;
}

export const createNodeTracingSdk: CreateTracingSdk = (endpoint, serviceName) =>
  new NodeSDK({
    resource: resourceFromAttributes({ "service.name": serviceName }),
    traceExporter: new OTLPTraceExporter({ url: endpoint }),
    instrumentations: [getNodeAutoInstrumentations()]
  });

/**
 * Starts OTLP trace export when an endpoint is configured. Without one the
 * server runs untraced and the returned handle does nothing.
 */
export function startTracing(options: TracingOptions, createSdk: CreateTracingSdk = createNodeTracingSdk): Tracing {
  const endpoint = options.endpoint?.trim();
  if (!endpoint) return TRACING_DISABLED;

  configureDiagnostics(options.diagLevel);
  const sdk = createSdk(endpoint, options.serviceName);
  sdk.start();

  let stopping: Promise<void> | null = null;
  return {
    enabled: true,
    shutdown: () => {
      stopping ??= sdk.shutdown();
      return stopping;
    }
  };
}
