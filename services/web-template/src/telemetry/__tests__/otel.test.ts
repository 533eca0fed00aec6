import { diag, DiagLogLevel } from "@opentelemetry/api";
import { afterEach, describe, expect, it, vi } from "vitest";
import { configureDiagnostics, parseDiagLevel, startTracing, TRACING_DISABLED } from "../otel.js";
import type { CreateTracingSdk } from "../otel.js";

class FakeSdk {
  public started = 0;
  public shutdowns = 0;

  start() {
    this.started += 1;
  }

  async shutdown() {
    this.shutdowns += 1;
  }
}

function fakeFactory() {
  const created: Array<{ endpoint: string; serviceName: string; sdk: FakeSdk }> = [];
  const create: CreateTracingSdk = (endpoint, serviceName) => {
    const sdk = new FakeSdk();
    created.push({ endpoint, serviceName, sdk });
    return sdk;
  };
  return { create, created };
}

describe("tracing", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stays off without an endpoint", async () => {
    const { create, created } = fakeFactory();

    expect(startTracing({ serviceName: "web-template" }, create)).toBe(TRACING_DISABLED);
    expect(startTracing({ endpoint: "   ", serviceName: "web-template" }, create)).toBe(TRACING_DISABLED);
    expect(created).toEqual([]);

    await TRACING_DISABLED.shutdown();
    await TRACING_DISABLED.shutdown();
  });

  it("starts the sdk for a configured endpoint", () => {
    const { create, created } = fakeFactory();

    const tracing = startTracing({ endpoint: " http://collector:4318/v1/traces ", serviceName: "my-site" }, create);
    expect(tracing.enabled).toBe(true);
    expect(created.map(({ endpoint, serviceName }) => ({ endpoint, serviceName }))).toEqual([
      { endpoint: "http://collector:4318/v1/traces", serviceName: "my-site" }
    ]);
    expect(created[0]?.sdk.started).toBe(1);
  });

  it("shuts the sdk down once however often shutdown is called", async () => {
    const { create, created } = fakeFactory();
    const tracing = startTracing({ endpoint: "http://collector:4318/v1/traces", serviceName: "my-site" }, create);

    await tracing.shutdown();
    await tracing.shutdown();
    expect(created[0]?.sdk.shutdowns).toBe(1);
  });

  it("parses diagnostic levels case-insensitively", () => {
    expect(parseDiagLevel("debug")).toBe(DiagLogLevel.DEBUG);
    expect(parseDiagLevel(" WARN ")).toBe(DiagLogLevel.WARN);
    expect(parseDiagLevel("loud")).toBeUndefined();
    expect(parseDiagLevel("toString")).toBeUndefined();
    expect(parseDiagLevel(undefined)).toBeUndefined();
  });

  it("leaves the diag logger alone for an unknown level", () => {
    const setLogger = vi.spyOn(diag, "setLogger").mockImplementation(() => true);

    expect(configureDiagnostics("loud")).toBe(false);
    expect(configureDiagnostics("")).toBe(false);
    expect(setLogger).not.toHaveBeenCalled();
  });

  it("installs the diag logger for a known level", () => {
    const setLogger = vi.spyOn(diag, "setLogger").mockImplementation(() => true);

    expect(configureDiagnostics("error")).toBe(true);
    expect(setLogger).toHaveBeenCalledTimes(1);
    expect(setLogger.mock.calls[0]?.[1]).toBe(DiagLogLevel.ERROR);
  });

  it("does not touch the diag logger when tracing is off", () => {
    const setLogger = vi.spyOn(diag, "setLogger").mockImplementation(() => true);

    startTracing({ serviceName: "web-template", diagLevel: "debug" });
    expect(setLogger).not.toHaveBeenCalled();
  });
});
