import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Server } from "http";
import type { AddressInfo } from "net";
import { createClient, type FetchLike } from "@wunderground";
import { createApp, type AppOptions } from "../app";

const HOME_PAGE = '<script src="https://api.weather.com/v3/x?apiKey=cafe0123"></script>';

function observationBody(humidity: number): string {
  return JSON.stringify({
    observations: [
      {
        stationID: "IPARIS18204",
        obsTimeUtc: "2023-01-01T12:00:00Z",
        humidity,
        metric: { temp: 21.5 }
      }
    ]
  });
}

describe("createApp", () => {
  let upstream: ReturnType<typeof vi.fn<FetchLike>>;
  let logger: NonNullable<AppOptions["logger"]>;
  let server: Server | undefined;

  async function start(options: Partial<AppOptions> = {}): Promise<string> {
    const app = createApp({
      client: createClient({ timeoutMs: 50, fetch: upstream }),
      apiKey: "test-key",
      logger,
      ...options
    });
    const listening = app.listen(0);
    server = listening;
    await new Promise<void>((resolve) => listening.once("listening", () => resolve()));
    const { port } = listening.address() as AddressInfo;
    return `http://127.0.0.1:${port}`;
  }

  beforeEach(() => {
    upstream = vi.fn<FetchLike>();
    logger = { warn: vi.fn(), error: vi.fn() };
  });

  afterEach(async () => {
    const listening = server;
    server = undefined;
    if (listening) await new Promise<void>((resolve) => listening.close(() => resolve()));
  });

  it("answers health checks", async () => {
    const base = await start();

    const response = await fetch(`${base}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true });
  });

  it("returns the converted observation", async () => {
    upstream.mockResolvedValue(new Response(observationBody(55), { status: 200 }));
    const base = await start();

    const response = await fetch(`${base}/api/observations/IPARIS18204?unit=m`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      stationId: "IPARIS18204",
      observedAt: "2023-01-01T12:00:00.000Z",
      unit: "metric",
      location: {},
      measurements: { temperature: 21.5, humidity: 55 }
    });
    const url = new URL(upstream.mock.calls[0][0]);
    expect(url.searchParams.get("apiKey")).toBe("test-key");
    expect(url.searchParams.get("stationId")).toBe("IPARIS18204");
  });

  it("answers 204 when the station has no data", async () => {
    upstream.mockResolvedValue(new Response(null, { status: 204 }));
    const base = await start();

    const response = await fetch(`${base}/api/observations/IPARIS18204`);

    expect(response.status).toBe(204);
  });

  it("rejects an unknown unit", async () => {
    const base = await start();

    const response = await fetch(`${base}/api/observations/IPARIS18204?unit=kelvin`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'unknown unit "kelvin", expected m or e' });
    expect(upstream).not.toHaveBeenCalled();
  });

  it("answers 422 for an implausible reading", async () => {
    upstream.mockResolvedValue(new Response(observationBody(140), { status: 200 }));
    const base = await start();

    const response = await fetch(`${base}/api/observations/IPARIS18204`);

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: "humidity: 140 outside [0, 100]",
      kind: "validation"
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "[server] IPARIS18204: validation error: humidity: 140 outside [0, 100]"
    );
  });

  it("answers 502 when the service fails", async () => {
    upstream.mockResolvedValue(new Response("oops", { status: 500, statusText: "Internal Server Error" }));
    const base = await start();

    const response = await fetch(`${base}/api/observations/IPARIS18204`);

    expect(response.status).toBe(502);
    const body = await response.json();
    expect(body).toMatchObject({ kind: "transport" });
    expect(JSON.stringify(body)).toContain("apiKey=REDACTED");
    expect(JSON.stringify(body)).not.toContain("test-key");
  });

  it("answers 504 when the service times out", async () => {
    upstream.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const base = await start();

    const response = await fetch(`${base}/api/observations/IPARIS18204`);

    expect(response.status).toBe(504);
    expect(await response.json()).toMatchObject({ kind: "transport" });
  });

  it("fetches the key once and forgets it after a rejection", async () => {
    let observationCalls = 0;
    upstream.mockImplementation(async (url) => {
      if (url === "https://www.wunderground.com") return new Response(HOME_PAGE, { status: 200 });
      observationCalls++;
      return observationCalls === 2
        ? new Response("{}", { status: 401, statusText: "Unauthorized" })
        : new Response(observationBody(55), { status: 200 });
    });
    const base = await start({ apiKey: undefined });
    const homeCalls = () => upstream.mock.calls.filter(([url]) => url === "https://www.wunderground.com").length;

    expect((await fetch(`${base}/api/observations/IPARIS18204`)).status).toBe(200);
    expect((await fetch(`${base}/api/observations/IPARIS18204`)).status).toBe(502);
    expect(homeCalls()).toBe(1);
    expect((await fetch(`${base}/api/observations/IPARIS18204`)).status).toBe(200);
    expect(homeCalls()).toBe(2);
  });
});
