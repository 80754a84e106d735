import express, { type NextFunction, type Request, type Response } from "express";
import {
  CredentialError,
  TransportError,
  ValidationError,
  fetchApiKey,
  fetchCurrentObservation,
  isWeatherError,
  parseUnit,
  type HttpClient,
  type WeatherError
} from "@wunderground";

export interface AppOptions {
  client: HttpClient;
  /** Fixed key; fetched from the public site when absent. */
  apiKey?: string;
  logger?: Pick<Console, "warn" | "error">;
}

function statusFor(error: WeatherError): number {
  if (error instanceof ValidationError) return 422;
  if (error instanceof TransportError && error.timedOut) return 504;
  return 502;
}

function rejectsKey(error: unknown): boolean {
  return (
    error instanceof CredentialError ||
    (error instanceof TransportError && (error.status === 401 || error.status === 403))
  );
}

export function createApp(options: AppOptions): express.Express {
  const { client, logger = console } = options;
  const app = express();

  let pendingKey: Promise<string> | undefined;
  const configuredKey = options.apiKey?.trim();

  function apiKey(): Promise<string> {
    if (configuredKey) return Promise.resolve(configuredKey);
    if (!pendingKey) {
      const pending = fetchApiKey(client);
      pendingKey = pending;
      void pending.catch(() => {
        if (pendingKey === pending) pendingKey = undefined;
      });
    }
    return pendingKey;
  }

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get("/api/observations/:stationId", async (req: Request, res: Response, next: NextFunction) => {
    const { stationId } = req.params;
    const unitParam = typeof req.query.unit === "string" ? req.query.unit : "m";
    const unit = parseUnit(unitParam);

    if (!unit) {
      res.status(400).json({ error: `unknown unit "${unitParam}", expected m or e` });
      return;
    }

    try {
      const observation = await fetchCurrentObservation(client, await apiKey(), stationId, unit);
      if (!observation) {
        res.status(204).end();
        return;
      }
      res.json(observation);
    } catch (error) {
      if (!isWeatherError(error)) {
        next(error);
        return;
      }
      if (rejectsKey(error) && !configuredKey) pendingKey = undefined;

      const status = statusFor(error);
      logger.warn(`[server] ${stationId}: ${error.kind} error: ${error.message}`);
      res.status(status).json({ error: error.message, kind: error.kind });
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("[server] Observations proxy failed:", error);
    res.status(500).json({ error: "Internal error" });
  });

  return app;
}
