import { z } from "zod";
import { createClient } from "@wunderground";
import { createApp } from "./app";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  WU_TIMEOUT: z.coerce.number().int().positive().default(10_000),
  WU_API_KEY: z.string().optional()
});

async function startServer() {
  const env = EnvSchema.parse({
    PORT: process.env.PORT || undefined,
    WU_TIMEOUT: process.env.WU_TIMEOUT || undefined,
    WU_API_KEY: process.env.WU_API_KEY || undefined
  });

  const app = createApp({
    client: createClient({ timeoutMs: env.WU_TIMEOUT }),
    apiKey: env.WU_API_KEY
  });

  app.listen(env.PORT, () => {
    console.log(`[server] Running on http://localhost:${env.PORT}/`);
  });
}

startServer().catch((error) => {
  console.error("[server] Fatal:", error);
  process.exitCode = 1;
});
