import { z } from "zod";

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

const httpUrl = z.string().refine(isHttpUrl, {
  message: "must be an http or https URL",
});

const configSchema = z.object({
  SWARM_BEE_API_URL: httpUrl,
  UPSTREAM_TIMEOUT_SECONDS: z.coerce.number().positive().default(10),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().default(8000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SSL_KEYFILE: z.string().optional(),
  SSL_CERTFILE: z.string().optional(),
});

export type ApiConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new Error(
      `Invalid API configuration: ${JSON.stringify(issues, null, 2)}`,
    );
  }
  return result.data;
}

export function upstreamTimeoutMs(config: ApiConfig): number {
  return Math.round(config.UPSTREAM_TIMEOUT_SECONDS * 1_000);
}
