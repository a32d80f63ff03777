import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "@core/errors/app-errors";

dotenv.config();

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === "boolean" ? value : ["true", "1", "yes"].includes(value.trim().toLowerCase()),
  );

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value : undefined));

const DEVELOPMENT_UNSUBSCRIBE_SECRET = "change-me-unsubscribe";

export const configSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug"]).optional(),

  MONGODB_URI: z.string().min(1).default("mongodb://localhost:27017/mail-delivery"),
  REDIS_HOST: z.string().default("localhost"),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),

  PUBLIC_BASE_URL: z.string().url().default("http://localhost:5000"),
  TRACKING_FALLBACK_URL: z.string().min(1).default("/"),

  FROM_EMAIL: z.string().email().default("no-reply@example.com"),
  FROM_NAME: z.string().default("Mail Delivery"),
  ORGANIZATION: optionalString,
  RETURN_PATH: optionalString.pipe(z.string().email().optional()),

  DKIM_ENABLED: booleanFlag.default(false),
  DKIM_DOMAIN: optionalString,
  DKIM_SELECTOR: z.string().default("default"),
  // Env files cannot hold multi-line values, so PEM line breaks arrive as "\n".
  DKIM_PRIVATE_KEY: optionalString.transform((value) => value?.replace(/\\n/g, "\n")),
  DKIM_CANONICALIZATION: z
    .enum(["relaxed/relaxed", "relaxed/simple", "simple/relaxed", "simple/simple"])
    .default("relaxed/simple"),

  UNSUBSCRIBE_SECRET: z.string().min(8).default(DEVELOPMENT_UNSUBSCRIBE_SECRET),

  SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAX_SEND_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  BATCH_SIZE: z.coerce.number().int().positive().default(100),
  LINK_TTL_DAYS: z.coerce.number().int().positive().default(365),

  BOUNCE_WEBHOOK_RATE_LIMIT: z.coerce.number().int().positive().default(600),

  GEO_LOOKUP_URL: z.string().default("http://ip-api.com/json/{ip}"),
  GEO_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }

  const config = parsed.data;
  if (config.DKIM_ENABLED && (!config.DKIM_DOMAIN || !config.DKIM_PRIVATE_KEY)) {
    throw new ConfigurationError("DKIM_ENABLED requires DKIM_DOMAIN and DKIM_PRIVATE_KEY");
  }
  // Anyone could forge unsubscribe links signed with the published default.
  if (config.NODE_ENV === "production" && config.UNSUBSCRIBE_SECRET === DEVELOPMENT_UNSUBSCRIBE_SECRET) {
    throw new ConfigurationError("UNSUBSCRIBE_SECRET must be set in production");
  }
  return config;
}

/** Sender domain used for Message-ID and the unsubscribe mailbox. */
export function senderDomain(config: AppConfig): string {
  return config.DKIM_DOMAIN ?? config.FROM_EMAIL.split("@")[1] ?? "localhost";
}
