import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional()
);

// Load .env from the project root, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, "../.env");
loadEnv({ path: envPath });

const envSchema = z.object({
  PORT: z.coerce.number().default(4000),
  SQLITE_DB: z.string().default("data/sightings.db"),
  IMAGES_DIR: z.string().default("data/images"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().default(10000),
  // Twilio inbound webhook
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_VALIDATE_SIGNATURE: boolFromEnv(false),
  PUBLIC_BASE_URL: optionalString, // external URL Twilio signs against, e.g. https://sms.example.org
  MEDIA_DOWNLOAD_TIMEOUT_MS: z.coerce.number().default(30000),
  // Nominatim
  GEOCODER_BASE_URL: z.string().default("https://nominatim.openstreetmap.org"),
  GEOCODER_USER_AGENT: z.string().default("fleet-sightings/0.1"),
  GEOCODER_REGION_HINT: z.string().default("New York City, NY"),
  GEOCODER_TIMEOUT_MS: z.coerce.number().default(10000),
  GEOCODER_MIN_INTERVAL_MS: z.coerce.number().default(1000),
  // Operator notifications (ntfy-style plain text POST)
  NOTIFY_WEBHOOK_URL: optionalString,
  ADMIN_CONTRIBUTOR_ID: z.coerce.number().int().default(1),
  NEAR_DUPLICATE_THRESHOLD: z.coerce.number().int().min(0).max(64).default(5),
  MAX_PLATE_SUGGESTIONS: z.coerce.number().int().min(1).default(5),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("[config] Invalid environment configuration", parsed.error.flatten().fieldErrors);
  throw new Error("Invalid environment configuration");
}

const env = parsed.data;

export const runtimeConfig = {
  port: env.PORT,
  sqlitePath: env.SQLITE_DB,
  imagesDir: env.IMAGES_DIR,
  logLevel: env.LOG_LEVEL,
  gracefulShutdownMs: env.GRACEFUL_SHUTDOWN_MS,
  twilio: {
    accountSid: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    validateSignature: env.TWILIO_VALIDATE_SIGNATURE,
    publicBaseUrl: env.PUBLIC_BASE_URL,
  },
  mediaDownloadTimeoutMs: env.MEDIA_DOWNLOAD_TIMEOUT_MS,
  geocoder: {
    baseUrl: env.GEOCODER_BASE_URL,
    userAgent: env.GEOCODER_USER_AGENT,
    regionHint: env.GEOCODER_REGION_HINT,
    timeoutMs: env.GEOCODER_TIMEOUT_MS,
    minIntervalMs: env.GEOCODER_MIN_INTERVAL_MS,
  },
  notifyWebhookUrl: env.NOTIFY_WEBHOOK_URL,
  adminContributorId: env.ADMIN_CONTRIBUTOR_ID,
  nearDuplicateThreshold: env.NEAR_DUPLICATE_THRESHOLD,
  maxPlateSuggestions: env.MAX_PLATE_SUGGESTIONS,
};

export type RuntimeConfig = typeof runtimeConfig;
