import "dotenv/config";
import { z } from "zod";
import type { PeerGrouping } from "../../core/entities/metric";

const supportedPeerGroupings = [
  "sector",
  "industry",
  "subIndustry",
] as const satisfies readonly PeerGrouping[];

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  SEC_EDGAR_BASE_URL: z.string().url().default("https://data.sec.gov"),
  SEC_EDGAR_USER_AGENT: z.string().default(""),
  SEC_EDGAR_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  FINNHUB_BASE_URL: z.string().url().default("https://finnhub.io"),
  FINNHUB_API_KEY: z.string().default(""),
  FINNHUB_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  // Single-symbol chart requests expand through this grouping.
  PEER_GROUPING: z.enum(supportedPeerGroupings).default("sector"),
  COMPANY_CATALOG_PATH: z.string().default("./data/company_tickers.json"),
  INDUSTRY_CATALOG_PATH: z.string().default("./data/industry_tickers.json"),
  CHART_OUTPUT_DIR: z.string().default("./charts"),
});

export type AppEnv = Readonly<z.infer<typeof envSchema>>;

/**
 * Validates raw environment values once into an immutable object that the runtime factory receives explicitly.
 */
export const parseEnv = (source: NodeJS.ProcessEnv): AppEnv =>
  Object.freeze(envSchema.parse(source));

export const env: AppEnv = parseEnv(process.env);

export const peerGroupings = (): readonly PeerGrouping[] =>
  supportedPeerGroupings;
