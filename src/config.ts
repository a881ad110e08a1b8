import type { EnvConfig } from "./validators";

export const UNIT_GRANULARITY = 100;
export const CONFIRMATION_TOKEN = "+";
const DEFAULT_MIN_BALANCE = 5.0;

export interface BotConfig {
  marketplaceApiUrl: string;
  marketplaceToken: string;
  webhookToken?: string;
  providerApiKey: string;
  providerBaseUrl: string;
  categoryId: string;
  deactivateCategoryId: string;
  requestTimeoutMs: number;
  minUnits: number;
  autoRefund: boolean;
  autoDeactivate: boolean;
  minProviderBalance: number;
  listingMultipliers: ReadonlyMap<string, number>;
  titleInference: boolean;
  workerCount: number;
  pollDelayMs: number;
  conversationTtlMs: number;
  port: number;
}

export function parseEnvBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return ["1", "true", "yes", "y"].includes(raw.trim().toLowerCase());
}

export function parseMinBalance(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_MIN_BALANCE;
  const value = Number(raw.trim());
  return raw.trim() !== "" && Number.isFinite(value) ? value : DEFAULT_MIN_BALANCE;
}

export function parseListingMultipliers(raw: string): Map<string, number> {
  const multipliers = new Map<string, number>();
  for (const pair of raw.split(",")) {
    const [listingId, multiplier] = pair.split(":").map((part) => part.trim());
    if (!listingId || !multiplier) continue;
    const value = Number(multiplier);
    if (Number.isInteger(value) && value > 0) {
      multipliers.set(listingId, value);
    }
  }
  return multipliers;
}

export function loadConfig(env: EnvConfig): BotConfig {
  return {
    marketplaceApiUrl: env.MARKETPLACE_API_URL,
    marketplaceToken: env.MARKETPLACE_TOKEN,
    webhookToken: env.WEBHOOK_TOKEN,
    providerApiKey: env.PROVIDER_API_KEY,
    providerBaseUrl: env.PROVIDER_BASE_URL.replace(/\/+$/, ""),
    categoryId: env.CATEGORY_ID,
    deactivateCategoryId: env.DEACTIVATE_CATEGORY_ID ?? env.CATEGORY_ID,
    requestTimeoutMs: env.REQUEST_TIMEOUT * 1000,
    minUnits: env.MIN_POINTS,
    autoRefund: parseEnvBool(env.AUTO_REFUND, true),
    autoDeactivate: parseEnvBool(env.AUTO_DEACTIVATE, true),
    minProviderBalance: parseMinBalance(env.PROVIDER_MIN_BALANCE),
    listingMultipliers: parseListingMultipliers(env.LISTING_MULTIPLIERS),
    titleInference: parseEnvBool(env.TITLE_INFERENCE, true),
    workerCount: env.WORKER_COUNT,
    pollDelayMs: env.POLL_DELAY_MS,
    conversationTtlMs: Math.round(env.CONVERSATION_TTL_MINUTES * 60 * 1000),
    port: env.PORT,
  };
}

/** Env keys whose absence is worth a startup warning. */
export function unsetDefaults(env: EnvConfig): string[] {
  const missing: string[] = [];
  if (env.AUTO_REFUND === undefined) missing.push("AUTO_REFUND");
  if (env.AUTO_DEACTIVATE === undefined) missing.push("AUTO_DEACTIVATE");
  if (env.PROVIDER_MIN_BALANCE === undefined) missing.push("PROVIDER_MIN_BALANCE");
  return missing;
}
