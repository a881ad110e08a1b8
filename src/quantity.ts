import { UNIT_GRANULARITY } from "./config";
import type { OrderSnapshot } from "./validators";

export interface QuantityOptions {
  minUnits: number;
  listingMultipliers: ReadonlyMap<string, number>;
  titleInference: boolean;
}

export type QuantityResult =
  | { units: number; source: string }
  | { units: null; source: "not_found" };

// "1000", "1 000", "10 000 000"
const NUMBER = String.raw`\d{1,3}(?:[ \u00a0]\d{3})+|\d+`;
const STARTING_FROM_PATTERN = /(?:^|[^\p{L}])(?:starting\s+from|from|от)\s*\d/iu;
const UNITS_PHRASE_PATTERN = new RegExp(`(${NUMBER})\\s*(?:points?|pts|units?|очк\\p{L}*|поинт\\p{L}*)`, "iu");
const EMBEDDED_NUMBER_PATTERN = new RegExp(NUMBER, "gu");

export function parsePositiveInt(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? value : null;
  }
  if (typeof value !== "string") return null;

  const cleaned = value.trim().replace(/\s+/g, "");
  if (!/^\d+$/.test(cleaned)) return null;

  const parsed = Number(cleaned);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
}

export function isValidQuantity(units: number, minUnits: number): boolean {
  return Number.isSafeInteger(units) && units > 0 && units >= minUnits && units % UNIT_GRANULARITY === 0;
}

/**
 * Per-item unit count implied by a listing title, e.g. "Steam Points 1 000 points".
 * Returns null for titles marked "from N", where the buyer picks the quantity.
 */
export function inferUnitsFromTitle(title: string, minUnits: number): number | null {
  if (!title.trim() || STARTING_FROM_PATTERN.test(title)) return null;

  const phrase = UNITS_PHRASE_PATTERN.exec(title);
  if (phrase) {
    const units = parsePositiveInt(phrase[1]);
    if (units !== null) return units;
  }

  let best: number | null = null;
  for (const match of title.matchAll(EMBEDDED_NUMBER_PATTERN)) {
    const candidate = parsePositiveInt(match[0]);
    if (candidate === null || candidate < minUnits || candidate % UNIT_GRANULARITY !== 0) continue;
    if (best === null || candidate > best) best = candidate;
  }
  return best;
}

export function resolveQuantity(order: OrderSnapshot, options: QuantityOptions): QuantityResult {
  const itemCount = Math.max(1, parsePositiveInt(order.amount) ?? 1);

  const listingMultiplier = order.listing_id ? options.listingMultipliers.get(order.listing_id) : undefined;
  if (listingMultiplier !== undefined) {
    return { units: listingMultiplier * itemCount, source: `listing:${order.listing_id}` };
  }

  if (options.titleInference) {
    const perItem = inferUnitsFromTitle(order.title, options.minUnits);
    if (perItem !== null) {
      return { units: perItem * itemCount, source: "title" };
    }
  }

  for (const param of order.buyer_params) {
    const units = parsePositiveInt(param.value);
    if (units !== null) {
      return { units, source: `buyer_params:${param.name}` };
    }
  }

  const amount = parsePositiveInt(order.amount);
  if (amount !== null) {
    return { units: amount, source: "amount" };
  }

  return { units: null, source: "not_found" };
}
