import axios, { type AxiosInstance, type Method } from "axios";
import { providerResponseSchema, type ProviderResponse } from "./validators";

export type SubmitResult =
  | { ok: true; response: ProviderResponse }
  | { ok: false; error: string; status?: number };

export interface FulfillmentGateway {
  submit(units: number, destination: string): Promise<SubmitResult>;
  checkBalance(): Promise<number | null>;
}

interface GatewayParams {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

interface BalanceCandidate {
  method: Method;
  path: string;
  via: "query" | "body";
}

const BALANCE_CANDIDATES: readonly BalanceCandidate[] = [
  { method: "GET", path: "/api/balance", via: "query" },
  { method: "POST", path: "/api/balance", via: "body" },
  { method: "POST", path: "/api/wallet", via: "body" },
  { method: "GET", path: "/api/info", via: "query" },
];

const BALANCE_KEYS = ["balance", "wallet", "remaining_balance", "amount", "available", "available_balance"];
const NESTED_BALANCE_KEYS = ["amount", "value", "available", "balance"];

function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function extractBalance(data: unknown): number | null {
  if (!isRecord(data)) {
    return toNumber(data);
  }

  for (const key of BALANCE_KEYS) {
    if (!(key in data)) continue;
    const value = data[key];

    if (isRecord(value)) {
      const nestedKey = NESTED_BALANCE_KEYS.find((candidate) => candidate in value);
      const nested = nestedKey === undefined ? null : toNumber(value[nestedKey]);
      if (nested !== null) return nested;
      continue;
    }

    const direct = toNumber(value);
    if (direct !== null) return direct;
  }
  return null;
}

function describeFailure(body: unknown, status: number): string {
  const parsed = providerResponseSchema.safeParse(body);
  if (parsed.success) {
    for (const candidate of [parsed.data.error, parsed.data.message]) {
      if (typeof candidate === "string" && candidate.trim()) return candidate.trim();
    }
  }
  if (typeof body === "string" && body.trim()) {
    return body.trim().slice(0, 200);
  }
  return `HTTP ${status}`;
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return "Provider request timed out";
    }
    return `HTTP error: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export class HttpFulfillmentGateway implements FulfillmentGateway {
  private readonly http: AxiosInstance;

  constructor(private readonly params: GatewayParams) {
    this.http = axios.create({
      baseURL: params.baseUrl,
      timeout: params.timeoutMs,
      headers: { "Content-Type": "application/json" },
      validateStatus: () => true,
    });
  }

  async submit(units: number, destination: string): Promise<SubmitResult> {
    try {
      const response = await this.http.post<unknown>("/api/buy", {
        api_key: this.params.apiKey,
        quantity: units,
        destination: destination.trim(),
      });

      const parsed = providerResponseSchema.safeParse(response.data);
      const ok = response.status === 200 && parsed.success && Boolean(parsed.data.success);

      console.log(ok ? "PROVIDER_ORDER" : "PROVIDER_ORDER_FAILED", {
        status: response.status,
        units,
        body: JSON.stringify(response.data ?? null).slice(0, 300),
      });

      if (ok && parsed.success) {
        return { ok: true, response: parsed.data };
      }
      return { ok: false, error: describeFailure(response.data, response.status), status: response.status };
    } catch (error) {
      const message = describeError(error);
      console.error("PROVIDER_HTTP_ERR", { units, message });
      return { ok: false, error: message };
    }
  }

  async checkBalance(): Promise<number | null> {
    for (const candidate of BALANCE_CANDIDATES) {
      const credentials = { api_key: this.params.apiKey };
      try {
        const response = await this.http.request<unknown>({
          method: candidate.method,
          url: candidate.path,
          params: candidate.via === "query" ? credentials : undefined,
          data: candidate.via === "body" ? credentials : undefined,
        });
        if (response.status !== 200) continue;

        const balance = extractBalance(response.data);
        if (balance !== null) return balance;
      } catch (error) {
        console.warn("PROVIDER_BALANCE_PROBE_ERR", {
          method: candidate.method,
          path: candidate.path,
          message: describeError(error),
        });
      }
    }

    console.warn("PROVIDER_BALANCE_UNKNOWN", { candidates: BALANCE_CANDIDATES.length });
    return null;
  }
}
