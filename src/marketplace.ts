import axios, { type AxiosInstance } from "axios";
import {
  accountSchema,
  eventBatchSchema,
  listingPageSchema,
  listingSchema,
  marketplaceEventSchema,
  orderSnapshotSchema,
  type Account,
  type Listing,
  type MarketplaceEvent,
  type OrderSnapshot,
} from "./validators";

export interface EventBatch {
  events: MarketplaceEvent[];
  cursor: string | null;
}

export interface MarketplaceClient {
  getAccount(): Promise<Account>;
  fetchEvents(cursor: string | null): Promise<EventBatch>;
  getOrder(orderId: string): Promise<OrderSnapshot>;
  sendMessage(chatId: string, text: string): Promise<void>;
  refund(orderId: string): Promise<void>;
  listListings(categoryId: string): Promise<Listing[]>;
  getListing(listingId: string): Promise<Listing | null>;
  setListingActive(listingId: string, active: boolean): Promise<void>;
}

interface HttpMarketplaceParams {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
}

export function maskId(id: string): string {
  if (id.length <= 4) return "****";
  return `${id.slice(0, 2)}${"*".repeat(Math.max(2, id.length - 4))}${id.slice(-2)}`;
}

/**
 * Sends a chat message and reports whether it went out. Marketplace failures
 * are logged here so callers can keep going with the rest of the flow.
 */
export async function sendMessageSafely(
  marketplace: MarketplaceClient,
  chatId: string,
  text: string,
): Promise<boolean> {
  try {
    await marketplace.sendMessage(chatId, text);
    return true;
  } catch (error) {
    console.error("MARKETPLACE_SEND_ERR", {
      chat_id: chatId,
      message: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export class HttpMarketplaceClient implements MarketplaceClient {
  private readonly http: AxiosInstance;

  constructor(params: HttpMarketplaceParams) {
    this.http = axios.create({
      baseURL: params.baseUrl.replace(/\/+$/, ""),
      timeout: params.timeoutMs ?? 10000,
      headers: {
        Authorization: `Bearer ${params.token}`,
        "Content-Type": "application/json",
      },
    });
  }

  async getAccount(): Promise<Account> {
    const response = await this.http.get<unknown>("/api/account");
    return accountSchema.parse(response.data);
  }

  async fetchEvents(cursor: string | null): Promise<EventBatch> {
    const response = await this.http.get<unknown>("/api/events", {
      params: cursor === null ? undefined : { cursor },
    });
    const batch = eventBatchSchema.parse(response.data);

    const events: MarketplaceEvent[] = [];
    for (const raw of batch.events) {
      const parsed = marketplaceEventSchema.safeParse(raw);
      if (parsed.success) {
        events.push(parsed.data);
      } else {
        console.warn("MARKETPLACE_EVENT_IGNORED", { issues: parsed.error.issues.length });
      }
    }
    return { events, cursor: batch.cursor ?? cursor };
  }

  async getOrder(orderId: string): Promise<OrderSnapshot> {
    const response = await this.http.get<unknown>(`/api/orders/${encodeURIComponent(orderId)}`);
    return orderSnapshotSchema.parse(response.data);
  }

  async sendMessage(chatId: string, text: string): Promise<void> {
    await this.http.post(`/api/chats/${encodeURIComponent(chatId)}/messages`, { text });
  }

  async refund(orderId: string): Promise<void> {
    await this.http.post(`/api/orders/${encodeURIComponent(orderId)}/refund`, {});
  }

  async listListings(categoryId: string): Promise<Listing[]> {
    const response = await this.http.get<unknown>(`/api/categories/${encodeURIComponent(categoryId)}/listings`);
    return listingPageSchema.parse(response.data).listings;
  }

  async getListing(listingId: string): Promise<Listing | null> {
    const response = await this.http.get<unknown>(`/api/listings/${encodeURIComponent(listingId)}`, {
      validateStatus: (status) => (status >= 200 && status < 300) || status === 404,
    });
    if (response.status === 404) return null;
    return listingSchema.parse(response.data);
  }

  async setListingActive(listingId: string, active: boolean): Promise<void> {
    await this.http.patch(`/api/listings/${encodeURIComponent(listingId)}`, { active });
  }
}
