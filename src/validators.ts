import { z } from "zod";

const idSchema = z.union([z.string().min(1), z.number().int()]).transform((value) => String(value));

const rawValueSchema = z.union([z.string(), z.number()]);

const buyerParamEntrySchema = z.object({ name: z.string(), value: z.unknown() });

export interface BuyerParam {
  name: string;
  value: unknown;
}

// Either `[{name, value}, ...]` (keeps the stored order) or a plain object.
const buyerParamsSchema = z
  .union([z.array(z.unknown()), z.record(z.string(), z.unknown())])
  .nullish()
  .transform((params): BuyerParam[] => {
    if (!params) return [];
    if (!Array.isArray(params)) {
      return Object.entries(params).map(([name, value]) => ({ name, value }));
    }
    const entries: BuyerParam[] = [];
    for (const item of params) {
      const entry = buyerParamEntrySchema.safeParse(item);
      if (entry.success) entries.push({ name: entry.data.name, value: entry.data.value });
    }
    return entries;
  })
  .catch([]);

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  MARKETPLACE_API_URL: z.string().url(),
  MARKETPLACE_TOKEN: z.string().min(1),
  WEBHOOK_TOKEN: z.string().min(1).optional(),
  PROVIDER_API_KEY: z.string().min(1),
  PROVIDER_BASE_URL: z.string().url().default("https://api.buysteampoints.com"),
  CATEGORY_ID: z.string().regex(/^\d+$/).default("714"),
  DEACTIVATE_CATEGORY_ID: z.string().regex(/^\d+$/).optional(),
  REQUEST_TIMEOUT: z.coerce.number().int().positive().default(300),
  MIN_POINTS: z.coerce.number().int().positive().default(100),
  AUTO_REFUND: z.string().optional(),
  AUTO_DEACTIVATE: z.string().optional(),
  PROVIDER_MIN_BALANCE: z.string().optional(),
  LISTING_MULTIPLIERS: z.string().default(""),
  TITLE_INFERENCE: z.string().optional(),
  WORKER_COUNT: z.coerce.number().int().positive().default(4),
  POLL_DELAY_MS: z.coerce.number().int().nonnegative().default(3000),
  CONVERSATION_TTL_MINUTES: z.coerce.number().nonnegative().default(0),
}).superRefine((val, ctx) => {
  if (val.LISTING_MULTIPLIERS.trim() && !/^\s*\d+\s*:\s*\d+\s*(,\s*\d+\s*:\s*\d+\s*)*$/.test(val.LISTING_MULTIPLIERS)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "LISTING_MULTIPLIERS must look like 12345:1000,67890:500",
      path: ["LISTING_MULTIPLIERS"],
    });
  }
});

export const orderSnapshotSchema = z.object({
  id: idSchema,
  subcategory_id: idSchema.nullable().catch(null),
  listing_id: idSchema.optional().catch(undefined),
  buyer_id: idSchema,
  chat_id: idSchema,
  title: z.string().catch(""),
  buyer_params: buyerParamsSchema,
  amount: rawValueSchema.nullable().catch(null),
});

export const chatMessageSchema = z.object({
  chat_id: idSchema,
  author_id: idSchema,
  text: z.string().nullable().default("").transform((value) => value ?? ""),
});

export const marketplaceEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("new_order"),
    order_id: idSchema,
  }),
  z.object({
    type: z.literal("new_message"),
    message: chatMessageSchema,
  }),
]);

export const webhookPayloadSchema = z.union([
  marketplaceEventSchema.transform((event) => [event]),
  z.object({ events: z.array(marketplaceEventSchema) }).transform((payload) => payload.events),
]);

export const eventBatchSchema = z.object({
  events: z.array(z.unknown()).default([]),
  cursor: z.string().nullable().optional(),
});

export const accountSchema = z.object({
  id: idSchema,
  username: z.string().default("(unknown)"),
});

export const listingSchema = z.object({
  id: idSchema,
  title: z.string().default(""),
  active: z.boolean(),
});

export const listingPageSchema = z.object({
  listings: z.array(listingSchema),
});

export const providerResponseSchema = z.object({
  success: z.unknown().optional(),
  error: z.unknown().optional(),
  message: z.unknown().optional(),
}).passthrough();

export type OrderSnapshot = z.infer<typeof orderSnapshotSchema>;
export type OrderSnapshotInput = z.input<typeof orderSnapshotSchema>;
export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type MarketplaceEvent = z.infer<typeof marketplaceEventSchema>;
export type Account = z.infer<typeof accountSchema>;
export type Listing = z.infer<typeof listingSchema>;
export type ProviderResponse = z.infer<typeof providerResponseSchema>;
export type EnvConfig = z.infer<typeof envSchema>;
