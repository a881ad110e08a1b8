import "dotenv/config";
import { createApp } from "./app";
import { CompensationController } from "./compensation";
import { loadConfig, unsetDefaults } from "./config";
import { FulfillmentDriver } from "./driver";
import { EventQueue, MarketplacePoller } from "./events";
import { HttpMarketplaceClient } from "./marketplace";
import { HttpFulfillmentGateway } from "./provider";
import { InMemoryStateStore } from "./state";
import { envSchema } from "./validators";
import { WorkerPool } from "./workerPool";

const parsedEnv = envSchema.safeParse(process.env);
if (!parsedEnv.success) {
  console.error("Invalid environment variables", parsedEnv.error.format());
  process.exit(1);
}

const env = parsedEnv.data;
const config = loadConfig(env);

async function main(): Promise<void> {
  for (const key of unsetDefaults(env)) {
    console.warn(`${key} is not set in .env, using the default`);
  }

  const marketplace = new HttpMarketplaceClient({
    baseUrl: config.marketplaceApiUrl,
    token: config.marketplaceToken,
  });
  const gateway = new HttpFulfillmentGateway({
    baseUrl: config.providerBaseUrl,
    apiKey: config.providerApiKey,
    timeoutMs: config.requestTimeoutMs,
  });

  const account = await marketplace.getAccount();
  console.log(`Authorized as ${account.username} (id=${account.id})`);
  console.log("SETTINGS", {
    category_id: config.categoryId,
    deactivate_category_id: config.deactivateCategoryId,
    min_points: config.minUnits,
    auto_refund: config.autoRefund,
    auto_deactivate: config.autoDeactivate,
    min_provider_balance: config.minProviderBalance,
    listing_multipliers: Object.fromEntries(config.listingMultipliers),
    title_inference: config.titleInference,
    workers: config.workerCount,
    conversation_ttl_ms: config.conversationTtlMs,
  });

  const store = new InMemoryStateStore({ ttlMs: config.conversationTtlMs });
  const pool = new WorkerPool(config.workerCount);
  const compensation = new CompensationController(marketplace, gateway, config);
  const driver = new FulfillmentDriver({
    settings: config,
    marketplace,
    gateway,
    store,
    pool,
    compensation,
    accountId: account.id,
  });

  const queue = new EventQueue((event) => driver.handleEvent(event));
  const poller = new MarketplacePoller(marketplace, queue, { delayMs: config.pollDelayMs });

  const app = createApp({ queue, store, pool, webhookToken: config.webhookToken });
  const server = app.listen(config.port, () => {
    console.log(`Server listening on :${config.port} poll_delay_ms=${config.pollDelayMs}`);
  });

  poller.start();
  console.log("Bot started, waiting for marketplace events");

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    poller.stop();
    server.close();
    Promise.all([queue.drain(), pool.onIdle()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("SHUTDOWN_ERR", { message: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("STARTUP_ERR", {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
