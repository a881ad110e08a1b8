import { CONFIRMATION_TOKEN, type BotConfig } from "./config";
import type { CompensationController } from "./compensation";
import { isValidDestination } from "./destination";
import { maskId, sendMessageSafely, type MarketplaceClient } from "./marketplace";
import { messages } from "./messages";
import type { FulfillmentGateway } from "./provider";
import { isValidQuantity, resolveQuantity } from "./quantity";
import type { ConversationState, StateStore } from "./state";
import type { ChatMessage, MarketplaceEvent, OrderSnapshot } from "./validators";
import type { WorkerPool } from "./workerPool";

const DUPLICATE_ORDER_WINDOW_MS = 24 * 60 * 60 * 1000;

type DriverSettings = Pick<BotConfig, "categoryId" | "minUnits" | "listingMultipliers" | "titleInference">;

export interface DriverDeps {
  settings: DriverSettings;
  marketplace: MarketplaceClient;
  gateway: FulfillmentGateway;
  store: StateStore;
  pool: WorkerPool;
  compensation: CompensationController;
  /** Messages written by this account are the bot's own and are skipped. */
  accountId?: string;
}

/**
 * Drives each conversation from a paid order to a provider top-up:
 * order → AWAITING_DESTINATION → AWAITING_CONFIRMATION → "+" → pool worker → released.
 */
export class FulfillmentDriver {
  // order id -> first seen, so a redelivered new_order never opens a second conversation
  private readonly seenOrders = new Map<string, number>();

  constructor(private readonly deps: DriverDeps) {}

  async handleEvent(event: MarketplaceEvent): Promise<void> {
    this.reapExpired();

    if (event.type === "new_order") {
      let order: OrderSnapshot;
      try {
        order = await this.deps.marketplace.getOrder(event.order_id);
      } catch (error) {
        console.error("ORDER_FETCH_ERR", {
          order_id: event.order_id,
          message: error instanceof Error ? error.message : String(error),
        });
        return;
      }
      await this.handleNewOrder(order);
      return;
    }

    await this.handleNewMessage(event.message);
  }

  async handleNewOrder(order: OrderSnapshot): Promise<void> {
    const { settings, store, marketplace, compensation } = this.deps;

    if (this.isDuplicateOrder(order.id) || store.lookup(order.chat_id)?.order_id === order.id) {
      console.log("ORDER_DUPLICATE", { order_id: order.id });
      return;
    }

    if (order.subcategory_id !== settings.categoryId) {
      console.log("ORDER_SKIPPED", { order_id: order.id, subcategory_id: order.subcategory_id });
      return;
    }

    console.log("ORDER_NEW", { order_id: order.id, buyer: maskId(order.buyer_id), title: order.title.slice(0, 120) });

    const quantity = resolveQuantity(order, settings);
    if (quantity.units === null) {
      await compensation.refundAtIntake(order.chat_id, order.id, messages.missingQuantity());
      return;
    }
    if (!isValidQuantity(quantity.units, settings.minUnits)) {
      await compensation.refundAtIntake(
        order.chat_id,
        order.id,
        messages.invalidQuantity(quantity.units, settings.minUnits),
      );
      return;
    }

    const previous = store.lookup(order.chat_id);
    if (previous) {
      console.warn("CONVERSATION_REPLACED", { chat_id: order.chat_id, previous_order_id: previous.order_id, order_id: order.id });
    }

    const state = store.bind({
      conversation_id: order.chat_id,
      buyer_id: order.buyer_id,
      order_id: order.id,
      requested_units: quantity.units,
    });

    await sendMessageSafely(marketplace, state.conversation_id, messages.askDestination(state.requested_units));
    console.log("AWAITING_DESTINATION", { order_id: order.id, units: quantity.units, source: quantity.source });
  }

  async handleNewMessage(message: ChatMessage): Promise<void> {
    const { store, marketplace, accountId } = this.deps;
    if (accountId !== undefined && message.author_id === accountId) return;

    const text = message.text.trim();
    const state = store.lookup(message.chat_id, message.author_id);

    if (!state) {
      await sendMessageSafely(marketplace, message.chat_id, messages.orderStatusNotice());
      return;
    }

    const chatId = state.conversation_id;
    if (state.submitted) {
      await sendMessageSafely(marketplace, chatId, messages.alreadyProcessing());
      return;
    }

    if (state.step === "AWAITING_CONFIRMATION" && text === CONFIRMATION_TOKEN) {
      await this.dispatch(state);
      return;
    }

    if (!isValidDestination(text)) {
      console.log("DESTINATION_INVALID", { order_id: state.order_id, text: text.slice(0, 120) });
      await sendMessageSafely(marketplace, chatId, messages.invalidDestination());
      return;
    }

    const updated = store.setDestination(chatId, text);
    if (!updated) return;

    const reply =
      state.step === "AWAITING_DESTINATION"
        ? messages.confirmDestination(updated.destination, updated.requested_units)
        : messages.destinationUpdated(updated.destination, updated.requested_units);
    await sendMessageSafely(marketplace, chatId, reply);
    console.log(state.step === "AWAITING_DESTINATION" ? "DESTINATION_ACCEPTED" : "DESTINATION_UPDATED", {
      order_id: state.order_id,
      destination: updated.destination,
    });
  }

  private async dispatch(state: Readonly<ConversationState>): Promise<void> {
    const { store, pool, marketplace } = this.deps;

    if (!store.markSubmitted(state.conversation_id)) {
      await sendMessageSafely(marketplace, state.conversation_id, messages.alreadyProcessing());
      return;
    }

    console.log("FULFILLMENT_QUEUED", {
      order_id: state.order_id,
      units: state.requested_units,
      destination: state.destination,
      pool: pool.stats(),
    });
    pool.submit(() => this.fulfill(state));
  }

  private async fulfill(state: Readonly<ConversationState>): Promise<void> {
    const { gateway, marketplace, compensation, store } = this.deps;

    try {
      const result = await gateway.submit(state.requested_units, state.destination);
      if (result.ok) {
        await sendMessageSafely(
          marketplace,
          state.conversation_id,
          messages.fulfilled(state.destination, state.requested_units),
        );
        console.log("FULFILLED", { order_id: state.order_id, units: state.requested_units });
        return;
      }

      console.error("FULFILLMENT_FAILED", { order_id: state.order_id, error: result.error });
      await compensation.handleFulfillmentFailure(state, `Reason: ${result.error}`);
    } finally {
      store.release(state.conversation_id, state.order_id);
    }
  }

  private isDuplicateOrder(orderId: string): boolean {
    const now = Date.now();
    for (const [seenId, seenAt] of this.seenOrders) {
      if (now - seenAt > DUPLICATE_ORDER_WINDOW_MS) this.seenOrders.delete(seenId);
    }
    if (this.seenOrders.has(orderId)) return true;
    this.seenOrders.set(orderId, now);
    return false;
  }

  private reapExpired(): void {
    for (const expired of this.deps.store.sweep()) {
      console.warn("CONVERSATION_EXPIRED", {
        order_id: expired.order_id,
        step: expired.step,
        last_activity: new Date(expired.updated_at).toISOString(),
      });
    }
  }
}
