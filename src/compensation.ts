import type { BotConfig } from "./config";
import { sendMessageSafely, type MarketplaceClient } from "./marketplace";
import { messages } from "./messages";
import type { FulfillmentGateway } from "./provider";
import type { ConversationState } from "./state";
import type { Listing } from "./validators";

type CompensationSettings = Pick<
  BotConfig,
  "autoRefund" | "autoDeactivate" | "minProviderBalance" | "deactivateCategoryId"
>;

export interface CompensationOutcome {
  /** null when auto-refund is disabled and no refund was attempted. */
  refunded: boolean | null;
  balance: number | null;
  /** null when no deactivation ran. */
  deactivated: number | null;
}

type FailedConversation = Pick<ConversationState, "conversation_id" | "order_id">;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CompensationController {
  constructor(
    private readonly marketplace: MarketplaceClient,
    private readonly gateway: FulfillmentGateway,
    private readonly settings: CompensationSettings,
  ) {}

  async handleFulfillmentFailure(conversation: FailedConversation, errorText: string): Promise<CompensationOutcome> {
    const chatId = conversation.conversation_id;
    const orderId = conversation.order_id;

    await sendMessageSafely(this.marketplace, chatId, messages.fulfillmentFailed(errorText, this.settings.autoRefund));

    let refunded: boolean | null = null;
    if (this.settings.autoRefund) {
      refunded = await this.tryRefund(orderId);
      await sendMessageSafely(this.marketplace, chatId, refunded ? messages.refunded() : messages.refundFailed());
    }

    const balance = await this.gateway.checkBalance();
    if (balance === null) {
      console.warn("BALANCE_UNKNOWN", { order_id: orderId });
      return { refunded, balance, deactivated: null };
    }

    console.log("BALANCE", { balance, threshold: this.settings.minProviderBalance });
    if (balance >= this.settings.minProviderBalance) {
      return { refunded, balance, deactivated: null };
    }

    console.warn("BALANCE_LOW", { balance, threshold: this.settings.minProviderBalance });
    if (!this.settings.autoDeactivate) {
      console.warn("LISTINGS_MANUAL_ACTION_REQUIRED", {
        category_id: this.settings.deactivateCategoryId,
        reason: "AUTO_DEACTIVATE is off",
      });
      return { refunded, balance, deactivated: null };
    }

    const deactivated = await this.deactivateCategory(this.settings.deactivateCategoryId);
    console.warn("LISTINGS_AUTO_DEACTIVATED", { category_id: this.settings.deactivateCategoryId, count: deactivated });
    return { refunded, balance, deactivated };
  }

  /** Order-intake rejection: tell the buyer why and refund when allowed. No balance check. */
  async refundAtIntake(chatId: string, orderId: string, text: string): Promise<boolean | null> {
    console.log("INTAKE_REJECTED", { order_id: orderId, reason: text.split("\n")[0] });
    await sendMessageSafely(this.marketplace, chatId, text + messages.intakeRefundSuffix(this.settings.autoRefund));

    if (!this.settings.autoRefund) return null;
    return this.tryRefund(orderId);
  }

  async deactivateCategory(categoryId: string): Promise<number> {
    let listings: Listing[];
    try {
      listings = await this.marketplace.listListings(categoryId);
    } catch (error) {
      console.error("LISTINGS_FETCH_ERR", { category_id: categoryId, message: errorMessage(error) });
      return 0;
    }

    let deactivated = 0;
    for (const listing of listings) {
      let detail: Listing | null;
      try {
        detail = await this.marketplace.getListing(listing.id);
      } catch (error) {
        console.warn("LISTING_DETAIL_ERR", { listing_id: listing.id, message: errorMessage(error) });
        continue;
      }
      if (!detail) {
        console.warn("LISTING_SKIPPED", { listing_id: listing.id, reason: "not found" });
        continue;
      }

      try {
        await this.marketplace.setListingActive(detail.id, false);
        deactivated += 1;
        console.log("LISTING_DEACTIVATED", { listing_id: detail.id });
      } catch (error) {
        console.error("LISTING_SAVE_ERR", { listing_id: detail.id, message: errorMessage(error) });
      }
    }

    console.warn("LISTINGS_DEACTIVATION_DONE", { category_id: categoryId, deactivated, total: listings.length });
    return deactivated;
  }

  private async tryRefund(orderId: string): Promise<boolean> {
    try {
      await this.marketplace.refund(orderId);
      console.warn("REFUND_ISSUED", { order_id: orderId });
      return true;
    } catch (error) {
      console.error("REFUND_FAILED", { order_id: orderId, message: errorMessage(error) });
      return false;
    }
  }
}
