import { formatUnits } from "./destination";

const PROFILE_EXAMPLES =
  "`https://steamcommunity.com/id/your_id` or `https://steamcommunity.com/profiles/7656119...`";

export const messages = {
  askDestination: (units: number) =>
    "👋 Thanks for ordering Steam points!\n\n" +
    `Quantity: *${formatUnits(units)}*\n\n` +
    "Please send a link to your Steam profile:\n" +
    PROFILE_EXAMPLES,

  invalidDestination: () => `⚠️ Invalid link. Examples:\n${PROFILE_EXAMPLES}`,

  confirmDestination: (destination: string, units: number) =>
    "✅ Profile accepted!\n\n" +
    `Profile: *${destination}*\n` +
    `Points: *${formatUnits(units)}*\n` +
    "If everything is correct, reply `+` to place the top-up.\n" +
    "To use a different profile, send a new link.\n" +
    "The quantity can only be changed by placing a new order.",

  destinationUpdated: (destination: string, units: number) =>
    "♻️ Link updated!\n" +
    `Profile: *${destination}*\n` +
    `Points: *${formatUnits(units)}*\n` +
    "If everything is correct, reply `+` to place the top-up.",

  alreadyProcessing: () => "⏳ Your top-up is already being processed. Please wait for the result.",

  fulfilled: (destination: string, units: number) =>
    "🎉 Done! The top-up has been sent.\n\n" +
    `Profile: *${destination}*\n` +
    `Points: *${formatUnits(units)}*\n\n` +
    "Please check that the points arrived on Steam, then confirm the order on its marketplace page.\n" +
    "If something is wrong, describe it here and an administrator will answer as soon as possible.",

  missingQuantity: () =>
    "⚠️ The number of points is not specified.\n" +
    "Please place the order with the points quantity selected (in the field or as the item count).",

  invalidQuantity: (units: number, minUnits: number) =>
    `⚠️ Invalid number of points: ${units}.\n` +
    `The minimum is ${minUnits} and it must be a multiple of 100 (for example 100, 500, 1000).\n` +
    "Please place the order again.",

  intakeRefundSuffix: (autoRefund: boolean) =>
    autoRefund
      ? "\n\nThe money will be returned automatically."
      : "\n\nAutomatic refunds are disabled, write in this chat to get a refund.",

  fulfillmentFailed: (errorText: string, autoRefund: boolean) =>
    "❌ The points top-up could not be placed.\n" +
    errorText +
    (autoRefund ? "\n\n🔁 Issuing a refund…" : "\n\n⚠️ Automatic refunds are disabled. Write in this chat to get a refund."),

  refunded: () => "✅ The money has been returned. You can place the order again later.",

  refundFailed: () => "❌ The automatic refund failed. Please contact the administrator.",

  orderStatusNotice: () =>
    "ℹ️ If the top-up has already been sent, please confirm the order on its marketplace page.\n" +
    "For any questions, write here and we will help.",
};
