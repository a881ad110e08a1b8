import { afterEach, describe, it, expect, vi } from "vitest";
import { HttpMarketplaceClient, maskId, sendMessageSafely } from "./marketplace";
import { FakeMarketplace } from "./testing/fakes";
import { startStub, type StubServer } from "./testing/httpStub";

describe("maskId", () => {
  it("keeps only the edges", () => {
    expect(maskId("12345678")).toBe("12****78");
    expect(maskId("12345")).toBe("12**45");
    expect(maskId("1234")).toBe("****");
  });
});

describe("sendMessageSafely", () => {
  it("reports failures instead of throwing", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const marketplace = new FakeMarketplace();
    marketplace.failSend = true;

    expect(await sendMessageSafely(marketplace, "chat-1", "hello")).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith("MARKETPLACE_SEND_ERR", { chat_id: "chat-1", message: "chat unavailable" });
    errorSpy.mockRestore();
  });

  it("reports delivered messages", async () => {
    const marketplace = new FakeMarketplace();

    expect(await sendMessageSafely(marketplace, "chat-1", "hello")).toBe(true);
    expect(marketplace.sent).toEqual([{ chatId: "chat-1", text: "hello" }]);
  });
});

describe("HttpMarketplaceClient", () => {
  let stub: StubServer | null = null;

  afterEach(async () => {
    await stub?.close();
    stub = null;
  });

  it("authenticates and decodes the account", async () => {
    const headers: Array<string | undefined> = [];
    stub = await startStub((app) => {
      app.get("/api/account", (req, res) => {
        headers.push(req.get("authorization"));
        res.json({ id: 987, username: "seller" });
      });
    });
    const client = new HttpMarketplaceClient({ baseUrl: `${stub.url}/`, token: "test-token" });

    expect(await client.getAccount()).toEqual({ id: "987", username: "seller" });
    expect(headers).toEqual(["Bearer test-token"]);
  });

  it("decodes order snapshots", async () => {
    stub = await startStub((app) => {
      app.get("/api/orders/:id", (req, res) => {
        res.json({
          id: req.params.id,
          subcategory_id: 714,
          buyer_id: 55,
          chat_id: "users-1-55",
          title: "Steam points",
          buyer_params: { qty: "500" },
          amount: 1,
        });
      });
    });
    const client = new HttpMarketplaceClient({ baseUrl: stub.url, token: "test-token" });

    expect(await client.getOrder("ABC123")).toEqual({
      id: "ABC123",
      subcategory_id: "714",
      buyer_id: "55",
      chat_id: "users-1-55",
      title: "Steam points",
      buyer_params: [{ name: "qty", value: "500" }],
      amount: 1,
    });
  });

  it("decodes loosely typed order fields instead of rejecting the order", async () => {
    stub = await startStub((app) => {
      app.get("/api/orders/:id", (req, res) => {
        res.json({
          id: req.params.id,
          subcategory_id: null,
          listing_id: { nested: true },
          buyer_id: 55,
          chat_id: "users-1-55",
          title: null,
          buyer_params: [{ name: "comment", value: null }, "junk", { name: "qty", value: "500" }],
          amount: false,
        });
      });
    });
    const client = new HttpMarketplaceClient({ baseUrl: stub.url, token: "test-token" });

    expect(await client.getOrder("ABC123")).toEqual({
      id: "ABC123",
      subcategory_id: null,
      listing_id: undefined,
      buyer_id: "55",
      chat_id: "users-1-55",
      title: "",
      buyer_params: [
        { name: "comment", value: null },
        { name: "qty", value: "500" },
      ],
      amount: null,
    });
  });

  it("keeps valid events and advances the cursor", async () => {
    const cursors: unknown[] = [];
    stub = await startStub((app) => {
      app.get("/api/events", (req, res) => {
        cursors.push(req.query.cursor);
        res.json({
          cursor: "c-2",
          events: [
            { type: "new_order", order_id: "A1" },
            { type: "unknown" },
            { type: "new_message", message: { chat_id: "chat-1", author_id: 55, text: "+" } },
          ],
        });
      });
    });
    const client = new HttpMarketplaceClient({ baseUrl: stub.url, token: "test-token" });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const batch = await client.fetchEvents("c-1");

    expect(batch).toEqual({
      cursor: "c-2",
      events: [
        { type: "new_order", order_id: "A1" },
        { type: "new_message", message: { chat_id: "chat-1", author_id: "55", text: "+" } },
      ],
    });
    expect(cursors).toEqual(["c-1"]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    warnSpy.mockRestore();
  });

  it("sends messages and refunds", async () => {
    const calls: unknown[] = [];
    stub = await startStub((app) => {
      app.post("/api/chats/:chatId/messages", (req, res) => {
        calls.push({ chat: req.params.chatId, body: req.body });
        res.json({ ok: true });
      });
      app.post("/api/orders/:id/refund", (req, res) => {
        calls.push({ refund: req.params.id });
        res.json({ ok: true });
      });
    });
    const client = new HttpMarketplaceClient({ baseUrl: stub.url, token: "test-token" });

    await client.sendMessage("chat-1", "hello");
    await client.refund("A1");

    expect(calls).toEqual([{ chat: "chat-1", body: { text: "hello" } }, { refund: "A1" }]);
  });

  it("lists, fetches and updates listings", async () => {
    const patches: unknown[] = [];
    stub = await startStub((app) => {
      app.get("/api/categories/:id/listings", (req, res) => {
        res.json({ listings: [{ id: 1, title: `lot in ${req.params.id}`, active: true }] });
      });
      app.get("/api/listings/:id", (req, res) => {
        if (req.params.id === "404") {
          res.status(404).json({ error: "not found" });
          return;
        }
        res.json({ id: req.params.id, title: "lot", active: true });
      });
      app.patch("/api/listings/:id", (req, res) => {
        patches.push({ id: req.params.id, body: req.body });
        res.json({ ok: true });
      });
    });
    const client = new HttpMarketplaceClient({ baseUrl: stub.url, token: "test-token" });

    expect(await client.listListings("714")).toEqual([{ id: "1", title: "lot in 714", active: true }]);
    expect(await client.getListing("1")).toEqual({ id: "1", title: "lot", active: true });
    expect(await client.getListing("404")).toBeNull();
    await client.setListingActive("1", false);
    expect(patches).toEqual([{ id: "1", body: { active: false } }]);
  });

  it("throws on failed calls", async () => {
    stub = await startStub((app) => {
      app.post("/api/orders/:id/refund", (_req, res) => {
        res.status(409).json({ error: "already refunded" });
      });
    });
    const client = new HttpMarketplaceClient({ baseUrl: stub.url, token: "test-token" });

    await expect(client.refund("A1")).rejects.toThrow("409");
  });
});
