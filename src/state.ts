export type ConversationStep = "AWAITING_DESTINATION" | "AWAITING_CONFIRMATION";

export interface ConversationState {
  readonly conversation_id: string;
  readonly buyer_id: string;
  readonly order_id: string;
  readonly requested_units: number;
  step: ConversationStep;
  destination: string;
  submitted: boolean;
  readonly created_at: number;
  updated_at: number;
}

export interface NewConversation {
  conversation_id: string;
  buyer_id: string;
  order_id: string;
  requested_units: number;
}

export interface StateStore {
  bind(conversation: NewConversation): ConversationState;
  lookup(conversationId: string, buyerId?: string): Readonly<ConversationState> | null;
  release(conversationId: string, orderId?: string): boolean;
  setDestination(conversationId: string, destination: string): Readonly<ConversationState> | null;
  markSubmitted(conversationId: string): boolean;
  sweep(now?: number): ConversationState[];
  size(): number;
}

interface StoreOptions {
  /** Idle time after which an unsubmitted conversation is dropped; 0 keeps them forever. */
  ttlMs?: number;
  now?: () => number;
}

export class InMemoryStateStore implements StateStore {
  private readonly map = new Map<string, ConversationState>();
  private readonly byBuyer = new Map<string, Set<string>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: StoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  bind(conversation: NewConversation): ConversationState {
    if (this.map.has(conversation.conversation_id)) {
      this.release(conversation.conversation_id);
    }

    const timestamp = this.now();
    const state: ConversationState = {
      ...conversation,
      step: "AWAITING_DESTINATION",
      destination: "",
      submitted: false,
      created_at: timestamp,
      updated_at: timestamp,
    };

    this.map.set(state.conversation_id, state);
    const open = this.byBuyer.get(state.buyer_id) ?? new Set<string>();
    open.add(state.conversation_id);
    this.byBuyer.set(state.buyer_id, open);
    return { ...state };
  }

  lookup(conversationId: string, buyerId?: string): Readonly<ConversationState> | null {
    const direct = this.map.get(conversationId);
    if (direct) return { ...direct };

    if (buyerId === undefined) return null;
    const open = this.byBuyer.get(buyerId);
    if (!open || open.size !== 1) return null;

    const [onlyId] = open;
    const only = this.map.get(onlyId);
    return only ? { ...only } : null;
  }

  release(conversationId: string, orderId?: string): boolean {
    const state = this.map.get(conversationId);
    if (!state) return false;
    if (orderId !== undefined && state.order_id !== orderId) return false;

    this.map.delete(conversationId);
    const open = this.byBuyer.get(state.buyer_id);
    if (open) {
      open.delete(conversationId);
      if (open.size === 0) {
        this.byBuyer.delete(state.buyer_id);
      }
    }
    return true;
  }

  setDestination(conversationId: string, destination: string): Readonly<ConversationState> | null {
    const state = this.map.get(conversationId);
    if (!state || state.submitted) return null;

    state.destination = destination;
    state.step = "AWAITING_CONFIRMATION";
    state.updated_at = this.now();
    return { ...state };
  }

  markSubmitted(conversationId: string): boolean {
    const state = this.map.get(conversationId);
    if (!state || state.submitted || state.step !== "AWAITING_CONFIRMATION") return false;

    state.submitted = true;
    state.updated_at = this.now();
    return true;
  }

  sweep(now: number = this.now()): ConversationState[] {
    if (this.ttlMs <= 0) return [];

    const expired: ConversationState[] = [];
    for (const state of this.map.values()) {
      if (!state.submitted && now - state.updated_at > this.ttlMs) {
        expired.push({ ...state });
      }
    }
    for (const state of expired) {
      this.release(state.conversation_id);
    }
    return expired;
  }

  size(): number {
    return this.map.size;
  }
}
