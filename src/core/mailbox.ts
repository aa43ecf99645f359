import { nanoid } from "nanoid";
import { RunCancelledError } from "./errors";
import type { AgentId, Message, MessageId, MessageType, RunId } from "./types";
import { asMessageId } from "./types";

interface PendingInboxWaiter {
  resolve: (messages: Message[]) => void;
  timeout: NodeJS.Timeout;
}

export interface SendInput {
  from: AgentId;
  to: AgentId;
  type: MessageType;
  payload: unknown;
  id?: string;
}

/**
 * Per-run actor-to-actor channel. Delivery is at-least-once: a message stays
 * in the recipient's inbox, and is handed out again on every drain, until
 * the recipient acknowledges it. Inboxes are FIFO, so order per sender is
 * preserved; nothing orders messages across senders.
 */
export class Mailbox {
  private readonly messages = new Map<MessageId, Message>();
  private readonly inboxes = new Map<AgentId, MessageId[]>();
  private readonly waiters = new Map<AgentId, PendingInboxWaiter[]>();
  private readonly sequences = new Map<AgentId, number>();
  private readonly recipients = new Set<AgentId>();
  private readonly log: Message[] = [];
  private readonly deadLetters: Message[] = [];
  private closed = false;

  constructor(readonly runId: RunId) {}

  register(agentId: AgentId): void {
    this.recipients.add(agentId);
  }

  send(input: SendInput): Message {
    const id = asMessageId(input.id ?? nanoid());
    const existing = this.messages.get(id);
    if (existing) {
      return existing;
    }

    const seq = (this.sequences.get(input.from) ?? 0) + 1;
    this.sequences.set(input.from, seq);
    const message: Message = {
      id,
      run_id: this.runId,
      from: input.from,
      to: input.to,
      type: input.type,
      seq,
      timestamp: new Date().toISOString(),
      payload: input.payload,
    };
    this.log.push(message);

    if (this.closed || !this.recipients.has(message.to)) {
      this.deadLetters.push(message);
      return message;
    }

    this.messages.set(message.id, message);
    const existingQueue = this.inboxes.get(message.to);
    if (existingQueue) {
      existingQueue.push(message.id);
    } else {
      this.inboxes.set(message.to, [message.id]);
    }
    this.deliverIfWaiting(message.to);
    return message;
  }

  ack(messageId: MessageId): void {
    const message = this.messages.get(messageId);
    if (!message) {
      return;
    }

    this.messages.delete(messageId);
    const queue = this.inboxes.get(message.to);
    if (!queue) {
      return;
    }
    const index = queue.indexOf(messageId);
    if (index >= 0) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.inboxes.delete(message.to);
    }
  }

  /** Unacknowledged messages for the agent, oldest first. */
  drain(agentId: AgentId): Message[] {
    const queue = this.inboxes.get(agentId);
    if (!queue) {
      return [];
    }

    const messages: Message[] = [];
    for (const id of queue) {
      const message = this.messages.get(id);
      if (message) {
        messages.push(message);
      }
    }
    return messages;
  }

  async waitFor(
    agentId: AgentId,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<Message[]> {
    const current = this.drain(agentId);
    if (current.length > 0 || this.closed) {
      return current;
    }
    if (signal?.aborted) {
      throw new RunCancelledError();
    }

    return new Promise<Message[]>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timeout);
        this.removeWaiter(agentId, settle);
        reject(new RunCancelledError());
      };
      const settle = (messages: Message[]) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(messages);
      };
      const timeout = setTimeout(() => {
        this.removeWaiter(agentId, settle);
        settle([]);
      }, timeoutMs);

      signal?.addEventListener("abort", onAbort, { once: true });
      const entries = this.waiters.get(agentId) ?? [];
      entries.push({ resolve: settle, timeout });
      this.waiters.set(agentId, entries);
    });
  }

  transcript(): readonly Message[] {
    return [...this.log];
  }

  undelivered(): readonly Message[] {
    return [...this.deadLetters];
  }

  pendingCount(agentId: AgentId): number {
    return this.inboxes.get(agentId)?.length ?? 0;
  }

  /** Releases every waiter with what it has; later sends become dead letters. */
  close(): void {
    this.closed = true;
    for (const [agentId, waiters] of this.waiters) {
      const messages = this.drain(agentId);
      for (const waiter of waiters) {
        clearTimeout(waiter.timeout);
        waiter.resolve(messages);
      }
    }
    this.waiters.clear();
  }

  private deliverIfWaiting(agentId: AgentId): void {
    const waiters = this.waiters.get(agentId);
    if (!waiters || waiters.length === 0) {
      return;
    }

    const messages = this.drain(agentId);
    if (messages.length === 0) {
      return;
    }

    this.waiters.set(agentId, []);
    for (const waiter of waiters) {
      clearTimeout(waiter.timeout);
      waiter.resolve(messages);
    }
  }

  private removeWaiter(
    agentId: AgentId,
    resolver: (messages: Message[]) => void,
  ): void {
    const waiters = this.waiters.get(agentId);
    if (!waiters) {
      return;
    }

    this.waiters.set(
      agentId,
      waiters.filter((entry) => entry.resolve !== resolver),
    );
  }
}
