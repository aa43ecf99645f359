import {
  type AgentId,
  type EventPayloads,
  type EventType,
  type RunEvent,
  type RunId,
  isTerminalEvent,
} from "./types";

export type EventDraft = {
  [K in EventType]: {
    type: K;
    payload: EventPayloads[K];
    actor_id?: AgentId;
  };
}[EventType];

export type SubscribeFrom = "start" | "now";

export interface EventSubscription extends AsyncIterable<RunEvent> {
  next(): Promise<IteratorResult<RunEvent>>;
  close(): void;
}

class QueueSubscription implements EventSubscription {
  private readonly queue: RunEvent[];
  private waiter: ((result: IteratorResult<RunEvent>) => void) | undefined;
  private ended = false;

  constructor(
    backlog: RunEvent[],
    private readonly detach: (subscription: QueueSubscription) => void,
  ) {
    this.queue = backlog;
  }

  push(event: RunEvent): void {
    if (this.ended) {
      return;
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve({ done: false, value: event });
      return;
    }
    this.queue.push(event);
  }

  end(): void {
    this.ended = true;
    if (this.waiter && this.queue.length === 0) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<RunEvent>> {
    const head = this.queue.shift();
    if (head) {
      return Promise.resolve({ done: false, value: head });
    }
    if (this.ended) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    this.detach(this);
    this.queue.length = 0;
    this.end();
  }

  [Symbol.asyncIterator](): AsyncIterator<RunEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}

/**
 * Append-only, totally ordered event log for one run. Appends are
 * synchronous, so concurrent actor work is serialized at the call site.
 * A subscription taken "from start" receives the backlog captured at
 * subscribe time followed by every later append.
 */
export class EventStream {
  private readonly events: RunEvent[] = [];
  private readonly subscribers = new Set<QueueSubscription>();
  private closed = false;

  constructor(
    readonly runId: RunId,
    private readonly onAppend?: (event: RunEvent) => void,
  ) {}

  static replayOnly(runId: RunId, events: RunEvent[]): EventStream {
    const stream = new EventStream(runId);
    stream.events.push(...events);
    stream.closed = true;
    return stream;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.events.length;
  }

  append(draft: EventDraft): RunEvent {
    if (this.closed) {
      throw new Error(`Event stream for ${this.runId} is closed`);
    }

    const event: RunEvent = {
      ...draft,
      seq: this.events.length + 1,
      run_id: this.runId,
      timestamp: new Date().toISOString(),
    };
    this.events.push(event);
    this.onAppend?.(event);
    for (const subscriber of this.subscribers) {
      subscriber.push(event);
    }

    if (isTerminalEvent(event)) {
      this.close();
    }
    return event;
  }

  history(): readonly RunEvent[] {
    return [...this.events];
  }

  subscribe(from: SubscribeFrom = "now"): EventSubscription {
    const backlog = from === "start" ? [...this.events] : [];
    const subscription = new QueueSubscription(backlog, (entry) => {
      this.subscribers.delete(entry);
    });

    if (this.closed) {
      subscription.end();
      return subscription;
    }

    this.subscribers.add(subscription);
    return subscription;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const subscriber of this.subscribers) {
      subscriber.end();
    }
    this.subscribers.clear();
  }
}

export const collectEvents = async (
  subscription: AsyncIterable<RunEvent>,
): Promise<RunEvent[]> => {
  const events: RunEvent[] = [];
  for await (const event of subscription) {
    events.push(event);
  }
  return events;
};
