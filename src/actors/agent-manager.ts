import {
  ActorInvocationError,
  RunCancelledError,
  TurnTimeoutError,
  errorMessage,
  throwIfCancelled,
} from "../core/errors";
import type { Logger } from "../core/logger";
import type {
  AgentId,
  Stage,
  UnavailableContribution,
} from "../core/types";
import type { RetryPolicy } from "../project/config";
import type { Actor, ActorContext, ActorOutput, Observation } from "./actor";

export interface TurnRequest {
  actor: Actor;
  /** Called once per attempt so redelivered mailbox messages are seen again. */
  observe: () => Observation;
}

export interface TurnResult {
  /** Completed outputs, in request order. */
  outputs: Map<AgentId, ActorOutput>;
  unavailable: UnavailableContribution[];
}

export interface AgentManagerOptions {
  retry: RetryPolicy;
  stageTimeoutMs: number;
  maxConcurrent: number;
  logger: Logger;
  createContext: (actor: Actor, signal: AbortSignal) => ActorContext;
}

/** Counting semaphore; waiters are served in arrival order. */
export class Semaphore {
  private available: number;
  private readonly waiters: (() => void)[] = [];

  constructor(permits: number) {
    this.available = permits;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.available += 1;
  }
}

const delay = (ms: number, signal: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new RunCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

/** Settles with the promise, or rejects with the signal's reason once it aborts. */
const untilAborted = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      const reason: unknown = signal.reason;
      reject(reason instanceof Error ? reason : new RunCancelledError());
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });

/**
 * Runs actor turns for one run. Every request in a turn starts at once
 * (bounded by `maxConcurrent`) and the turn joins on all of them, bounded by
 * `stageTimeoutMs`. An actor never runs two turns at the same time.
 */
export class AgentManager {
  private readonly semaphore: Semaphore;
  private readonly locks = new Map<AgentId, Promise<void>>();

  constructor(private readonly options: AgentManagerOptions) {
    this.semaphore = new Semaphore(Math.max(1, options.maxConcurrent));
  }

  async runTurn(
    stage: Stage,
    requests: readonly TurnRequest[],
    runSignal: AbortSignal,
  ): Promise<TurnResult> {
    throwIfCancelled(runSignal);
    const turn = new AbortController();
    const forwardCancel = () => turn.abort(runSignal.reason);
    runSignal.addEventListener("abort", forwardCancel, { once: true });
    const timer = setTimeout(
      () => turn.abort(new TurnTimeoutError(stage, this.options.stageTimeoutMs)),
      this.options.stageTimeoutMs,
    );

    try {
      const settled = await Promise.allSettled(
        requests.map((request) =>
          untilAborted(
            this.exclusive(request.actor.id, () =>
              this.attempt(stage, request, turn.signal),
            ),
            turn.signal,
          ),
        ),
      );
      throwIfCancelled(runSignal);

      const outputs = new Map<AgentId, ActorOutput>();
      const unavailable: UnavailableContribution[] = [];
      settled.forEach((result, index) => {
        const request = requests[index];
        if (!request) {
          return;
        }
        const { actor } = request;
        if (result.status === "fulfilled") {
          outputs.set(actor.id, result.value);
          return;
        }
        this.options.logger.warn("actor unavailable", {
          stage,
          actor: actor.id,
          reason: errorMessage(result.reason),
        });
        unavailable.push({
          actor_id: actor.id,
          ...(actor.department ? { department: actor.department } : {}),
          stage,
          reason: errorMessage(result.reason),
        });
      });
      return { outputs, unavailable };
    } finally {
      clearTimeout(timer);
      runSignal.removeEventListener("abort", forwardCancel);
      if (!turn.signal.aborted) {
        turn.abort(new RunCancelledError("turn finished"));
      }
    }
  }

  private async exclusive<T>(actorId: AgentId, work: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(actorId) ?? Promise.resolve();
    let release = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(actorId, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.locks.get(actorId) === tail) {
        this.locks.delete(actorId);
      }
    }
  }

  private async attempt(
    stage: Stage,
    request: TurnRequest,
    signal: AbortSignal,
  ): Promise<ActorOutput> {
    const { actor } = request;
    const { attempts, backoffMs } = this.options.retry;
    let lastError: unknown;

    for (let attempt = 0; attempt <= attempts; attempt += 1) {
      throwIfCancelled(signal);
      await this.semaphore.acquire();
      try {
        return await actor.step(
          request.observe(),
          this.options.createContext(actor, signal),
        );
      } catch (error) {
        if (error instanceof RunCancelledError || signal.aborted) {
          throw error;
        }
        lastError = error;
        this.options.logger.debug("actor attempt failed", {
          stage,
          actor: actor.id,
          attempt: attempt + 1,
          error: errorMessage(error),
        });
      } finally {
        this.semaphore.release();
      }

      if (attempt < attempts) {
        await delay(backoffMs * 2 ** attempt, signal);
      }
    }

    throw new ActorInvocationError(
      actor.id,
      stage,
      `failed after ${attempts + 1} attempts: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
  }
}
