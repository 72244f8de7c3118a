/**
 * Stats events for FlagTier SDKs
 *
 * Evaluations, exposures and conversions are buffered in a bounded queue
 * and posted to the stats endpoint in batches.
 */

import { SimpleEventEmitter } from "./emitter";
import { retryWithBackoff } from "./retry";
import type { ServedValue } from "./types";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export interface FlagEvaluationEvent {
  type: "flag_evaluation";
  flagKey: string;
  /** Served side, named `value` on the wire */
  value: ServedValue;
  userId: string;
  country?: string;
  language?: string;
}

export interface ExperimentExposureEvent {
  type: "experiment_exposure";
  experimentKey: string;
  variationKey: string;
  userId: string;
}

export interface ConversionEvent {
  type: "conversion";
  experimentKey: string;
  metricName: string;
  variationKey: string;
  userId: string;
  value?: number;
}

export interface CustomStatsEvent {
  type: "custom_event";
  eventName: string;
  userId: string;
  country?: string;
  language?: string;
  flagKey?: string;
  experimentKey?: string;
  variationKey?: string;
  value?: number;
  label?: string;
}

export type StatsEventPayload =
  | FlagEvaluationEvent
  | ExperimentExposureEvent
  | ConversionEvent
  | CustomStatsEvent;

export type StatsEventType = StatsEventPayload["type"];

/**
 * Buffered event: the payload flattened with an ISO-8601 timestamp
 */
export type QueuedEvent = StatsEventPayload & { timestamp: string };

/**
 * Sends one batch. Rejects on any transport failure.
 */
export type BatchSender = (events: QueuedEvent[]) => Promise<void>;

export interface EventQueueConfig {
  /** Enable/disable stats collection (default: true) */
  enabled: boolean;
  /** Queue length that triggers an automatic flush (default: 20) */
  batchSize: number;
  /** Capacity; the oldest event is dropped beyond it (default: 1000) */
  maxQueueSize: number;
  /** Total send attempts per flush (default: 3) */
  maxRetries: number;
  /** Backoff before the second attempt, doubled each time (default: 1000) */
  baseDelayMs: number;
}

export const DEFAULT_EVENT_QUEUE_CONFIG: EventQueueConfig = {
  enabled: true,
  batchSize: 20,
  maxQueueSize: 1000,
  maxRetries: 3,
  baseDelayMs: 1000,
};

type EventQueueEvents = {
  flush: { eventsSent: number; attempts: number };
  dropped: { eventCount: number; attempts: number; error: Error };
  evicted: { event: QueuedEvent };
};

/**
 * Bounded FIFO of stats events with batch flushing.
 *
 * Only `enqueue` and `flush` mutate the buffer. A flush never rejects:
 * after `maxRetries` failed sends the batch stays buffered and the
 * failure is reported through the `dropped` event.
 */
export class EventQueue extends SimpleEventEmitter<EventQueueEvents> {
  private readonly config: EventQueueConfig;
  private readonly send: BatchSender;
  private readonly logger: Logger;
  private buffer: QueuedEvent[] = [];
  private inflight: Promise<void> | null = null;

  constructor(
    send: BatchSender,
    config: Partial<EventQueueConfig> = {},
    logger: Logger = silentLogger,
  ) {
    super();
    this.send = send;
    this.config = { ...DEFAULT_EVENT_QUEUE_CONFIG, ...config };
    this.logger = logger;
  }

  enqueue(payload: StatsEventPayload, now: Date = new Date()): void {
    if (!this.config.enabled) {
      return;
    }

    while (
      this.buffer.length > 0 &&
      this.buffer.length >= this.config.maxQueueSize
    ) {
      const evicted = this.buffer.shift();
      if (evicted) {
        this.logger.debug(
          `Stats queue full, dropping oldest ${evicted.type} event`,
        );
        this.emit("evicted", { event: evicted });
      }
    }

    this.buffer.push({ ...payload, timestamp: now.toISOString() });

    if (this.buffer.length >= this.config.batchSize) {
      this.flush().catch((err: unknown) => {
        this.logger.error("Unexpected stats flush failure", err);
      });
    }
  }

  /**
   * Post everything buffered, including events enqueued while a send is
   * in flight. Concurrent callers share one in-flight flush.
   */
  flush(): Promise<void> {
    if (this.inflight) {
      return this.inflight;
    }
    if (this.buffer.length === 0) {
      return Promise.resolve();
    }

    this.inflight = this.drain().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private async drain(): Promise<void> {
    while (this.buffer.length > 0) {
      const sent = await this.sendBatch();
      // Retries exhausted: leave the rest for the next flush
      if (!sent) {
        return;
      }
    }
  }

  private async sendBatch(): Promise<boolean> {
    const batch = [...this.buffer];

    const result = await retryWithBackoff(() => this.send(batch), {
      maxAttempts: this.config.maxRetries,
      baseDelayMs: this.config.baseDelayMs,
      shouldRetry: () => true,
    });

    if (!result.success) {
      const error = result.error ?? new Error("Stats flush failed");
      this.logger.warn(
        `Dropping stats flush after ${result.attempts} attempts: ${error.message}`,
      );
      this.emit("dropped", {
        eventCount: batch.length,
        attempts: result.attempts,
        error,
      });
      return false;
    }

    // Evicted events are already gone; later arrivals go in the next batch
    const sent = new Set(batch);
    this.buffer = this.buffer.filter((event) => !sent.has(event));
    this.emit("flush", { eventsSent: batch.length, attempts: result.attempts });
    return true;
  }

  size(): number {
    return this.buffer.length;
  }

  /** Snapshot of buffered events, oldest first */
  peek(): readonly QueuedEvent[] {
    return [...this.buffer];
  }

  /** Discard buffered events without sending */
  clear(): void {
    this.buffer = [];
  }
}
