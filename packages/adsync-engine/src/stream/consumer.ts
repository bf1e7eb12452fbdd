import {
  ConsumerRunConfig,
  ConsumerSubscribeTopics,
  TopicPartitionOffset,
  TopicPartitionOffsetAndMetadata,
} from "kafkajs";
import {
  Logger,
  backoffDelay,
  buildLogger,
  logError,
  sleep,
} from "../commons";
import { DecodeError, SyncError, errorMessage, isRetriable } from "../errors";
import {
  SourceTableName,
  TableHandler,
  TableRegistry,
  mapTables,
} from "../model/tables";
import { runWithSyncContext } from "../utils/structured-logging";
import { DeadLetterSink, buildDeadLetterRecord } from "./deadLetter";
import { ChangeEvent, decodeChangeEvent } from "./decoder";
import { ProcessOutcome, StreamProcessor } from "./processor";

/** The parts of a KafkaJS message the loop reads. */
export interface SourceMessage {
  value: Buffer | null;
  offset: string;
  key?: Buffer | null;
  timestamp?: string;
}

export interface TopicBatch {
  topic: string;
  partition: number;
  messages: SourceMessage[];
}

/** The parts of KafkaJS's `eachBatch` payload the loop uses. */
export interface BatchPayload {
  batch: TopicBatch;
  resolveOffset(offset: string): void;
  heartbeat(): Promise<void>;
  isRunning(): boolean;
  isStale(): boolean;
}

/** The parts of a KafkaJS consumer the loop drives. */
export interface ConsumerLike {
  connect(): Promise<void>;
  subscribe(subscription: ConsumerSubscribeTopics): Promise<void>;
  run(config: ConsumerRunConfig): Promise<void>;
  disconnect(): Promise<void>;
  commitOffsets(offsets: TopicPartitionOffsetAndMetadata[]): Promise<void>;
  seek(position: TopicPartitionOffset): void;
  pause(topics: Array<{ topic: string; partitions?: number[] }>): void;
}

export interface MessageRoute {
  table: SourceTableName;
  handle(value: Buffer | null): Promise<ProcessOutcome>;
}

/** Anything thrown while decoding is a DecodeError, whatever raised it. */
function decode<T extends SourceTableName>(
  value: Buffer | null,
  handler: TableHandler<T>,
): ChangeEvent<T> | null {
  try {
    return decodeChangeEvent(value, handler);
  } catch (error) {
    if (error instanceof SyncError) {
      throw error;
    }
    throw new DecodeError(`${handler.source.name}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export const createRoute = <T extends SourceTableName>(
  handler: TableHandler<T>,
  processor: StreamProcessor,
): MessageRoute => ({
  table: handler.source.name,
  handle: async (value) => {
    const event = decode(value, handler);
    if (event === null) {
      return {
        action: "skipped",
        table: handler.source.name,
        reason: "empty value (compaction tombstone)",
      };
    }
    return processor.process(handler, event);
  },
});

/** topic -> route, resolved once at startup. */
export const buildRoutes = (
  registry: TableRegistry,
  topicFor: (table: SourceTableName) => string,
  processor: StreamProcessor,
): Map<string, MessageRoute> =>
  new Map(
    mapTables<[string, MessageRoute]>(registry, (handler) => [
      topicFor(handler.source.name),
      createRoute(handler, processor),
    ]),
  );

export interface TableStats {
  received: number;
  written: number;
  skipped: number;
  deadLettered: number;
  failed: number;
}

export interface ConsumerLoopOptions {
  fromBeginning: boolean;
  /** First redelivery delay after a failed write; doubles up to `retryCapMs`. */
  retryBackoffMs: number;
  retryCapMs: number;
  deadLetters?: DeadLetterSink;
  loggerFor?: (topic: string, partition: number) => Logger;
}

type MessageResult = "commit" | "retry" | "halt";

export const nextOffset = (offset: string): string =>
  (BigInt(offset) + 1n).toString();

/**
 * At-least-once consumer: each message is decoded, processed and written,
 * and only then is its position committed. A failed write rewinds the
 * partition to the message so it is redelivered after a backoff; a failure
 * that is not retriable halts the topic instead.
 *
 * Undecodable messages follow one policy for every topic: with a dead-letter
 * sink they are published there and committed, otherwise the topic halts on
 * them.
 */
export class StreamConsumerLoop {
  private readonly stats = new Map<SourceTableName, TableStats>();
  private readonly failureStreaks = new Map<string, number>();
  private readonly halted = new Set<string>();
  private readonly loggerFor: (topic: string, partition: number) => Logger;
  private readonly logger: Logger;

  constructor(
    private readonly consumer: ConsumerLike,
    private readonly routes: ReadonlyMap<string, MessageRoute>,
    private readonly options: ConsumerLoopOptions,
  ) {
    for (const route of routes.values()) {
      this.stats.set(route.table, {
        received: 0,
        written: 0,
        skipped: 0,
        deadLettered: 0,
        failed: 0,
      });
    }
    this.loggerFor =
      options.loggerFor ??
      ((topic, partition) => buildLogger(`stream:${topic} (partition ${partition})`));
    this.logger = buildLogger("stream");
  }

  get topics(): string[] {
    return [...this.routes.keys()];
  }

  get haltedTopics(): string[] {
    return [...this.halted];
  }

  getStats(): Record<string, TableStats> {
    return Object.fromEntries(
      [...this.stats].map(([table, stats]) => [table, { ...stats }]),
    );
  }

  async start(): Promise<void> {
    const policy = this.options.deadLetters
      ? `dead-letter to ${this.options.deadLetters.topic}`
      : "halt the topic";
    this.logger.log(`Subscribing to ${this.topics.join(", ")}; on decode failure: ${policy}`);
    await this.consumer.connect();
    await this.consumer.subscribe({
      topics: this.topics,
      fromBeginning: this.options.fromBeginning,
    });
    await this.consumer.run({
      autoCommit: false,
      eachBatchAutoResolve: false,
      partitionsConsumedConcurrently: Math.max(1, this.routes.size),
      eachBatch: (payload) => this.handleBatch(payload),
    });
  }

  async stop(): Promise<void> {
    try {
      this.logger.log("Pausing consumer...");
      this.consumer.pause(this.topics.map((topic) => ({ topic })));
    } catch (error) {
      this.logger.error(`Error pausing consumer: ${errorMessage(error)}`);
    }
    this.logger.log("Disconnecting consumer...");
    await this.consumer.disconnect();
    this.logger.log(`Consumer stopped; stats ${JSON.stringify(this.getStats())}`);
  }

  async handleBatch(payload: BatchPayload): Promise<void> {
    const { topic, partition, messages } = payload.batch;
    const route = this.routes.get(topic);
    if (route === undefined) {
      throw new Error(`No route for topic ${topic}`);
    }
    const logger = this.loggerFor(topic, partition);

    for (const message of messages) {
      if (!payload.isRunning() || payload.isStale()) {
        break;
      }
      const result = await runWithSyncContext(
        { pipeline: "stream", table: route.table },
        () => this.handleMessage(route, topic, partition, message, logger),
      );

      if (result === "halt") {
        this.halted.add(topic);
        this.consumer.pause([{ topic }]);
        this.consumer.seek({ topic, partition, offset: message.offset });
        return;
      }
      if (result === "retry") {
        this.consumer.seek({ topic, partition, offset: message.offset });
        const key = `${topic}:${partition}`;
        const streak = (this.failureStreaks.get(key) ?? 0) + 1;
        this.failureStreaks.set(key, streak);
        const delay = backoffDelay(
          streak,
          this.options.retryBackoffMs,
          this.options.retryCapMs,
        );
        logger.warn(`Redelivering offset ${message.offset} in ${delay}ms (attempt ${streak})`);
        await sleep(delay);
        await payload.heartbeat();
        return;
      }

      payload.resolveOffset(message.offset);
      await this.consumer.commitOffsets([
        { topic, partition, offset: nextOffset(message.offset) },
      ]);
      this.failureStreaks.delete(`${topic}:${partition}`);
      await payload.heartbeat();
    }
  }

  private async handleMessage(
    route: MessageRoute,
    topic: string,
    partition: number,
    message: SourceMessage,
    logger: Logger,
  ): Promise<MessageResult> {
    const stats = this.statsFor(route.table);
    stats.received += 1;

    try {
      const outcome = await route.handle(message.value);
      if (outcome.action === "written") {
        stats.written += 1;
      } else {
        stats.skipped += 1;
        logger.log(`Skipped offset ${message.offset}: ${outcome.reason}`);
      }
      return "commit";
    } catch (error) {
      if (error instanceof DecodeError) {
        return this.handleDecodeFailure(error, route, topic, partition, message, logger);
      }
      stats.failed += 1;
      logError(logger, error);
      if (!isRetriable(error)) {
        logger.error(
          `Halting ${topic} at offset ${message.offset}: ${errorMessage(error)}`,
        );
        return "halt";
      }
      logger.error(`Write of offset ${message.offset} failed`);
      return "retry";
    }
  }

  private async handleDecodeFailure(
    error: DecodeError,
    route: MessageRoute,
    topic: string,
    partition: number,
    message: SourceMessage,
    logger: Logger,
  ): Promise<MessageResult> {
    const stats = this.statsFor(route.table);
    const deadLetters = this.options.deadLetters;
    if (deadLetters === undefined) {
      stats.failed += 1;
      logger.error(
        `Halting ${topic} at offset ${message.offset}: ${error.message}`,
      );
      return "halt";
    }

    try {
      await deadLetters.send(
        buildDeadLetterRecord({ topic, partition, ...message }, error),
      );
    } catch (sendError) {
      stats.failed += 1;
      logger.error(`Failed to send offset ${message.offset} to ${deadLetters.topic}`);
      logError(logger, sendError);
      return "retry";
    }
    stats.deadLettered += 1;
    logger.warn(
      `Sent offset ${message.offset} to ${deadLetters.topic}: ${error.message}`,
    );
    return "commit";
  }

  private statsFor(table: SourceTableName): TableStats {
    let stats = this.stats.get(table);
    if (stats === undefined) {
      stats = { received: 0, written: 0, skipped: 0, deadLettered: 0, failed: 0 };
      this.stats.set(table, stats);
    }
    return stats;
  }
}
