import { Producer } from "kafkajs";
import { ACKs } from "../commons";

export interface DeadLetterRecord {
  originalRecord: {
    value: string | null;
    key: string | null;
    __sourceTopic: string;
    __sourcePartition: number;
    __sourceOffset: string;
    __sourceTimestamp?: string;
  };
  errorMessage: string;
  errorType: string;
  failedAt: string;
  source: "decode";
}

export interface DeadLetterSink {
  readonly topic: string;
  send(record: DeadLetterRecord): Promise<void>;
}

export interface FailedMessage {
  topic: string;
  partition: number;
  offset: string;
  value: Buffer | null;
  key?: Buffer | null;
  timestamp?: string;
}

export const buildDeadLetterRecord = (
  message: FailedMessage,
  error: Error,
  failedAt: Date = new Date(),
): DeadLetterRecord => ({
  originalRecord: {
    value: message.value === null ? null : message.value.toString("utf8"),
    key: message.key ? message.key.toString("utf8") : null,
    __sourceTopic: message.topic,
    __sourcePartition: message.partition,
    __sourceOffset: message.offset,
    ...(message.timestamp !== undefined && {
      __sourceTimestamp: message.timestamp,
    }),
  },
  errorMessage: error.message,
  errorType: error.name,
  failedAt: failedAt.toISOString(),
  source: "decode",
});

/**
 * Publishes undecodable messages so the source partition can move on. The
 * send is acknowledged by all in-sync replicas before the caller commits.
 */
export class KafkaDeadLetterSink implements DeadLetterSink {
  constructor(
    private readonly producer: Producer,
    readonly topic: string,
  ) {}

  async send(record: DeadLetterRecord): Promise<void> {
    const { __sourceTopic, __sourcePartition, __sourceOffset } =
      record.originalRecord;
    await this.producer.send({
      topic: this.topic,
      acks: ACKs,
      messages: [
        {
          key: `${__sourceTopic}:${__sourcePartition}:${__sourceOffset}`,
          value: JSON.stringify(record),
        },
      ],
    });
  }
}
