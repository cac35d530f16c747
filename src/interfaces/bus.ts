import { CloudEvent } from "../implementations/event/cloud-event";
import { JSON_FORMAT_MEDIA_TYPE } from "../implementations/formats/json-format";
import { ContentMode, PublishOptions, SubscribeOptions } from "./io-options";

interface ConnectionOptions {
  url: string;
  exchange: string;
  exchangeType: 'topic' | 'direct' | 'fanout';
}

interface ConsumerOptions {
  prefetch: number;
}

interface ProducerOptions {
  persistent: boolean;
  mandatory: boolean;
  /** Content mode used when `publish` is not given one. */
  mode: ContentMode;
  /** Media type of the structured format, resolved through the bus's format registry. */
  format: string;
}

export interface EventBusOptions {
  connection: Pick<ConnectionOptions, 'url'> & Partial<ConnectionOptions>;
  consumer?: Partial<ConsumerOptions>;
  producer?: Partial<ProducerOptions>;
}

export const DEFAULT_OPTIONS: {
  connection: Omit<ConnectionOptions, 'url'>;
  consumer: ConsumerOptions;
  producer: ProducerOptions;
} = {
  connection: {
    exchange: 'events',
    exchangeType: 'topic'
  },
  consumer: {
    prefetch: 1
  },
  producer: {
    persistent: true,
    mandatory: true,
    mode: 'binary',
    format: JSON_FORMAT_MEDIA_TYPE
  }
};

export interface ValidatedEventBusOptions {
  connection: ConnectionOptions;
  consumer: ConsumerOptions;
  producer: ProducerOptions;
}

export type EventHandler = (event: CloudEvent) => Promise<void>;

export interface EventBus<E extends string = string> {
  publish(event: CloudEvent, options?: PublishOptions): Promise<void>;
  /** Resolves with the consumer tag to pass to `unsubscribe`. */
  subscribe(
    type: E | E[],
    handler: EventHandler,
    options?: SubscribeOptions
  ): Promise<string>;
  unsubscribe(consumerTag: string): Promise<void>;
  close(): Promise<void>;
}
