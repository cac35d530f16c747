import { Channel, connect, ConsumeMessage } from "amqplib";
import { v4 as uuid } from "uuid";
import { MessageProcessingError, toError } from "../../errors";
import {
    ContentMode,
    EventBus,
    EventBusOptions,
    EventHandler,
    PublishOptions,
    SubscribeOptions,
    ValidatedEventBusOptions,
} from "../../interfaces";
import { CloudEvent } from "../event/cloud-event";
import { defaultFormatRegistry, FormatRegistry } from "../formats/format-registry";
import { validateAndMergeOptions } from "../utils/bus-options-validator";
import { AmqpEncodedMessage, decode, encodeBinary, encodeStructured } from "./amqp-codec";

type AmqpConnection = Awaited<ReturnType<typeof connect>>;

/**
 * Publishes CloudEvents to a RabbitMQ exchange, routed by event type, and
 * consumes them back. Messages whose handler fails are logged and rejected
 * without requeue.
 */
export class RabbitMQEventBus<E extends string = string> implements EventBus<E> {
    private connection?: AmqpConnection;
    private channel?: Channel;
    private readonly options: ValidatedEventBusOptions;
    private isInitialized = false;

    constructor(
        options: EventBusOptions,
        private readonly registry: FormatRegistry = defaultFormatRegistry
    ) {
        this.options = validateAndMergeOptions(options);

        if (this.registry.resolve(this.options.producer.format) === undefined) {
            throw new Error(`No event format registered for ${this.options.producer.format}`);
        }
    }

    private validateState(): Channel {
        if (!this.isInitialized) {
            throw new Error("EventBus not initialized. Call init() first.");
        }
        if (!this.connection || !this.channel) {
            throw new Error("Connection or channel not available.");
        }
        return this.channel;
    }

    async init(): Promise<void> {
        try {
            this.connection = await connect(this.options.connection.url);
            this.channel = await this.connection.createChannel();

            await this.channel.assertExchange(
                this.options.connection.exchange,
                this.options.connection.exchangeType,
                { durable: true }
            );

            this.setupEventHandlers(this.connection, this.channel);
            this.isInitialized = true;
            console.log("RabbitMQ EventBus initialized successfully");
        } catch (error) {
            console.error("Failed to initialize RabbitMQ EventBus:", error);
            throw error;
        }
    }

    private setupEventHandlers(connection: AmqpConnection, channel: Channel): void {
        connection.on("error", (error: Error) => {
            console.error("Connection error:", error);
        });
        connection.on("close", () => {
            console.warn("RabbitMQ connection closed");
            this.isInitialized = false;
        });

        channel.on("error", (error: Error) => {
            console.error("Channel error:", error);
        });
        channel.on("return", (msg: ConsumeMessage) => {
            console.warn("Message returned as unroutable:", {
                exchange: msg.fields.exchange,
                routingKey: msg.fields.routingKey,
                messageId: msg.properties.messageId,
            });
        });
    }

    private encode(event: CloudEvent, mode: ContentMode): AmqpEncodedMessage {
        if (mode === "binary") {
            return encodeBinary(event);
        }

        const format = this.registry.resolve(this.options.producer.format);
        if (format === undefined) {
            throw new Error(`No event format registered for ${this.options.producer.format}`);
        }
        return encodeStructured(event, format);
    }

    async publish(event: CloudEvent, options?: PublishOptions): Promise<void> {
        const channel = this.validateState();
        const messageId = event.getId();

        try {
            const { content, options: encoded } = this.encode(event, options?.mode ?? this.options.producer.mode);

            const published = channel.publish(
                this.options.connection.exchange,
                event.getType(),
                content,
                {
                    ...encoded,
                    persistent: this.options.producer.persistent,
                    mandatory: this.options.producer.mandatory,
                    timestamp: Date.now(),
                    priority: options?.priority,
                    expiration: options?.expiration,
                    headers: {
                        ...encoded.headers,
                        ...options?.headers
                    }
                }
            );

            if (!published) {
                throw new Error('Message was not confirmed by the broker');
            }
        } catch (error) {
            throw new MessageProcessingError(
                `Failed to publish event ${messageId}`,
                toError(error)
            );
        }
    }

    async subscribe(
        type: E | E[],
        handler: EventHandler,
        options?: SubscribeOptions
    ): Promise<string> {
        const channel = this.validateState();
        const types = Array.isArray(type) ? type : [type];
        const queueName = options?.queue || uuid();

        try {
            const { queue } = await channel.assertQueue(queueName, {
                exclusive: options?.exclusive ?? !options?.queue,
                durable: true,
            });

            for (const eventType of types) {
                await channel.bindQueue(
                    queue,
                    this.options.connection.exchange,
                    eventType
                );
            }

            await channel.prefetch(this.options.consumer.prefetch);

            const { consumerTag } = await channel.consume(
                queue,
                async (msg) => {
                    if (!msg) return;
                    await this.handleMessage(channel, msg, handler);
                },
                { noAck: false, consumerTag: options?.consumerTag }
            );

            console.log(`Subscribed ${consumerTag} to ${types.join(", ")} on queue ${queue}`);
            return consumerTag;
        } catch (error) {
            console.error(`Failed to subscribe to ${types.join(", ")}:`, error);
            throw error;
        }
    }

    private async handleMessage(channel: Channel, msg: ConsumeMessage, handler: EventHandler): Promise<void> {
        const messageId = msg.properties.messageId || "unknown";
        const startTime = Date.now();

        try {
            const event = decode(msg, this.registry).toEvent();
            await handler(event);
            channel.ack(msg);
            console.log(`[${messageId}] Processed ${event.getType()} in ${Date.now() - startTime}ms`);
        } catch (error) {
            console.error(`[${messageId}] Message processing failed after ${Date.now() - startTime}ms:`, error);
            channel.nack(msg, false, false);
        }
    }

    async unsubscribe(consumerTag: string): Promise<void> {
        const channel = this.validateState();

        try {
            await channel.cancel(consumerTag);
            console.log(`Unsubscribed consumer ${consumerTag}`);
        } catch (error) {
            console.error(`Failed to unsubscribe consumer ${consumerTag}:`, error);
            throw error;
        }
    }

    async close(): Promise<void> {
        try {
            if (this.channel) {
                await this.channel.close();
                this.channel = undefined;
            }
            if (this.connection) {
                await this.connection.close();
                this.connection = undefined;
            }
            this.isInitialized = false;
            console.log("RabbitMQ EventBus closed successfully");
        } catch (error) {
            throw new MessageProcessingError(
                "Failed to close RabbitMQ connection",
                toError(error)
            );
        }
    }
}
