import { DEFAULT_OPTIONS, EventBusOptions, ValidatedEventBusOptions } from "../../interfaces";

export function validateAndMergeOptions(options: EventBusOptions): ValidatedEventBusOptions {
    if (!options.connection?.url) {
        throw new Error('Connection URL is required');
    }

    const merged: ValidatedEventBusOptions = {
        connection: {
            ...DEFAULT_OPTIONS.connection,
            ...options.connection,
            url: options.connection.url,
        },
        consumer: {
            ...DEFAULT_OPTIONS.consumer,
            ...options.consumer,
        },
        producer: {
            ...DEFAULT_OPTIONS.producer,
            ...options.producer,
        },
    };

    if (!Number.isInteger(merged.consumer.prefetch) || merged.consumer.prefetch < 0) {
        throw new Error(`Consumer prefetch must be a non-negative integer, got ${merged.consumer.prefetch}`);
    }

    return merged;
}
