export type ContentMode = 'binary' | 'structured';

export interface PublishOptions {
    priority?: number;
    expiration?: string;
    headers?: Record<string, unknown>;
    mode?: ContentMode;
}

export interface SubscribeOptions {
    queue?: string;
    consumerTag?: string;
    exclusive?: boolean;
}
