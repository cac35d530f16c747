import { ConsumeMessage, Options } from "amqplib";
import { EventFormat } from "../../interfaces/event-format";
import { Message } from "../../interfaces/message";
import { toBuffer } from "../../utils/bytes";
import { CloudEvent } from "../event/cloud-event";
import { defaultFormatRegistry, FormatRegistry } from "../formats/format-registry";
import { AMQP_ATTR_PREFIX, readMessage, writeBinary } from "../headers/headers-codec";

const CONTENT_TYPE_HEADER = `${AMQP_ATTR_PREFIX}datacontenttype`;

export interface AmqpEncodedMessage {
    content: Buffer;
    options: Options.Publish;
}

/**
 * Binary mode: attributes and extensions become `cloudEvents:` headers with
 * their types kept, `datacontenttype` moves to the content-type property and
 * the data is the message content. An event without data is sent with empty
 * content.
 */
export function encodeBinary(event: CloudEvent): AmqpEncodedMessage {
    const { headers, body } = writeBinary(event, { prefix: AMQP_ATTR_PREFIX });
    const contentType = event.getDataContentType();
    delete headers[CONTENT_TYPE_HEADER];

    const options: Options.Publish = { headers, messageId: event.getId() };
    if (contentType !== undefined) {
        options.contentType = contentType;
    }

    return {
        content: body !== undefined ? toBuffer(body) : Buffer.alloc(0),
        options,
    };
}

export function encodeStructured(event: CloudEvent, format: EventFormat): AmqpEncodedMessage {
    return event.asStructuredMessage(format).visitStructured({
        setEvent: (eventFormat, payload) => ({
            content: toBuffer(payload),
            options: { contentType: eventFormat.mediaType(), messageId: event.getId() },
        }),
    });
}

export function decode(msg: ConsumeMessage, registry: FormatRegistry = defaultFormatRegistry): Message {
    const { contentType, headers } = msg.properties;

    return readMessage(
        {
            headers: headers ?? {},
            body: msg.content.length > 0 ? msg.content : undefined,
            contentType: typeof contentType === "string" ? contentType : undefined,
            prefix: AMQP_ATTR_PREFIX,
        },
        registry
    );
}
