import { MessageVisitError, MissingDataError, toError } from "../../errors";
import { EventFormat } from "../../interfaces/event-format";
import { Message } from "../../interfaces/message";
import { BinaryMessageVisitor } from "../../interfaces/visitors";
import { Encoding, SPECVERSION_ATTRIBUTE, SpecVersion, StructuredEventMap } from "../../types";
import { normalizeMediaType } from "../../utils/content-type";
import { defaultVisitorFactory } from "../builders/cloud-event-builder";
import { CloudEvent } from "../event/cloud-event";
import { defaultFormatRegistry, FormatRegistry } from "../formats/format-registry";
import { GenericStructuredMessage, UnknownEncodingMessage } from "../message/generic-messages";
import { HeaderMap, HeadersBinaryMessage } from "../message/headers-binary-message";
import { DATA_MEMBER, readStructuredEvent } from "../message/structured-reader";

export const HTTP_ATTR_PREFIX = "ce-";
export const DEFAULT_ATTR_PREFIX = "ce_";
export const AMQP_ATTR_PREFIX = "cloudEvents:";
export const CLOUDEVENTS_MEDIA_TYPE = "application/cloudevents";

export type HeaderValue = string | number | boolean;

export interface BinaryEncodedMessage {
  headers: Record<string, HeaderValue>;
  body?: Uint8Array;
}

export interface BinaryWriteOptions {
  prefix?: string;
  /** Write extensions as strings, for transports whose headers carry text only. */
  stringOnly?: boolean;
}

export interface MessageInput {
  headers: HeaderMap;
  body?: Uint8Array;
  contentType?: string;
  prefix?: string;
}

class BinaryHeadersWriter implements BinaryMessageVisitor<BinaryEncodedMessage> {
  private readonly headers: Record<string, HeaderValue> = {};
  private body?: Uint8Array;
  private readonly prefix: string;

  constructor(specVersion: SpecVersion, private readonly options: BinaryWriteOptions) {
    this.prefix = options.prefix ?? "";
    this.headers[this.prefix + SPECVERSION_ATTRIBUTE] = specVersion;
  }

  setAttribute(name: string, value: string): void {
    this.headers[this.prefix + name] = value;
  }

  setStringExtension(name: string, value: string): void {
    this.headers[this.prefix + name] = value;
  }

  setNumberExtension(name: string, value: number): void {
    this.headers[this.prefix + name] = this.options.stringOnly ? String(value) : value;
  }

  setBooleanExtension(name: string, value: boolean): void {
    this.headers[this.prefix + name] = this.options.stringOnly ? String(value) : value;
  }

  setBody(body: Uint8Array): void {
    this.body = body;
  }

  end(): BinaryEncodedMessage {
    return this.body !== undefined ? { headers: this.headers, body: this.body } : { headers: this.headers };
  }
}

export function writeBinary(event: CloudEvent, options: BinaryWriteOptions = {}): BinaryEncodedMessage {
  return event.asBinaryMessage().visit({
    createVisitor: (specVersion) => new BinaryHeadersWriter(specVersion, options),
  });
}

export function isCloudEventsContentType(contentType: string): boolean {
  return normalizeMediaType(contentType).startsWith(CLOUDEVENTS_MEDIA_TYPE);
}

export function detectEncoding(input: MessageInput): Encoding {
  if (input.contentType !== undefined && isCloudEventsContentType(input.contentType)) {
    return Encoding.STRUCTURED;
  }

  const specversionHeader = ((input.prefix ?? "") + SPECVERSION_ATTRIBUTE).toLowerCase();
  const hasSpecVersion = Object.entries(input.headers).some(
    ([key, value]) => value !== undefined && key.toLowerCase() === specversionHeader
  );
  return hasSpecVersion ? Encoding.BINARY : Encoding.UNKNOWN;
}

/**
 * Wraps transport headers and body in the message matching their encoding. A
 * structured payload whose format is not registered reads as UNKNOWN.
 */
export function readMessage(input: MessageInput, registry: FormatRegistry = defaultFormatRegistry): Message {
  switch (detectEncoding(input)) {
    case Encoding.STRUCTURED: {
      const format = registry.resolve(input.contentType);
      if (format === undefined || input.body === undefined) {
        return new UnknownEncodingMessage();
      }
      return new GenericStructuredMessage(format, input.body);
    }
    case Encoding.BINARY:
      return new HeadersBinaryMessage(input);
    default:
      return new UnknownEncodingMessage();
  }
}

/**
 * Re-encodes a structured payload as binary headers plus the event data as
 * body. The payload must carry data.
 */
export function structuredToBinary(
  format: EventFormat,
  payload: Uint8Array,
  options: BinaryWriteOptions = {}
): BinaryEncodedMessage {
  let map: StructuredEventMap;
  try {
    map = format.deserialize(payload);
  } catch (error) {
    throw new MessageVisitError(`Failed to deserialize ${format.mediaType()} payload`, toError(error));
  }

  if (map[DATA_MEMBER] === undefined) {
    throw new MissingDataError();
  }

  return writeBinary(readStructuredEvent(map, defaultVisitorFactory()), options);
}
