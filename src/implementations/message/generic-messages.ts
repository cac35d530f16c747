import { IllegalStateError } from "../../errors";
import { EventFormat } from "../../interfaces/event-format";
import { Message } from "../../interfaces/message";
import {
  AttributesVisitor,
  BinaryMessageVisitorFactory,
  ExtensionsVisitor,
  StructuredMessageVisitor,
} from "../../interfaces/visitors";
import { Encoding } from "../../types";
import { CloudEvent } from "../event/cloud-event";
import { messageToEvent } from "./to-event";

/**
 * Structured-mode payload received from a transport, paired with the format
 * resolved for its content type.
 */
export class GenericStructuredMessage implements Message {
  constructor(
    private readonly format: EventFormat,
    private readonly payload: Uint8Array
  ) {}

  getEncoding(): Encoding {
    return Encoding.STRUCTURED;
  }

  visit<R>(_factory: BinaryMessageVisitorFactory<R>): R {
    throw new IllegalStateError("Structured message cannot be visited as a binary message");
  }

  visitAttributes(_visitor: AttributesVisitor): void {
    throw new IllegalStateError("Structured message cannot be visited as a binary message");
  }

  visitExtensions(_visitor: ExtensionsVisitor): void {
    throw new IllegalStateError("Structured message cannot be visited as a binary message");
  }

  visitStructured<R>(visitor: StructuredMessageVisitor<R>): R {
    return visitor.setEvent(this.format, this.payload);
  }

  toEvent(): CloudEvent {
    return messageToEvent(this);
  }
}

export class UnknownEncodingMessage implements Message {
  getEncoding(): Encoding {
    return Encoding.UNKNOWN;
  }

  visit<R>(_factory: BinaryMessageVisitorFactory<R>): R {
    throw new IllegalStateError("Unknown encoding");
  }

  visitAttributes(_visitor: AttributesVisitor): void {
    throw new IllegalStateError("Unknown encoding");
  }

  visitExtensions(_visitor: ExtensionsVisitor): void {
    throw new IllegalStateError("Unknown encoding");
  }

  visitStructured<R>(_visitor: StructuredMessageVisitor<R>): R {
    throw new IllegalStateError("Unknown encoding");
  }

  toEvent(): CloudEvent {
    return messageToEvent(this);
  }
}
