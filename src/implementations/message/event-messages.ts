import { IllegalStateError, MessageVisitError, toError } from "../../errors";
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

export class EventBinaryMessage implements Message {
  constructor(private readonly event: CloudEvent) {}

  getEncoding(): Encoding {
    return Encoding.BINARY;
  }

  visit<R>(factory: BinaryMessageVisitorFactory<R>): R {
    const visitor = factory.createVisitor(this.event.getSpecVersion());
    this.visitAttributes(visitor);
    this.visitExtensions(visitor);

    const data = this.event.getData();
    if (data !== undefined) {
      visitor.setBody(data);
    }

    return visitor.end();
  }

  visitAttributes(visitor: AttributesVisitor): void {
    this.event.attributes.visitAttributes(visitor);
  }

  visitExtensions(visitor: ExtensionsVisitor): void {
    this.event.visitExtensions(visitor);
  }

  visitStructured<R>(_visitor: StructuredMessageVisitor<R>): R {
    throw new IllegalStateError("Binary message cannot be visited as a structured message");
  }

  toEvent(): CloudEvent {
    return messageToEvent(this);
  }
}

export class EventStructuredMessage implements Message {
  constructor(
    private readonly event: CloudEvent,
    private readonly format: EventFormat
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
    let payload: Uint8Array;
    try {
      payload = this.format.serialize(this.event);
    } catch (error) {
      throw new MessageVisitError(
        `Failed to serialize event ${this.event.getId()} as ${this.format.mediaType()}`,
        toError(error)
      );
    }
    return visitor.setEvent(this.format, payload);
  }

  toEvent(): CloudEvent {
    return messageToEvent(this);
  }
}
