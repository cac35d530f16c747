import { IllegalStateError, MessageVisitError, toError } from "../../errors";
import { EventFormat } from "../../interfaces/event-format";
import { Message } from "../../interfaces/message";
import { BinaryMessageVisitorFactory } from "../../interfaces/visitors";
import { Encoding, StructuredEventMap } from "../../types";
import { defaultVisitorFactory } from "../builders/cloud-event-builder";
import { CloudEvent } from "../event/cloud-event";
import { readStructuredEvent } from "./structured-reader";

export function messageToEvent(message: Message): CloudEvent {
  switch (message.getEncoding()) {
    case Encoding.BINARY:
      return message.visit(defaultVisitorFactory());
    case Encoding.STRUCTURED:
      return message.visitStructured({
        setEvent: (format, payload) => eventFromStructured(format, payload),
      });
    default:
      throw new IllegalStateError("Unknown encoding");
  }
}

export function eventFromStructured(
  format: EventFormat,
  payload: Uint8Array,
  factory: BinaryMessageVisitorFactory<CloudEvent> = defaultVisitorFactory()
): CloudEvent {
  let map: StructuredEventMap;
  try {
    map = format.deserialize(payload);
  } catch (error) {
    throw new MessageVisitError(`Failed to deserialize ${format.mediaType()} payload`, toError(error));
  }
  return readStructuredEvent(map, factory);
}
