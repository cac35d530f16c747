import { CloudEvent } from "../implementations/event/cloud-event";
import { StructuredEventMap } from "../types";

/**
 * Structured-mode codec for one media type, e.g. `application/cloudevents+json`.
 */
export interface EventFormat {
  mediaType(): string;
  /** @throws SerializationError when the event data cannot be represented. */
  serialize(event: CloudEvent): Uint8Array;
  /** @throws DeserializationError on malformed input. */
  deserialize(payload: Uint8Array): StructuredEventMap;
}
