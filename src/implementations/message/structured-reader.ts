import { DeserializationError, InvalidAttributeError } from "../../errors";
import { BinaryMessageVisitorFactory } from "../../interfaces/visitors";
import { isAttributeName, parseSpecVersion, SPECVERSION_ATTRIBUTE, StructuredEventMap } from "../../types";
import { visitExtension } from "../extensions/visit-extension";

export const DATA_MEMBER = "data";

/**
 * Replays a deserialized structured event into the visitor created for its
 * `specversion`: attributes and extensions in map order, the body last.
 */
export function readStructuredEvent<R>(map: StructuredEventMap, factory: BinaryMessageVisitorFactory<R>): R {
  const specversion = map[SPECVERSION_ATTRIBUTE];
  if (typeof specversion !== "string") {
    throw new DeserializationError("Structured event has no specversion");
  }

  const version = parseSpecVersion(specversion);
  const visitor = factory.createVisitor(version);
  let body: Uint8Array | undefined;

  for (const [name, value] of Object.entries(map)) {
    if (name === SPECVERSION_ATTRIBUTE || value === undefined) continue;

    if (name === DATA_MEMBER) {
      if (!(value instanceof Uint8Array)) {
        throw new DeserializationError("Structured event data must be decoded to bytes");
      }
      body = value;
    } else if (isAttributeName(version, name)) {
      if (typeof value !== "string") {
        throw new InvalidAttributeError(name, `expected a string, got ${typeof value}`);
      }
      visitor.setAttribute(name, value);
    } else {
      visitExtension(visitor, name, value);
    }
  }

  if (body !== undefined) {
    visitor.setBody(body);
  }
  return visitor.end();
}
