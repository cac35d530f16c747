import { CloudEvent } from "../implementations/event/cloud-event";
import { Encoding } from "../types";
import {
  AttributesVisitor,
  BinaryMessageVisitorFactory,
  ExtensionsVisitor,
  StructuredMessageVisitor,
} from "./visitors";

/**
 * A view over an encoded event. The encoding is fixed for the lifetime of the
 * message; operations that do not apply to it throw `IllegalStateError`.
 */
export interface Message {
  getEncoding(): Encoding;
  visit<R>(factory: BinaryMessageVisitorFactory<R>): R;
  visitAttributes(visitor: AttributesVisitor): void;
  visitExtensions(visitor: ExtensionsVisitor): void;
  visitStructured<R>(visitor: StructuredMessageVisitor<R>): R;
  toEvent(): CloudEvent;
}
