import { SpecVersion } from "../types";
import { EventFormat } from "./event-format";

export interface AttributesVisitor {
  setAttribute(name: string, value: string): void;
}

export interface ExtensionsVisitor {
  setStringExtension(name: string, value: string): void;
  setNumberExtension(name: string, value: number): void;
  setBooleanExtension(name: string, value: boolean): void;
}

/**
 * Receives the content of a binary-mode message: attributes, extensions, then
 * the body (only when there is one). `end()` is called once, last.
 */
export interface BinaryMessageVisitor<R> extends AttributesVisitor, ExtensionsVisitor {
  setBody(body: Uint8Array): void;
  end(): R;
}

export interface BinaryMessageVisitorFactory<R> {
  createVisitor(specVersion: SpecVersion): BinaryMessageVisitor<R>;
}

export interface StructuredMessageVisitor<R> {
  setEvent(format: EventFormat, payload: Uint8Array): R;
}
