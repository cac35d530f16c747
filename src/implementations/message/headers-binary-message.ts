import { IllegalStateError, InvalidAttributeError } from "../../errors";
import { Message } from "../../interfaces/message";
import {
  AttributesVisitor,
  BinaryMessageVisitorFactory,
  ExtensionsVisitor,
  StructuredMessageVisitor,
} from "../../interfaces/visitors";
import { Encoding, isAttributeName, parseSpecVersion, SPECVERSION_ATTRIBUTE, SpecVersion } from "../../types";
import { EXTENSION_NAME } from "../../utils/validators";
import { visitExtension } from "../extensions/visit-extension";
import { CloudEvent } from "../event/cloud-event";
import { messageToEvent } from "./to-event";

export type HeaderMap = Readonly<Record<string, unknown>>;

export interface HeadersBinaryMessageInit {
  headers: HeaderMap;
  body?: Uint8Array;
  /** Prefix carried by every event header, e.g. `ce-`; matched case-insensitively. */
  prefix?: string;
  /** Transport content type, used as `datacontenttype` when no header carries it. */
  contentType?: string;
}

/**
 * Binary-mode message read from transport headers. The spec version is
 * resolved from the `specversion` header when the message is first visited.
 */
export class HeadersBinaryMessage implements Message {
  private readonly headers: HeaderMap;
  private readonly body?: Uint8Array;
  private readonly prefix: string;
  private readonly contentType?: string;

  constructor(init: HeadersBinaryMessageInit) {
    this.headers = init.headers;
    this.body = init.body;
    this.prefix = (init.prefix ?? "").toLowerCase();
    this.contentType = init.contentType;
  }

  getEncoding(): Encoding {
    return Encoding.BINARY;
  }

  visit<R>(factory: BinaryMessageVisitorFactory<R>): R {
    const visitor = factory.createVisitor(this.specVersion());
    this.visitAttributes(visitor);
    this.visitExtensions(visitor);

    if (this.body !== undefined) {
      visitor.setBody(this.body);
    }

    return visitor.end();
  }

  visitAttributes(visitor: AttributesVisitor): void {
    const version = this.specVersion();
    let sawContentType = false;

    for (const [name, value] of this.eventHeaders()) {
      if (name === SPECVERSION_ATTRIBUTE || !isAttributeName(version, name)) continue;
      if (typeof value !== "string") {
        throw new InvalidAttributeError(name, `header value must be a string, got ${typeof value}`);
      }
      visitor.setAttribute(name, value);
      if (name === "datacontenttype") sawContentType = true;
    }

    if (!sawContentType && this.contentType !== undefined) {
      visitor.setAttribute("datacontenttype", this.contentType);
    }
  }

  visitExtensions(visitor: ExtensionsVisitor): void {
    const version = this.specVersion();

    // Other headers on the same transport (content-type, x-...) are not part of the event.
    for (const [name, value] of this.eventHeaders()) {
      if (isAttributeName(version, name) || !EXTENSION_NAME.test(name)) continue;
      visitExtension(visitor, name, Buffer.isBuffer(value) ? value.toString("utf8") : value);
    }
  }

  visitStructured<R>(_visitor: StructuredMessageVisitor<R>): R {
    throw new IllegalStateError("Binary message cannot be visited as a structured message");
  }

  toEvent(): CloudEvent {
    return messageToEvent(this);
  }

  private specVersion(): SpecVersion {
    for (const [name, value] of this.eventHeaders()) {
      if (name !== SPECVERSION_ATTRIBUTE) continue;
      if (typeof value !== "string") {
        throw new InvalidAttributeError(name, `header value must be a string, got ${typeof value}`);
      }
      return parseSpecVersion(value);
    }
    throw new IllegalStateError(`Binary message has no ${this.prefix}${SPECVERSION_ATTRIBUTE} header`);
  }

  private eventHeaders(): Array<[string, unknown]> {
    return Object.entries(this.headers)
      .filter(([key, value]) => value !== undefined && key.toLowerCase().startsWith(this.prefix))
      .map(([key, value]): [string, unknown] => [key.slice(this.prefix.length).toLowerCase(), value]);
  }
}
