import { Attributes } from "../../interfaces/attributes";
import { EventFormat } from "../../interfaces/event-format";
import { Message } from "../../interfaces/message";
import { ExtensionsVisitor } from "../../interfaces/visitors";
import { Extensions, ExtensionValue, SpecVersion } from "../../types";
import { bytesEqual, toBuffer } from "../../utils/bytes";
import { visitExtension } from "../extensions/visit-extension";
import { EventBinaryMessage, EventStructuredMessage } from "../message/event-messages";

/**
 * Immutable CloudEvent: versioned attributes, typed extensions and an opaque
 * payload. Build instances with `CloudEventBuilder`; callers must not mutate
 * the `data` array after construction.
 */
export class CloudEvent {
  readonly extensions: Extensions;

  constructor(
    readonly attributes: Attributes,
    readonly data?: Uint8Array,
    extensions: Record<string, ExtensionValue> = {}
  ) {
    this.extensions = Object.freeze({ ...extensions });
    Object.freeze(this);
  }

  getSpecVersion(): SpecVersion {
    return this.attributes.getSpecVersion();
  }

  getId(): string {
    return this.attributes.getId();
  }

  getType(): string {
    return this.attributes.getType();
  }

  getSource(): string {
    return this.attributes.getSource();
  }

  getDataContentType(): string | undefined {
    return this.attributes.getDataContentType();
  }

  getDataSchema(): string | undefined {
    return this.attributes.getDataSchema();
  }

  getSubject(): string | undefined {
    return this.attributes.getSubject();
  }

  getTime(): string | undefined {
    return this.attributes.getTime();
  }

  /**
   * Looks up a context attribute by its name in this event's spec version.
   * @throws UnsupportedAttributeError for names the version does not define.
   */
  getAttribute(name: string): string | undefined {
    return this.attributes.getAttribute(name);
  }

  getAttributeNames(): string[] {
    return this.attributes.getAttributeNames();
  }

  getExtension(name: string): ExtensionValue | undefined {
    return Object.hasOwn(this.extensions, name) ? this.extensions[name] : undefined;
  }

  getExtensionNames(): string[] {
    return Object.keys(this.extensions);
  }

  getData(): Uint8Array | undefined {
    return this.data;
  }

  visitExtensions(visitor: ExtensionsVisitor): void {
    for (const [name, value] of Object.entries(this.extensions)) {
      visitExtension(visitor, name, value);
    }
  }

  asBinaryMessage(): Message {
    return new EventBinaryMessage(this);
  }

  asStructuredMessage(format: EventFormat): Message {
    return new EventStructuredMessage(this, format);
  }

  toV03(): CloudEvent {
    const attributes = this.attributes.toV03();
    return attributes === this.attributes ? this : new CloudEvent(attributes, this.data, this.extensions);
  }

  toV1(): CloudEvent {
    const attributes = this.attributes.toV1();
    return attributes === this.attributes ? this : new CloudEvent(attributes, this.data, this.extensions);
  }

  equals(other: CloudEvent): boolean {
    if (other === this) return true;
    return (
      this.attributes.equals(other.attributes) &&
      bytesEqual(this.data, other.data) &&
      sameExtensions(this.extensions, other.extensions)
    );
  }

  toString(): string {
    const data = this.data !== undefined ? `, data=${toBuffer(this.data).toString("utf8")}` : "";
    return `CloudEvent{attributes=${this.attributes.toString()}${data}, extensions=${JSON.stringify(this.extensions)}}`;
  }
}

function sameExtensions(a: Extensions, b: Extensions): boolean {
  const names = Object.keys(a);
  if (names.length !== Object.keys(b).length) return false;
  return names.every((name) => Object.hasOwn(b, name) && a[name] === b[name]);
}
