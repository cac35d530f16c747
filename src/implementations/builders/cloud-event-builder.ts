import {
  IllegalStateError,
  UnrecognizedSpecVersionError,
  UnsupportedAttributeError,
  UnsupportedExtensionTypeError,
} from "../../errors";
import { Attributes } from "../../interfaces/attributes";
import { Extension } from "../../interfaces/extension";
import { BinaryMessageVisitor, BinaryMessageVisitorFactory } from "../../interfaces/visitors";
import { ExtensionValue, isExtensionValue, SpecVersion } from "../../types";
import { requireNonEmpty, validateExtensionName } from "../../utils/validators";
import { AttributesV03 } from "../attributes/attributes-v03";
import { AttributesV1 } from "../attributes/attributes-v1";
import { CloudEvent } from "../event/cloud-event";

// Builders live in one module: the version classes extend the base, and the
// event/message modules reach back here for the default visitor factory.

/**
 * Mutable accumulator for one event. Usable once: after `build()`/`end()`
 * every further call throws `IllegalStateError`.
 */
export abstract class BaseCloudEventBuilder implements BinaryMessageVisitor<CloudEvent> {
  protected id?: string;
  protected source?: string;
  protected type?: string;
  protected datacontenttype?: string;
  protected dataschema?: string;
  protected subject?: string;
  protected time?: string;

  private data?: Uint8Array;
  private readonly extensions: Record<string, ExtensionValue> = {};
  private ended = false;

  abstract getSpecVersion(): SpecVersion;

  /** Wire name of the schema attribute in this version. */
  protected abstract readonly schemaAttribute: string;

  protected abstract buildAttributes(): Attributes;

  withId(id: string): this {
    this.assertActive();
    this.id = id;
    return this;
  }

  withSource(source: string): this {
    this.assertActive();
    this.source = source;
    return this;
  }

  withType(type: string): this {
    this.assertActive();
    this.type = type;
    return this;
  }

  withDataContentType(contentType: string): this {
    this.assertActive();
    this.datacontenttype = contentType;
    return this;
  }

  withDataSchema(dataSchema: string): this {
    this.assertActive();
    this.dataschema = dataSchema;
    return this;
  }

  withSubject(subject: string): this {
    this.assertActive();
    this.subject = subject;
    return this;
  }

  withTime(time: string | Date): this {
    this.assertActive();
    this.time = typeof time === "string" ? time : time.toISOString();
    return this;
  }

  withData(data: Uint8Array, contentType?: string, dataSchema?: string): this {
    this.assertActive();
    this.data = data;
    if (contentType !== undefined) this.datacontenttype = contentType;
    if (dataSchema !== undefined) this.dataschema = dataSchema;
    return this;
  }

  withExtension(name: string, value: ExtensionValue): this {
    this.assertActive();
    if (!isExtensionValue(value)) {
      throw new UnsupportedExtensionTypeError(name, value);
    }
    this.extensions[validateExtensionName(this.getSpecVersion(), name)] = value;
    return this;
  }

  withExtensions(extension: Extension): this {
    for (const [name, value] of Object.entries(extension.asMap())) {
      this.withExtension(name, value);
    }
    return this;
  }

  setAttribute(name: string, value: string): void {
    this.assertActive();
    switch (name) {
      case "specversion":
        if (value !== this.getSpecVersion()) {
          throw new IllegalStateError(
            `Builder for spec version ${this.getSpecVersion()} cannot accept specversion ${value}`
          );
        }
        return;
      case "id":
        this.id = value;
        return;
      case "source":
        this.source = value;
        return;
      case "type":
        this.type = value;
        return;
      case "datacontenttype":
        this.datacontenttype = value;
        return;
      case "subject":
        this.subject = value;
        return;
      case "time":
        this.time = value;
        return;
      case this.schemaAttribute:
        this.dataschema = value;
        return;
      default:
        throw new UnsupportedAttributeError(name, this.getSpecVersion());
    }
  }

  setStringExtension(name: string, value: string): void {
    this.withExtension(name, value);
  }

  setNumberExtension(name: string, value: number): void {
    this.withExtension(name, value);
  }

  setBooleanExtension(name: string, value: boolean): void {
    this.withExtension(name, value);
  }

  setBody(body: Uint8Array): void {
    this.assertActive();
    this.data = body;
  }

  build(): CloudEvent {
    this.assertActive();
    const event = new CloudEvent(this.buildAttributes(), this.data, this.extensions);
    this.ended = true;
    return event;
  }

  end(): CloudEvent {
    return this.build();
  }

  protected requiredAttributes(): { id: string; source: string; type: string } {
    return {
      id: requireNonEmpty("id", this.id),
      source: requireNonEmpty("source", this.source),
      type: requireNonEmpty("type", this.type),
    };
  }

  private assertActive(): void {
    if (this.ended) {
      throw new IllegalStateError("Builder already ended; create a new builder for each event");
    }
  }
}

export class CloudEventBuilderV1 extends BaseCloudEventBuilder {
  protected readonly schemaAttribute = "dataschema";

  getSpecVersion(): SpecVersion {
    return SpecVersion.V1;
  }

  protected buildAttributes(): AttributesV1 {
    return new AttributesV1({
      ...this.requiredAttributes(),
      datacontenttype: this.datacontenttype,
      dataschema: this.dataschema,
      subject: this.subject,
      time: this.time,
    });
  }
}

export class CloudEventBuilderV03 extends BaseCloudEventBuilder {
  protected readonly schemaAttribute = "schemaurl";

  getSpecVersion(): SpecVersion {
    return SpecVersion.V03;
  }

  withSchemaUrl(schemaUrl: string): this {
    return this.withDataSchema(schemaUrl);
  }

  protected buildAttributes(): AttributesV03 {
    return new AttributesV03({
      ...this.requiredAttributes(),
      datacontenttype: this.datacontenttype,
      schemaurl: this.dataschema,
      subject: this.subject,
      time: this.time,
    });
  }
}

const BUILDERS: Record<SpecVersion, () => BaseCloudEventBuilder> = {
  [SpecVersion.V03]: () => new CloudEventBuilderV03(),
  [SpecVersion.V1]: () => new CloudEventBuilderV1(),
};

export class CloudEventBuilder {
  static v1(): CloudEventBuilderV1 {
    return new CloudEventBuilderV1();
  }

  static v03(): CloudEventBuilderV03 {
    return new CloudEventBuilderV03();
  }

  static forVersion(version: SpecVersion): BaseCloudEventBuilder {
    if (!Object.hasOwn(BUILDERS, version)) {
      throw new UnrecognizedSpecVersionError(String(version));
    }
    return BUILDERS[version]();
  }

  /**
   * Builder of the event's own version, pre-filled with its attributes, data
   * and extensions.
   */
  static fromEvent(event: CloudEvent): BaseCloudEventBuilder {
    const builder = CloudEventBuilder.forVersion(event.getSpecVersion());
    event.attributes.visitAttributes(builder);
    event.visitExtensions(builder);
    const data = event.getData();
    if (data !== undefined) {
      builder.setBody(data);
    }
    return builder;
  }
}

export function defaultVisitorFactory(): BinaryMessageVisitorFactory<CloudEvent> {
  return {
    createVisitor: (specVersion) => CloudEventBuilder.forVersion(specVersion),
  };
}
