import { v4 as uuid } from 'uuid';
import { CloudEventBuilder } from '../implementations/builders/cloud-event-builder';
import { CloudEvent } from '../implementations/event/cloud-event';
import { ExtensionValue } from '../types';
import { isJsonContentType } from './content-type';

export interface EventFactoryOptions {
  id?: string;
  time?: string;
  datacontenttype?: string;
  dataschema?: string;
  subject?: string;
  extensions?: Record<string, ExtensionValue>;
}

export class EventFactory {
  /**
   * Creates a 1.0 event with a generated id and the current time unless given.
   * Objects are JSON-encoded; strings are JSON-encoded only for JSON content
   * types; byte arrays are taken as-is.
   */
  static create<T>(
    type: string,
    data: T,
    source: string,
    options?: EventFactoryOptions
  ): CloudEvent {
    const datacontenttype = options?.datacontenttype || "application/json";

    const builder = CloudEventBuilder.v1()
      .withId(options?.id || uuid())
      .withTime(options?.time || new Date().toISOString())
      .withSource(source)
      .withType(type)
      .withDataContentType(datacontenttype);

    if (data !== undefined) {
      builder.withData(encodeData(data, datacontenttype));
    }
    if (options?.dataschema) {
      builder.withDataSchema(options.dataschema);
    }
    if (options?.subject) {
      builder.withSubject(options.subject);
    }
    for (const [name, value] of Object.entries(options?.extensions ?? {})) {
      builder.withExtension(name, value);
    }

    return builder.build();
  }
}

function encodeData(data: unknown, contentType: string): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (typeof data === "string" && !isJsonContentType(contentType)) {
    return Buffer.from(data, "utf8");
  }
  return Buffer.from(JSON.stringify(data), "utf8");
}
