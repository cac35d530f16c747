import { DeserializationError, SerializationError, toError } from "../../errors";
import { EventFormat } from "../../interfaces/event-format";
import { SpecVersion, StructuredEventMap } from "../../types";
import { toBuffer } from "../../utils/bytes";
import { isJsonContentType, isTextContentType } from "../../utils/content-type";
import { CloudEvent } from "../event/cloud-event";

export const JSON_FORMAT_MEDIA_TYPE = "application/cloudevents+json";

const DATA = "data";
const DATA_BASE64 = "data_base64";
const DATA_CONTENT_ENCODING = "datacontentencoding";
const RESERVED_MEMBERS: readonly string[] = [DATA, DATA_BASE64, DATA_CONTENT_ENCODING];

/**
 * JSON event format. JSON data is embedded as a JSON value, text and XML data
 * as a string, anything else base64-encoded (`data_base64` in 1.0,
 * `datacontentencoding: "base64"` in 0.3).
 */
export class JsonFormat implements EventFormat {
  mediaType(): string {
    return JSON_FORMAT_MEDIA_TYPE;
  }

  serialize(event: CloudEvent): Uint8Array {
    const document: Record<string, unknown> = {};

    for (const name of event.getAttributeNames()) {
      document[name] = event.getAttribute(name);
    }

    for (const [name, value] of Object.entries(event.extensions)) {
      if (RESERVED_MEMBERS.includes(name)) {
        throw new SerializationError(`Extension name "${name}" collides with a reserved JSON member`);
      }
      document[name] = value;
    }

    const data = event.getData();
    if (data !== undefined) {
      Object.assign(document, this.encodeData(event, toBuffer(data)));
    }

    return Buffer.from(JSON.stringify(document), "utf8");
  }

  deserialize(payload: Uint8Array): StructuredEventMap {
    let document: unknown;
    try {
      document = JSON.parse(toBuffer(payload).toString("utf8"));
    } catch (error) {
      throw new DeserializationError("Structured payload is not valid JSON", toError(error));
    }

    if (typeof document !== "object" || document === null || Array.isArray(document)) {
      throw new DeserializationError("Structured payload must be a JSON object");
    }

    const members = Object.entries(document);
    const map: Record<string, unknown> = {};
    for (const [name, value] of members) {
      if (value === null || RESERVED_MEMBERS.includes(name)) continue;
      map[name] = value;
    }

    const data = this.decodeData(Object.fromEntries(members), map.datacontenttype);
    if (data !== undefined) {
      map[DATA] = data;
    }
    return map;
  }

  private encodeData(event: CloudEvent, data: Buffer): Record<string, unknown> {
    const contentType = event.getDataContentType();

    if (isJsonContentType(contentType)) {
      try {
        return { [DATA]: JSON.parse(data.toString("utf8")) };
      } catch (error) {
        throw new SerializationError(
          `Event ${event.getId()} declares JSON data that does not parse`,
          toError(error)
        );
      }
    }

    if (isTextContentType(contentType)) {
      return { [DATA]: data.toString("utf8") };
    }

    if (event.getSpecVersion() === SpecVersion.V03) {
      return { [DATA_CONTENT_ENCODING]: "base64", [DATA]: data.toString("base64") };
    }
    return { [DATA_BASE64]: data.toString("base64") };
  }

  private decodeData(document: Record<string, unknown>, contentType: unknown): Buffer | undefined {
    const base64 = document[DATA_BASE64];
    if (base64 !== undefined && base64 !== null) {
      if (typeof base64 !== "string") {
        throw new DeserializationError(`${DATA_BASE64} must be a string`);
      }
      return Buffer.from(base64, "base64");
    }

    const data = document[DATA];
    if (data === undefined || data === null) {
      return undefined;
    }

    if (document[DATA_CONTENT_ENCODING] === "base64") {
      if (typeof data !== "string") {
        throw new DeserializationError(`base64 encoded ${DATA} must be a string`);
      }
      return Buffer.from(data, "base64");
    }

    const declared = typeof contentType === "string" ? contentType : undefined;
    if (typeof data === "string" && !isJsonContentType(declared)) {
      return Buffer.from(data, "utf8");
    }
    return Buffer.from(JSON.stringify(data), "utf8");
  }
}
