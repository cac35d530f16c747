import { EventFormat } from "../../interfaces/event-format";
import { normalizeMediaType } from "../../utils/content-type";
import { JsonFormat } from "./json-format";

export class FormatRegistry {
  private readonly formats = new Map<string, EventFormat>();

  constructor(formats: EventFormat[] = []) {
    formats.forEach((format) => this.register(format));
  }

  /** Registers a format, replacing any previous one for the same media type. */
  register(format: EventFormat): this {
    this.formats.set(normalizeMediaType(format.mediaType()), format);
    return this;
  }

  resolve(contentType: string | undefined): EventFormat | undefined {
    if (contentType === undefined) return undefined;
    return this.formats.get(normalizeMediaType(contentType));
  }

  mediaTypes(): string[] {
    return Array.from(this.formats.keys());
  }
}

export const defaultFormatRegistry = new FormatRegistry([new JsonFormat()]);
