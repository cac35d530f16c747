import { Attributes } from "../../interfaces/attributes";
import { AttributesVisitor } from "../../interfaces/visitors";
import { AttributesV1Init, SpecVersion } from "../../types";
import {
  optionalNonEmpty,
  requireNonEmpty,
  validateTimestamp,
  validateUriReference,
} from "../../utils/validators";
import { AttributesV03 } from "./attributes-v03";
import {
  describeAttributes,
  presentAttributeNames,
  sameAttributes,
  unsupported,
  visitPresentAttributes,
} from "./common";

export class AttributesV1 implements Attributes {
  readonly id: string;
  readonly source: string;
  readonly type: string;
  readonly datacontenttype?: string;
  readonly dataschema?: string;
  readonly subject?: string;
  readonly time?: string;

  constructor(init: AttributesV1Init) {
    this.id = requireNonEmpty("id", init.id);
    this.source = validateUriReference("source", requireNonEmpty("source", init.source));
    this.type = requireNonEmpty("type", init.type);
    this.datacontenttype = optionalNonEmpty("datacontenttype", init.datacontenttype);
    this.dataschema = validateUriReference("dataschema", optionalNonEmpty("dataschema", init.dataschema));
    this.subject = optionalNonEmpty("subject", init.subject);
    this.time = validateTimestamp("time", optionalNonEmpty("time", init.time));
    Object.freeze(this);
  }

  getSpecVersion(): SpecVersion {
    return SpecVersion.V1;
  }

  getId(): string {
    return this.id;
  }

  getType(): string {
    return this.type;
  }

  getSource(): string {
    return this.source;
  }

  getDataContentType(): string | undefined {
    return this.datacontenttype;
  }

  getDataSchema(): string | undefined {
    return this.dataschema;
  }

  getSubject(): string | undefined {
    return this.subject;
  }

  getTime(): string | undefined {
    return this.time;
  }

  getAttribute(name: string): string | undefined {
    switch (name) {
      case "specversion":
        return SpecVersion.V1;
      case "id":
        return this.id;
      case "source":
        return this.source;
      case "type":
        return this.type;
      case "datacontenttype":
        return this.datacontenttype;
      case "dataschema":
        return this.dataschema;
      case "subject":
        return this.subject;
      case "time":
        return this.time;
      default:
        return unsupported(name, SpecVersion.V1);
    }
  }

  getAttributeNames(): string[] {
    return presentAttributeNames(SpecVersion.V1, (name) => this.getAttribute(name));
  }

  visitAttributes(visitor: AttributesVisitor): void {
    visitPresentAttributes(SpecVersion.V1, (name) => this.getAttribute(name), visitor);
  }

  toV03(): AttributesV03 {
    return new AttributesV03({
      id: this.id,
      source: this.source,
      type: this.type,
      datacontenttype: this.datacontenttype,
      schemaurl: this.dataschema,
      subject: this.subject,
      time: this.time,
    });
  }

  toV1(): AttributesV1 {
    return this;
  }

  equals(other: Attributes): boolean {
    if (other === this) return true;
    return (
      other.getSpecVersion() === SpecVersion.V1 &&
      sameAttributes(SpecVersion.V1, (name) => this.getAttribute(name), (name) => other.getAttribute(name))
    );
  }

  toString(): string {
    return describeAttributes(SpecVersion.V1, (name) => this.getAttribute(name));
  }
}
