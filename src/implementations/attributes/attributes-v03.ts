import { Attributes } from "../../interfaces/attributes";
import { AttributesVisitor } from "../../interfaces/visitors";
import { AttributesV03Init, SpecVersion } from "../../types";
import {
  optionalNonEmpty,
  requireNonEmpty,
  validateTimestamp,
  validateUriReference,
} from "../../utils/validators";
import { AttributesV1 } from "./attributes-v1";
import {
  describeAttributes,
  presentAttributeNames,
  sameAttributes,
  unsupported,
  visitPresentAttributes,
} from "./common";

export class AttributesV03 implements Attributes {
  readonly id: string;
  readonly source: string;
  readonly type: string;
  readonly datacontenttype?: string;
  readonly schemaurl?: string;
  readonly subject?: string;
  readonly time?: string;

  constructor(init: AttributesV03Init) {
    this.id = requireNonEmpty("id", init.id);
    this.source = validateUriReference("source", requireNonEmpty("source", init.source));
    this.type = requireNonEmpty("type", init.type);
    this.datacontenttype = optionalNonEmpty("datacontenttype", init.datacontenttype);
    this.schemaurl = validateUriReference("schemaurl", optionalNonEmpty("schemaurl", init.schemaurl));
    this.subject = optionalNonEmpty("subject", init.subject);
    this.time = validateTimestamp("time", optionalNonEmpty("time", init.time));
    Object.freeze(this);
  }

  getSpecVersion(): SpecVersion {
    return SpecVersion.V03;
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
    return this.schemaurl;
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
        return SpecVersion.V03;
      case "id":
        return this.id;
      case "source":
        return this.source;
      case "type":
        return this.type;
      case "datacontenttype":
        return this.datacontenttype;
      case "schemaurl":
        return this.schemaurl;
      case "subject":
        return this.subject;
      case "time":
        return this.time;
      default:
        return unsupported(name, SpecVersion.V03);
    }
  }

  getAttributeNames(): string[] {
    return presentAttributeNames(SpecVersion.V03, (name) => this.getAttribute(name));
  }

  visitAttributes(visitor: AttributesVisitor): void {
    visitPresentAttributes(SpecVersion.V03, (name) => this.getAttribute(name), visitor);
  }

  toV03(): AttributesV03 {
    return this;
  }

  toV1(): AttributesV1 {
    return new AttributesV1({
      id: this.id,
      source: this.source,
      type: this.type,
      datacontenttype: this.datacontenttype,
      dataschema: this.schemaurl,
      subject: this.subject,
      time: this.time,
    });
  }

  equals(other: Attributes): boolean {
    if (other === this) return true;
    return (
      other.getSpecVersion() === SpecVersion.V03 &&
      sameAttributes(SpecVersion.V03, (name) => this.getAttribute(name), (name) => other.getAttribute(name))
    );
  }

  toString(): string {
    return describeAttributes(SpecVersion.V03, (name) => this.getAttribute(name));
  }
}
