import { SpecVersion } from "../types";
import { AttributesVisitor } from "./visitors";

/**
 * Context attributes of a CloudEvent, bound to one spec version.
 *
 * Required accessors never return `undefined` on a constructed value; optional
 * ones return `undefined` when the attribute is absent.
 */
export interface Attributes {
  getSpecVersion(): SpecVersion;
  getId(): string;
  getType(): string;
  getSource(): string;
  getDataContentType(): string | undefined;
  /** `dataschema` in 1.0, `schemaurl` in 0.3. */
  getDataSchema(): string | undefined;
  getSubject(): string | undefined;
  getTime(): string | undefined;

  getAttribute(name: string): string | undefined;
  getAttributeNames(): string[];

  visitAttributes(visitor: AttributesVisitor): void;

  toV03(): Attributes;
  toV1(): Attributes;
  equals(other: Attributes): boolean;
}
