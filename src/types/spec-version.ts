import { UnrecognizedSpecVersionError } from "../errors";

export enum SpecVersion {
  V03 = "0.3",
  V1 = "1.0",
}

export const SPECVERSION_ATTRIBUTE = "specversion";

const REQUIRED_ATTRIBUTES: readonly string[] = ["specversion", "id", "source", "type"];

// Names as they appear on the wire for each version, specversion first.
const ATTRIBUTE_NAMES: Record<SpecVersion, readonly string[]> = {
  [SpecVersion.V03]: [...REQUIRED_ATTRIBUTES, "datacontenttype", "schemaurl", "subject", "time"],
  [SpecVersion.V1]: [...REQUIRED_ATTRIBUTES, "datacontenttype", "dataschema", "subject", "time"],
};

const KNOWN_VERSIONS: readonly string[] = Object.values(SpecVersion);

export function isSpecVersion(value: string): value is SpecVersion {
  return KNOWN_VERSIONS.includes(value);
}

export function parseSpecVersion(value: string): SpecVersion {
  if (!isSpecVersion(value)) {
    throw new UnrecognizedSpecVersionError(value);
  }
  return value;
}

export function getAttributeNames(version: SpecVersion): readonly string[] {
  return ATTRIBUTE_NAMES[version];
}

export function isAttributeName(version: SpecVersion, name: string): boolean {
  return ATTRIBUTE_NAMES[version].includes(name);
}
