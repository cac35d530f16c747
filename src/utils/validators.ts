import { InvalidAttributeError } from "../errors";
import { isAttributeName, SpecVersion } from "../types";

const RFC3339 = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;
const URI_REFERENCE = /^\S+$/;

export const EXTENSION_NAME = /^[a-z0-9]+$/;

// Members the JSON event format uses to carry data.
const RESERVED_EXTENSION_NAMES: readonly string[] = ["data", "data_base64", "datacontentencoding"];

export function requireNonEmpty(name: string, value: string | undefined): string {
  if (value === undefined || value.length === 0) {
    throw new InvalidAttributeError(name, "required attribute must be a non-empty string");
  }
  return value;
}

export function optionalNonEmpty<T extends string | undefined>(name: string, value: T): T {
  if (value !== undefined && value.length === 0) {
    throw new InvalidAttributeError(name, "optional attribute must be omitted instead of empty");
  }
  return value;
}

export function validateUriReference<T extends string | undefined>(name: string, value: T): T {
  if (value !== undefined && !URI_REFERENCE.test(value)) {
    throw new InvalidAttributeError(name, `"${value}" is not a URI reference`);
  }
  return value;
}

export function validateTimestamp<T extends string | undefined>(name: string, value: T): T {
  if (value !== undefined && (!RFC3339.test(value) || Number.isNaN(Date.parse(value)))) {
    throw new InvalidAttributeError(name, `"${value}" is not an RFC 3339 timestamp`);
  }
  return value;
}

export function validateExtensionName(version: SpecVersion, name: string): string {
  if (!EXTENSION_NAME.test(name)) {
    throw new InvalidAttributeError(name, "extension names must be lower-case letters and digits");
  }
  if (isAttributeName(version, name)) {
    throw new InvalidAttributeError(name, `extension name is a context attribute of spec version ${version}`);
  }
  if (RESERVED_EXTENSION_NAMES.includes(name)) {
    throw new InvalidAttributeError(name, "extension name is reserved for event data");
  }
  return name;
}
