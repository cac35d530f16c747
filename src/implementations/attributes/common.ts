import { UnsupportedAttributeError } from "../../errors";
import { AttributesVisitor } from "../../interfaces/visitors";
import { getAttributeNames, SPECVERSION_ATTRIBUTE, SpecVersion } from "../../types";

type AttributeLookup = (name: string) => string | undefined;

export function presentAttributeNames(version: SpecVersion, lookup: AttributeLookup): string[] {
  return getAttributeNames(version).filter((name) => lookup(name) !== undefined);
}

export function visitPresentAttributes(
  version: SpecVersion,
  lookup: AttributeLookup,
  visitor: AttributesVisitor
): void {
  for (const name of getAttributeNames(version)) {
    if (name === SPECVERSION_ATTRIBUTE) continue;
    const value = lookup(name);
    if (value !== undefined) {
      visitor.setAttribute(name, value);
    }
  }
}

export function sameAttributes(version: SpecVersion, a: AttributeLookup, b: AttributeLookup): boolean {
  return getAttributeNames(version).every((name) => a(name) === b(name));
}

export function describeAttributes(version: SpecVersion, lookup: AttributeLookup): string {
  const fields = presentAttributeNames(version, lookup).map((name) => `${name}=${lookup(name)}`);
  return `Attributes{${fields.join(", ")}}`;
}

export function unsupported(name: string, version: SpecVersion): never {
  throw new UnsupportedAttributeError(name, version);
}
