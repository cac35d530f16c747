import { UnsupportedExtensionTypeError } from "../../errors";
import { ExtensionsVisitor } from "../../interfaces/visitors";

/**
 * Dispatch one extension to the setter matching its runtime type.
 */
export function visitExtension(visitor: ExtensionsVisitor, name: string, value: unknown): void {
  switch (typeof value) {
    case "string":
      visitor.setStringExtension(name, value);
      return;
    case "number":
      if (!Number.isFinite(value)) {
        throw new UnsupportedExtensionTypeError(name, value);
      }
      visitor.setNumberExtension(name, value);
      return;
    case "boolean":
      visitor.setBooleanExtension(name, value);
      return;
    default:
      throw new UnsupportedExtensionTypeError(name, value);
  }
}
