import { ExtensionValue } from "../types";

export interface Extension {
  asMap(): Record<string, ExtensionValue>;
}
