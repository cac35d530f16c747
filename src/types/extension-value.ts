export type ExtensionValue = string | number | boolean;

export type Extensions = Readonly<Record<string, ExtensionValue>>;

export function isExtensionValue(value: unknown): value is ExtensionValue {
  return typeof value === "string" || (typeof value === "number" && Number.isFinite(value)) || typeof value === "boolean";
}
