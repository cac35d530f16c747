export enum Encoding {
  STRUCTURED = "structured",
  BINARY = "binary",
  UNKNOWN = "unknown",
}
