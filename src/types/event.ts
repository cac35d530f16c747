// Plain inputs accepted by the attribute records. Optional members are left
// out rather than set to "".

interface CommonAttributes {
  id: string;
  source: string;
  type: string;
  datacontenttype?: string;
  subject?: string;
  time?: string;
}

export interface AttributesV1Init extends CommonAttributes {
  dataschema?: string;
}

export interface AttributesV03Init extends CommonAttributes {
  schemaurl?: string;
}

/**
 * Result of deserializing a structured-mode payload: attribute and extension
 * names unprefixed, the payload under `data` as raw bytes when present.
 */
export type StructuredEventMap = Readonly<Record<string, unknown>>;
