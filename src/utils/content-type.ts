export function normalizeMediaType(contentType: string): string {
  return contentType.split(";")[0].trim().toLowerCase();
}

// An absent content type is treated as JSON, as the JSON event format does.
export function isJsonContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) return true;
  const mediaType = normalizeMediaType(contentType);
  return mediaType === "application/json" || mediaType === "text/json" || mediaType.endsWith("+json");
}

export function isTextContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) return false;
  const mediaType = normalizeMediaType(contentType);
  return mediaType.startsWith("text/") || mediaType === "application/xml" || mediaType.endsWith("+xml");
}
