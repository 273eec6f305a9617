// src/core/render/utils.ts

export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function isDataUrl(value: string): boolean {
  return value.startsWith('data:');
}

/** Short, log-friendly form of a source reference (data URLs run to megabytes). */
export function describeRef(sourceRef: string): string {
  if (isDataUrl(sourceRef)) {
    const comma = sourceRef.indexOf(',');
    const header = comma === -1 ? sourceRef.slice(0, 32) : sourceRef.slice(0, comma);
    return `${header},… (${sourceRef.length} chars)`;
  }
  return sourceRef.length > 120 ? `${sourceRef.slice(0, 117)}...` : sourceRef;
}
