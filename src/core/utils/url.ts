const REDIRECTABLE_PROTOCOLS = ["http:", "https:"];

/**
 * True for absolute http(s) URLs, the only destinations a click redirect may
 * point at.
 */
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return REDIRECTABLE_PROTOCOLS.includes(url.protocol);
  } catch {
    return false;
  }
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
