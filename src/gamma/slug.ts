const HOST = "polymarket.com";

/** Accepts an event slug or a polymarket.com link and returns the slug. */
export function extractSlugFromUrl(urlOrSlug: string): string {
  if (!urlOrSlug.includes(HOST)) return urlOrSlug;
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(urlOrSlug) ? urlOrSlug : `https://${urlOrSlug}`;
  let pathname: string;
  try {
    pathname = new URL(withScheme).pathname;
  } catch {
    return urlOrSlug;
  }
  const path = pathname.replace(/^\/+|\/+$/g, "");
  return path.startsWith("event/") ? path.slice("event/".length) : path;
}
