/**
 * Locate a direct PDF link inside a publisher landing page.
 *
 * Patterns are tried in priority order and the first match wins; later
 * patterns are looser fallbacks, not alternatives of equal weight.
 */

const PDF_LINK_PATTERNS: readonly RegExp[] = [
  // <meta name="citation_pdf_url" content="..."> (Highwire / Google Scholar)
  /<meta[^>]+name=["']citation_pdf_url["'][^>]+content=["']([^"']+)["']/i,
  /<meta[^>]+content=["']([^"']+)["'][^>]+name=["']citation_pdf_url["']/i,
  /data-pdf-url=["']([^"']+)["']/i,
  // href ending in .pdf, optionally with a query or fragment
  /href=["']([^"']+\.pdf(?:[?#][^"']*)?)["']/i,
  // <a href="..." type="application/pdf">, attributes in either order
  /href=["']([^"']+)["'][^>]+type=["']application\/pdf["']/i,
  /type=["']application\/pdf["'][^>]+href=["']([^"']+)["']/i,
];

/** Resolve a possibly relative link; returns it unchanged when that fails. */
function resolveAgainst(link: string, baseUrl: string): string {
  if (link.startsWith("http") || !baseUrl) return link;
  try {
    return new URL(link, baseUrl).toString();
  } catch {
    return link;
  }
}

/**
 * Find the best candidate PDF URL in an HTML page.
 *
 * @param html - Page source
 * @param baseUrl - URL the page was fetched from, for resolving relative links
 * @returns Absolute PDF URL, or "" when the page advertises none
 */
export function findPdfUrlInHtml(html: string, baseUrl: string): string {
  for (const pattern of PDF_LINK_PATTERNS) {
    const link = pattern.exec(html)?.[1];
    if (link) return resolveAgainst(link, baseUrl);
  }
  return "";
}
