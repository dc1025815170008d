/**
 * PDF classification.
 */

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46]; // "%PDF"

/** True when the body starts with the "%PDF" magic bytes. */
export function hasPdfMagic(body: Uint8Array): boolean {
  if (body.length < PDF_MAGIC.length) return false;
  return PDF_MAGIC.every((byte, i) => body[i] === byte);
}

/**
 * Decide whether a fetched document is a PDF.
 * Any one of content type, URL suffix, or magic bytes is sufficient.
 */
export function detectPdf(body: Uint8Array, contentType: string, url: string): boolean {
  return (
    contentType.includes("application/pdf") ||
    url.toLowerCase().endsWith(".pdf") ||
    hasPdfMagic(body)
  );
}
