/**
 * Tests for landing-page PDF link discovery.
 */

import { describe, expect, it } from "vitest";
import { findPdfUrlInHtml } from "./pdf-link.js";

const BASE = "https://journal.example.org/article/42";

describe("findPdfUrlInHtml", () => {
  it("prefers the citation_pdf_url meta tag", () => {
    const html = `
      <head><meta name="citation_pdf_url" content="https://journal.example.org/pdf/42.pdf"></head>
      <body><a href="/other.pdf">other</a></body>`;
    expect(findPdfUrlInHtml(html, BASE)).toBe("https://journal.example.org/pdf/42.pdf");
  });

  it("reads the meta tag with content before name", () => {
    const html = `<meta content="https://cdn.example.org/42.pdf" name="citation_pdf_url">`;
    expect(findPdfUrlInHtml(html, BASE)).toBe("https://cdn.example.org/42.pdf");
  });

  it("uses data-pdf-url before plain links", () => {
    const html = `<a href="/supp.pdf">supp</a><div data-pdf-url="/download/42"></div>`;
    expect(findPdfUrlInHtml(html, BASE)).toBe("https://journal.example.org/download/42");
  });

  it("resolves a relative .pdf href with a query string", () => {
    const html = `<a class="btn" href="../files/42.pdf?download=1">PDF</a>`;
    expect(findPdfUrlInHtml(html, BASE)).toBe("https://journal.example.org/files/42.pdf?download=1");
  });

  it("finds links typed application/pdf in either attribute order", () => {
    expect(findPdfUrlInHtml(`<a href="/get/42" type="application/pdf">x</a>`, BASE)).toBe(
      "https://journal.example.org/get/42"
    );
    expect(findPdfUrlInHtml(`<a type="application/pdf" href="/get/43">x</a>`, BASE)).toBe(
      "https://journal.example.org/get/43"
    );
  });

  it("matches attribute names case-insensitively", () => {
    const html = `<META NAME="citation_pdf_url" CONTENT="https://x.example.org/a.pdf">`;
    expect(findPdfUrlInHtml(html, BASE)).toBe("https://x.example.org/a.pdf");
  });

  it("returns an empty string when the page links no PDF", () => {
    expect(findPdfUrlInHtml(`<a href="/about">About</a>`, BASE)).toBe("");
  });
});
