/**
 * Tests for citation enrichment.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { createCitationRef } from "../types.js";
import type { PaperFileSystem } from "../workspace.js";
import { citationFileName, enrichCitation, enrichCitations } from "./enricher.js";

const mockFetch = vi.fn<(url: string, init: RequestInit) => Promise<Response>>();
vi.stubGlobal("fetch", mockFetch);

type Route = () => Response;

/** Answer each request from the first route whose key the URL starts with. */
function routeFetch(routes: Record<string, Route>): void {
  mockFetch.mockImplementation(async (url) => {
    for (const [prefix, route] of Object.entries(routes)) {
      if (url.startsWith(prefix)) return route();
    }
    return new Response("not found", { status: 404 });
  });
}

function json(body: unknown): Route {
  return () => new Response(JSON.stringify(body));
}

class MemoryFileSystem implements PaperFileSystem {
  readonly files = new Map<string, Uint8Array | string>();

  async readFile(path: string): Promise<Uint8Array> {
    const data = this.files.get(path);
    if (data === undefined) throw new Error(`ENOENT: ${path}`);
    return typeof data === "string" ? new TextEncoder().encode(data) : data;
  }

  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    this.files.set(path, data);
  }
}

const EMAIL = "test@example.com";

describe("citationFileName", () => {
  it("derives the name from the DOI", () => {
    expect(citationFileName(createCitationRef({ doi: "10.1234/a:b c" }))).toBe("10.1234_a_b_c.pdf");
  });

  it("falls back to the citation index", () => {
    expect(citationFileName(createCitationRef({ index: 7 }))).toBe("citation_7.pdf");
  });

  it("produces distinct names for unnumbered records without a DOI", () => {
    const a = citationFileName(createCitationRef());
    const b = citationFileName(createCitationRef());
    expect(a).toMatch(/^citation_\d+\.pdf$/);
    expect(a).not.toBe(b);
  });
});

describe("enrichCitations", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("fills metadata and open-access status from Crossref and Unpaywall", async () => {
    routeFetch({
      "https://api.crossref.org/works/10.1234%2Foa": json({
        message: {
          title: ["Open Paper"],
          author: [{ given: "Ada", family: "Lovelace" }, { given: "Alan", family: "Turing" }],
          published: { "date-parts": [[2020]] },
        },
      }),
      "https://api.unpaywall.org/v2/10.1234/oa": json({
        is_oa: true,
        best_oa_location: { url_for_pdf: "https://repo.example.org/oa.pdf" },
      }),
    });
    const ref = createCitationRef({ index: 1, doi: "10.1234/oa", year: "2019" });

    const summary = await enrichCitations([ref], { email: EMAIL });

    expect(summary).toEqual({ processed: 1, downloaded: 0, cancelled: false });
    expect(ref).toMatchObject({
      title: "Open Paper",
      authors: "Ada Lovelace, Alan Turing",
      year: "2020",
      isOA: true,
      pdfUrl: "https://repo.example.org/oa.pdf",
    });
  });

  it("leaves records untouched when lookups fail", async () => {
    routeFetch({});
    const ref = createCitationRef({ index: 1, doi: "10.1234/missing", year: "2019" });

    await enrichCitations([ref], { email: EMAIL });

    expect(ref).toMatchObject({ title: "", authors: "", year: "2019", isOA: false, pdfUrl: "" });
  });

  it("keeps enriching after a record whose Crossref body is malformed", async () => {
    routeFetch({
      "https://api.crossref.org/works/10.1234%2Fbad": () => new Response("null"),
      "https://api.crossref.org/works/10.1234%2Fodd": json({ message: { author: {} } }),
      "https://api.crossref.org/works/10.1234%2Fgood": json({ message: { title: ["Good Paper"] } }),
    });
    const refs = [
      createCitationRef({ index: 1, doi: "10.1234/bad" }),
      createCitationRef({ index: 2, doi: "10.1234/odd" }),
      createCitationRef({ index: 3, doi: "10.1234/good" }),
    ];

    const summary = await enrichCitations(refs, { email: "" });

    expect(summary).toEqual({ processed: 3, downloaded: 0, cancelled: false });
    expect(refs.map((r) => r.title)).toEqual(["", "", "Good Paper"]);
  });

  it("treats a non-object Unpaywall body as closed access", async () => {
    routeFetch({
      "https://api.crossref.org/": json({ message: {} }),
      "https://api.unpaywall.org/": () => new Response("null"),
    });
    const ref = createCitationRef({ doi: "10.1234/x" });

    await enrichCitation(ref, { email: EMAIL });

    expect(ref).toMatchObject({ isOA: false, pdfUrl: "" });
  });

  it("skips the Unpaywall lookup without an email", async () => {
    routeFetch({ "https://api.crossref.org/": json({ message: { title: ["T"] } }) });
    const ref = createCitationRef({ doi: "10.1234/x" });

    await enrichCitations([ref], { email: "" });

    expect(ref.title).toBe("T");
    expect(ref.isOA).toBe(false);
    expect(mockFetch.mock.calls.map(([url]) => url)).toEqual(["https://api.crossref.org/works/10.1234%2Fx"]);
  });

  it("does not touch the network for records without a DOI", async () => {
    await enrichCitations([createCitationRef({ index: 1, rawText: "[1] no doi" })], {
      email: EMAIL,
    });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("downloads open-access PDFs and skips non-PDF bodies", async () => {
    routeFetch({
      "https://api.crossref.org/": json({ message: {} }),
      "https://api.unpaywall.org/v2/10.1234/good": json({
        is_oa: true,
        best_oa_location: { url_for_pdf: "https://repo.example.org/good" },
      }),
      "https://api.unpaywall.org/v2/10.1234/html": json({
        is_oa: true,
        best_oa_location: { url_for_pdf: "https://repo.example.org/html" },
      }),
      "https://repo.example.org/good": () => new Response("%PDF-1.5 body"),
      "https://repo.example.org/html": () =>
        new Response("<html></html>", { headers: { "content-type": "text/html" } }),
    });
    const fs = new MemoryFileSystem();
    const refs = [
      createCitationRef({ index: 1, doi: "10.1234/good" }),
      createCitationRef({ index: 2, doi: "10.1234/html" }),
    ];

    const summary = await enrichCitations(refs, { email: EMAIL, downloadDir: "cited", fs });

    expect(summary).toEqual({ processed: 2, downloaded: 1, cancelled: false });
    expect([...fs.files.keys()]).toEqual(["cited/10.1234_good.pdf"]);
  });

  it("stops between records once cancelled", async () => {
    const controller = new AbortController();
    mockFetch.mockImplementation(async () => {
      controller.abort();
      return new Response(JSON.stringify({ message: { title: ["First"] } }));
    });
    const refs = [
      createCitationRef({ index: 1, doi: "10.1234/one" }),
      createCitationRef({ index: 2, doi: "10.1234/two" }),
    ];

    const summary = await enrichCitations(refs, { email: "", signal: controller.signal });

    expect(summary).toEqual({ processed: 1, downloaded: 0, cancelled: true });
    expect(refs[0]?.title).toBe("First");
    expect(refs[1]?.title).toBe("");
  });
});
