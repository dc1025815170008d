/**
 * Tests for the extract-citations tool.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { createConfig } from "../config.js";
import type { PaperFileSystem } from "../workspace.js";
import { extractCitations, NO_CITATIONS_MESSAGE } from "./extract-citations.js";
import type { ToolContext } from "./result.js";

const mockFetch = vi.fn<(url: string, init: RequestInit) => Promise<Response>>();
vi.stubGlobal("fetch", mockFetch);

type Route = () => Response;

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

const PAPER = [
  "A Study of Things",
  "Body of the paper.",
  "References",
  "[1] A. Smith. Graph models. 2019. doi:10.1234/gm",
  "[2] B. Jones. Sparse methods. 2021.",
  "",
].join("\n");

let fs: MemoryFileSystem;

function context(overrides: Parameters<typeof createConfig>[0] = {}, signal?: AbortSignal): ToolContext {
  return { config: createConfig(overrides), fs, signal };
}

describe("extractCitations", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    routeFetch({});
    fs = new MemoryFileSystem();
    fs.files.set("paper.txt", PAPER);
  });

  it("requires file_path", async () => {
    const result = await extractCitations({}, context());
    expect(result).toMatchObject({ isError: true, forModel: "file_path is required" });
  });

  it("requires save_dir when downloading", async () => {
    const result = await extractCitations(
      { file_path: "paper.txt", download_available: true },
      context()
    );
    expect(result).toMatchObject({
      isError: true,
      forModel: "save_dir is required when download_available=true",
    });
  });

  it("reports unreadable and empty files", async () => {
    const missing = await extractCitations({ file_path: "missing.txt" }, context());
    expect(missing.forModel).toBe("failed to read file: ENOENT: missing.txt");

    fs.files.set("empty.txt", "  \n ");
    const empty = await extractCitations({ file_path: "empty.txt" }, context());
    expect(empty).toMatchObject({
      isError: true,
      forModel: "no text content could be extracted from the file",
    });
  });

  it("answers with a notice when no citations are found", async () => {
    fs.files.set("plain.txt", "Just prose without any reference list.");
    const result = await extractCitations({ file_path: "plain.txt" }, context());
    expect(result).toEqual({
      isError: false,
      forModel: NO_CITATIONS_MESSAGE,
      forUser: NO_CITATIONS_MESSAGE,
    });
  });

  it("builds a numbered report from a text file", async () => {
    const result = await extractCitations({ file_path: "paper.txt" }, context());

    expect(result.isError).toBe(false);
    expect(result.forModel).toBe(
      [
        "Citation analysis of paper.txt",
        "Found 2 citations",
        "",
        "--- Citation 1 ---",
        "[1] Year: 2019",
        "DOI: 10.1234/gm",
        "URL: https://doi.org/10.1234/gm",
        "Open Access: false",
        "Raw: [1] A. Smith. Graph models. 2019. doi:10.1234/gm",
        "",
        "--- Citation 2 ---",
        "[2] Year: 2021",
        "Open Access: false",
        "Raw: [2] B. Jones. Sparse methods. 2021.",
        "",
        "",
      ].join("\n")
    );
  });

  it("counts open-access citations and downloads when asked", async () => {
    routeFetch({
      "https://api.crossref.org/works/10.1234%2Fgm": json({
        message: { title: ["Graph Models"], author: [{ given: "A.", family: "Smith" }] },
      }),
      "https://api.unpaywall.org/v2/10.1234/gm": json({
        is_oa: true,
        best_oa_location: { url_for_pdf: "https://repo.example.org/gm.pdf" },
      }),
      "https://repo.example.org/gm.pdf": () => new Response("%PDF-1.4 cited"),
    });

    const result = await extractCitations(
      { file_path: "paper.txt", download_available: true, save_dir: "cited" },
      context({ emailForPolite: "test@example.com" })
    );

    expect(result.forModel.split("\n")[1]).toBe("Found 2 citations, 1 open access, 1 downloaded");
    expect(result.forModel).toContain(
      "[1] Title: Graph Models\nAuthors: A. Smith\nYear: 2019\nDOI: 10.1234/gm\n" +
        "URL: https://doi.org/10.1234/gm\nPDF: https://repo.example.org/gm.pdf\nOpen Access: true\n"
    );
    expect([...fs.files.keys()]).toEqual(["paper.txt", "cited/10.1234_gm.pdf"]);
  });

  it("still reports when Crossref answers with a malformed work", async () => {
    routeFetch({
      "https://api.crossref.org/works/10.1234%2Fgm": json({ message: { author: {} } }),
    });

    const result = await extractCitations({ file_path: "paper.txt" }, context());

    expect(result.isError).toBe(false);
    expect(result.forModel.split("\n").slice(0, 5)).toEqual([
      "Citation analysis of paper.txt",
      "Found 2 citations",
      "",
      "--- Citation 1 ---",
      "[1] Year: 2019",
    ]);
  });

  it("limits the number of citations", async () => {
    const result = await extractCitations({ file_path: "paper.txt", max_citations: 1 }, context());
    expect(result.forModel.split("\n")[1]).toBe("Found 1 citations");
    expect(result.forModel).not.toContain("--- Citation 2 ---");
  });

  it("saves the report and answers with a summary", async () => {
    const result = await extractCitations(
      { file_path: "paper.txt", save_report_to: "reports/citations.txt" },
      context()
    );

    expect(result.forModel).toBe(
      "Found 2 citations (0 open access). Report saved to reports/citations.txt"
    );
    expect(fs.files.get("reports/citations.txt")).toBe(result.forUser);
    expect(result.forUser.startsWith("Citation analysis of paper.txt\n")).toBe(true);
  });

  it("extracts DOIs from PDF text when there is no reference header", async () => {
    const sentence = "Our prior work doi:10.1234/alpha.1 and related studies 10.5678/beta.2 motivate this. ";
    const pdf = `%PDF-1.4\nstream\nBT\n(${sentence.repeat(4)}) Tj\nET\nendstream\n%%EOF`;
    fs.files.set("paper.pdf", new Uint8Array(Buffer.from(pdf, "latin1")));

    const result = await extractCitations({ file_path: "paper.pdf" }, context());

    expect(result.forModel.split("\n")[1]).toBe("Found 2 citations");
    expect(result.forModel).toContain(
      "--- Citation 1 ---\nDOI: 10.1234/alpha.1\nURL: https://doi.org/10.1234/alpha.1\n" +
        "Open Access: false\nRaw: 10.1234/alpha.1\n"
    );
    expect(result.forModel).toContain("--- Citation 2 ---\nDOI: 10.5678/beta.2\n");
  });

  it("reports only processed citations after cancellation", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await extractCitations(
      { file_path: "paper.txt" },
      context({}, controller.signal)
    );

    expect(result.isError).toBe(false);
    expect(result.forModel).toBe(
      "Citation analysis of paper.txt\nFound 0 citations (cancelled after 0 of 2)\n\n"
    );
  });
});
