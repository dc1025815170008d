/**
 * Tests for reference section lookup.
 */

import { describe, expect, it } from "vitest";
import { extractCitationSection } from "./section.js";

describe("extractCitationSection", () => {
  it("returns the text from the header line onward", () => {
    const text = "Intro\nBody text\nReferences\n[1] A. Author. 2020.\n";
    expect(extractCitationSection(text)).toBe("References\n[1] A. Author. 2020.\n");
  });

  it("accepts a header followed by CRLF or a colon", () => {
    expect(extractCitationSection("Body\nBIBLIOGRAPHY\r\n1. X")).toBe("BIBLIOGRAPHY\r\n1. X");
    expect(extractCitationSection("Body\nWorks Cited: see below")).toBe("Works Cited: see below");
  });

  it("ignores headers that are not on their own line", () => {
    expect(extractCitationSection("See the References section for details.")).toBe("");
  });

  it("prefers earlier headers in priority order over earlier positions", () => {
    const text = "x\nBibliography\nB1\nReferences\nR1";
    expect(extractCitationSection(text)).toBe("References\nR1");
  });

  it("is case-sensitive", () => {
    expect(extractCitationSection("x\nreferences\n[1] a")).toBe("");
  });
});
