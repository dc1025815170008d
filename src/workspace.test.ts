/**
 * Tests for workspace file access.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors.js";
import { createFileSystem, HostFileSystem, SandboxFileSystem } from "./workspace.js";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "paper-harvest-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("SandboxFileSystem", () => {
  it("writes inside the workspace, creating parent directories", async () => {
    const fs = new SandboxFileSystem(root);

    await fs.writeFile("papers/2024/a.txt", "hello");

    expect(await readFile(join(root, "papers/2024/a.txt"), "utf-8")).toBe("hello");
    expect(Buffer.from(await fs.readFile("papers/2024/a.txt")).toString("utf-8")).toBe("hello");
  });

  it("rejects paths that escape the workspace", async () => {
    const fs = new SandboxFileSystem(root);

    expect(() => fs.resolvePath("../outside.txt")).toThrow(ConfigurationError);
    expect(() => fs.resolvePath("/etc/passwd")).toThrow(
      "access denied: path is outside the workspace: /etc/passwd"
    );
    await expect(fs.writeFile("a/../../x.txt", "x")).rejects.toThrow(ConfigurationError);
  });

  it("allows absolute paths inside the workspace and names starting with dots", () => {
    const fs = new SandboxFileSystem(root);
    expect(fs.resolvePath(join(root, "a.txt"))).toBe(join(root, "a.txt"));
    expect(fs.resolvePath("..notes.txt")).toBe(join(root, "..notes.txt"));
  });
});

describe("HostFileSystem", () => {
  it("resolves relative paths against the base directory", async () => {
    const fs = new HostFileSystem(root);
    await fs.writeFile("out/b.txt", new TextEncoder().encode("bytes"));
    expect(await readFile(join(root, "out/b.txt"), "utf-8")).toBe("bytes");
  });
});

describe("createFileSystem", () => {
  it("returns a sandbox when restricted", () => {
    expect(createFileSystem(root, true)).toBeInstanceOf(SandboxFileSystem);
    expect(createFileSystem("", false)).toBeInstanceOf(HostFileSystem);
  });

  it("requires a workspace for a sandbox", () => {
    expect(() => createFileSystem("", true)).toThrow(ConfigurationError);
  });
});
