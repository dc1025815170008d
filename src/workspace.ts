/**
 * File system access for the tools: unrestricted host access, or a sandbox
 * rooted at a workspace directory.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { ConfigurationError } from "./errors.js";

/** Whole-file reads and writes; the only file operations the tools perform. */
export interface PaperFileSystem {
  readFile(path: string): Promise<Uint8Array>;
  writeFile(path: string, data: Uint8Array | string): Promise<void>;
}

async function writeWithParents(path: string, data: Uint8Array | string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
}

/** Host file system; relative paths resolve against `baseDir` when given. */
export class HostFileSystem implements PaperFileSystem {
  constructor(private readonly baseDir = "") {}

  private resolvePath(path: string): string {
    return this.baseDir && !isAbsolute(path) ? join(this.baseDir, path) : path;
  }

  async readFile(path: string): Promise<Uint8Array> {
    return readFile(this.resolvePath(path));
  }

  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    await writeWithParents(this.resolvePath(path), data);
  }
}

/** File system confined to a workspace directory. */
export class SandboxFileSystem implements PaperFileSystem {
  private readonly root: string;

  constructor(workspace: string) {
    this.root = resolve(workspace);
  }

  /**
   * Resolve a path inside the workspace.
   * @throws ConfigurationError when the path escapes the workspace
   */
  resolvePath(path: string): string {
    const target = resolve(this.root, path);
    const rel = relative(this.root, target);
    if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new ConfigurationError(`access denied: path is outside the workspace: ${path}`);
    }
    return target;
  }

  async readFile(path: string): Promise<Uint8Array> {
    return readFile(this.resolvePath(path));
  }

  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    await writeWithParents(this.resolvePath(path), data);
  }
}

/** Pick the file system for a workspace setting. */
export function createFileSystem(workspace: string, restrict: boolean): PaperFileSystem {
  if (restrict) {
    if (!workspace) {
      throw new ConfigurationError("a workspace directory is required when file access is restricted");
    }
    return new SandboxFileSystem(workspace);
  }
  return new HostFileSystem(workspace);
}
