/**
 * Uniform tool result envelope.
 */

import type { AcademicToolsConfig } from "../config.js";
import type { PaperFileSystem } from "../workspace.js";

export interface ToolResult {
  isError: boolean;
  /** Message for the calling agent */
  forModel: string;
  /** Full human-readable body */
  forUser: string;
}

/** Everything a tool needs besides its arguments. */
export interface ToolContext {
  config: AcademicToolsConfig;
  fs: PaperFileSystem;
  signal?: AbortSignal;
}

export function errorResult(message: string): ToolResult {
  return { isError: true, forModel: message, forUser: message };
}

export function successResult(forModel: string, forUser: string = forModel): ToolResult {
  return { isError: false, forModel, forUser };
}
