/**
 * Environment-driven configuration.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { DoiNotOpenAccessPolicy } from "./types.js";

export interface AcademicToolsConfig {
  /** Contact email sent to Crossref/Unpaywall; required for DOI lookups */
  emailForPolite: string;
  maxResultsPerSource: number;
  /** How many search sources run at once */
  searchConcurrency: number;
  onDoiNotOpenAccess: DoiNotOpenAccessPolicy;
  semanticScholarApiKey: string;
  springerApiKey: string;
  ieeeApiKey: string;
  elsevierApiKey: string;
  lensApiKey: string;
  pubmedApiKey: string;
  /** Root for relative paths, and the sandbox root when restricted */
  workspace: string;
  restrictToWorkspace: boolean;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => v ?? "");

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .optional()
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  ACADEMIC_EMAIL_FOR_POLITE: optionalString,
  ACADEMIC_MAX_RESULTS_PER_SOURCE: z.coerce.number().int().min(1).max(20).default(5),
  ACADEMIC_SEARCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  ACADEMIC_ON_DOI_NOT_OPEN_ACCESS: z
    .enum(["fallback_to_landing_page", "fail"])
    .default("fallback_to_landing_page"),
  SEMANTIC_SCHOLAR_API_KEY: optionalString,
  SPRINGER_API_KEY: optionalString,
  IEEE_API_KEY: optionalString,
  ELSEVIER_API_KEY: optionalString,
  LENS_API_KEY: optionalString,
  PUBMED_API_KEY: optionalString,
  ACADEMIC_WORKSPACE: optionalString,
  ACADEMIC_RESTRICT_TO_WORKSPACE: booleanFlag,
});

/** Defaults used when a config is built in code rather than from the environment. */
export const DEFAULT_CONFIG: AcademicToolsConfig = {
  emailForPolite: "",
  maxResultsPerSource: 5,
  searchConcurrency: 4,
  onDoiNotOpenAccess: "fallback_to_landing_page",
  semanticScholarApiKey: "",
  springerApiKey: "",
  ieeeApiKey: "",
  elsevierApiKey: "",
  lensApiKey: "",
  pubmedApiKey: "",
  workspace: "",
  restrictToWorkspace: false,
};

/** Build a config from defaults plus explicit overrides. */
export function createConfig(overrides: Partial<AcademicToolsConfig> = {}): AcademicToolsConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Load configuration from environment variables.
 * Empty strings count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AcademicToolsConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    emailForPolite: e.ACADEMIC_EMAIL_FOR_POLITE,
    maxResultsPerSource: e.ACADEMIC_MAX_RESULTS_PER_SOURCE,
    searchConcurrency: e.ACADEMIC_SEARCH_CONCURRENCY,
    onDoiNotOpenAccess: e.ACADEMIC_ON_DOI_NOT_OPEN_ACCESS,
    semanticScholarApiKey: e.SEMANTIC_SCHOLAR_API_KEY,
    springerApiKey: e.SPRINGER_API_KEY,
    ieeeApiKey: e.IEEE_API_KEY,
    elsevierApiKey: e.ELSEVIER_API_KEY,
    lensApiKey: e.LENS_API_KEY,
    pubmedApiKey: e.PUBMED_API_KEY,
    workspace: e.ACADEMIC_WORKSPACE,
    restrictToWorkspace: e.ACADEMIC_RESTRICT_TO_WORKSPACE,
  };
}
