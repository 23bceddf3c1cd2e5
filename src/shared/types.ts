import { z } from 'zod';

// =============================================================================
// Configuration File Types (validated with Zod)
// =============================================================================

/**
 * DocbinConfigFile -- the shape of `docbin.json`.
 * Every field is optional; missing fields fall back to defaults.
 * Unknown keys are rejected so typos surface instead of being ignored.
 */
export const DocbinConfigFileSchema = z
  .object({
    docsDir: z.string().min(1).optional(),
    binaryOut: z.string().min(1).optional(),
    xmlOut: z.string().min(1).optional(),
    generateXml: z.boolean().optional(),
    verify: z.boolean().optional(),
    debug: z.boolean().optional(),
  })
  .strict();

export type DocbinConfigFile = z.infer<typeof DocbinConfigFileSchema>;

// =============================================================================
// Application Layer Types
// =============================================================================

/**
 * Fully resolved compiler settings. Paths are absolute.
 */
export interface CompilerConfig {
  docsDir: string;
  binaryOut: string;
  xmlOut: string;
  generateXml: boolean;
  verify: boolean;
}

/**
 * Settings supplied on the command line. Anything left undefined falls
 * through to the environment, the config file, then the defaults.
 */
export type CompilerOverrides = Partial<CompilerConfig>;

/**
 * Statistics from one compile run.
 */
export interface CompileStats {
  filesProcessed: number;
  documentsSkipped: number;
  objectsCreated: number;
  binaryBytes: number;
  binaryPath: string;
  xmlPath: string | null;
  verified: boolean;
}
