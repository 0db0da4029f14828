import { z } from 'zod';

export const DEFAULT_ARTIFACT_PATTERN = '/nix/store/[^/ ]*\\.drv';

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'g');
    return true;
  } catch {
    return false;
  }
}

export const BuildConfigSchema = z.object({
  /** Flag appended to the command to request a dry run */
  dryRunFlag: z.string().min(1).default('--dry-run'),
  /** Stream the dry run prints its plan on */
  outputStream: z.enum(['stderr', 'stdout', 'both']).default('stderr'),
  /** Regular expression matching one planned artifact */
  artifactPattern: z
    .string()
    .min(1)
    .default(DEFAULT_ARTIFACT_PATTERN)
    .refine(isValidPattern, { message: 'artifactPattern is not a valid regular expression' }),
  /** Working directory relative to the checkout root */
  cwd: z.string().default('.'),
});

export type BuildConfig = z.infer<typeof BuildConfigSchema>;

export const CacheConfigSchema = z.object({
  /** Directory holding the cost store; defaults to $XDG_CACHE_HOME/rebisect */
  dir: z.string().optional(),
  file: z.string().min(1).default('costs.jsonl'),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const SelectionConfigSchema = z.object({
  /** Largest candidate range the exact planner accepts */
  maxCandidates: z.number().int().min(1).default(1500),
  /** Number of ranked probes printed by `rebisect next` */
  top: z.number().int().min(1).default(5),
});

export type SelectionConfig = z.infer<typeof SelectionConfigSchema>;

export const MeasureConfigSchema = z.object({
  /** Dry runs executed in parallel, each in its own worktree */
  concurrency: z.number().int().min(1).max(64).default(1),
  /** Attempts per revision before a measurement failure stops the run */
  attempts: z.number().int().min(1).default(1),
});

export type MeasureConfig = z.infer<typeof MeasureConfigSchema>;

export const DriverConfigSchema = z.object({
  maxSteps: z.number().int().min(1).default(64),
});

export type DriverConfig = z.infer<typeof DriverConfigSchema>;

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  build: BuildConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  selection: SelectionConfigSchema.default({}),
  measure: MeasureConfigSchema.default({}),
  driver: DriverConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Configuration as written in YAML files, before defaults are applied. */
export type ConfigInput = z.input<typeof ConfigSchema>;
