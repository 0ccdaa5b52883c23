/**
 * Runtime configuration
 *
 * Options are read once from the environment on first use and can be
 * overridden with configureCells(). Every option is validated against
 * cellConfigSchema.
 *
 * Environment variables (Node.js):
 * - SPHERECELL_CHECKS=false          disable contract assertions
 * - SPHERECELL_LOG_LEVEL=debug       silent | error | warn | info | debug
 * - SPHERECELL_PROJECTION=tan        linear | tan | quadratic
 * - SPHERECELL_DEEP_CELL_POLICY=reject   truncate | reject
 */

import { z } from 'zod/v4';

// ============================================================================
// Schemas
// ============================================================================

export const logLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

/** Mapping between (s,t) and (u,v) face coordinates */
export const projectionKindSchema = z.enum(['linear', 'tan', 'quadratic']);

/** What compact factories do with a primary id deeper than the compact maximum */
export const deepCellPolicySchema = z.enum(['truncate', 'reject']);

export const cellConfigSchema = z.object({
  /** Throw CellContractError on precondition violations */
  checks: z.boolean(),
  logLevel: logLevelSchema,
  projection: projectionKindSchema,
  deepCellPolicy: deepCellPolicySchema,
});

export type CellConfig = z.infer<typeof cellConfigSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
export type ProjectionKind = z.infer<typeof projectionKindSchema>;
export type DeepCellPolicy = z.infer<typeof deepCellPolicySchema>;

export const DEFAULT_CELL_CONFIG: Readonly<CellConfig> = {
  checks: true,
  logLevel: 'warn',
  projection: 'quadratic',
  deepCellPolicy: 'truncate',
};

const envSchema = z.object({
  SPHERECELL_CHECKS: z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional(),
  SPHERECELL_LOG_LEVEL: logLevelSchema.optional(),
  SPHERECELL_PROJECTION: projectionKindSchema.optional(),
  SPHERECELL_DEEP_CELL_POLICY: deepCellPolicySchema.optional(),
});

// ============================================================================
// State
// ============================================================================

let current: CellConfig | null = null;

function readEnvironment(): Partial<CellConfig> {
  if (typeof process === 'undefined' || !process.env) {
    return {};
  }
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.warn('[Config] Ignoring invalid SPHERECELL_* environment:', z.prettifyError(result.error));
    return {};
  }
  const env = result.data;
  const options: Partial<CellConfig> = {};
  if (env.SPHERECELL_CHECKS !== undefined) options.checks = env.SPHERECELL_CHECKS;
  if (env.SPHERECELL_LOG_LEVEL) options.logLevel = env.SPHERECELL_LOG_LEVEL;
  if (env.SPHERECELL_PROJECTION) options.projection = env.SPHERECELL_PROJECTION;
  if (env.SPHERECELL_DEEP_CELL_POLICY) options.deepCellPolicy = env.SPHERECELL_DEEP_CELL_POLICY;
  return options;
}

// ============================================================================
// API
// ============================================================================

/**
 * Current configuration (environment overrides applied on first call)
 */
export function getCellConfig(): Readonly<CellConfig> {
  if (current === null) {
    current = { ...DEFAULT_CELL_CONFIG, ...readEnvironment() };
  }
  return current;
}

/**
 * Override configuration options.
 * Throws a ZodError for values outside the schema; this is a setup error,
 * not a data error.
 */
export function configureCells(options: Partial<CellConfig>): Readonly<CellConfig> {
  const parsed = cellConfigSchema.partial().parse(options);
  const next: CellConfig = { ...getCellConfig() };
  if (parsed.checks !== undefined) next.checks = parsed.checks;
  if (parsed.logLevel !== undefined) next.logLevel = parsed.logLevel;
  if (parsed.projection !== undefined) next.projection = parsed.projection;
  if (parsed.deepCellPolicy !== undefined) next.deepCellPolicy = parsed.deepCellPolicy;
  current = next;
  return current;
}

/**
 * Drop overrides; the environment is read again on next access
 */
export function resetCellConfig(): void {
  current = null;
}
