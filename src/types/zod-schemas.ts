/**
 * Zod schemas for runtime validation at I/O boundaries.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Rule definitions (user-supplied JSON and shipped tables)
// ---------------------------------------------------------------------------

export const RuleDefinitionSchema = z.object({
  pattern: z.string(),
  replacement: z.string().default(''),
  flags: z
    .string()
    .regex(/^[a-z]*$/, 'Flags must be lowercase letters')
    .optional(),
  /** Treat `pattern` as a literal substring instead of a regex source */
  literal: z.boolean().default(false),
  /** Free-form note; ignored by the engine */
  comment: z.string().optional(),
});
export type RuleDefinition = z.input<typeof RuleDefinitionSchema>;
export type ParsedRuleDefinition = z.output<typeof RuleDefinitionSchema>;

export const RuleTableSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  rules: z.array(RuleDefinitionSchema),
});
export type RuleTableInput = z.input<typeof RuleTableSchema>;

/** Shipped predefined tables, keyed by table name */
export const PredefinedRulesFileSchema = z.object({
  tables: z.record(z.string(), RuleTableSchema.omit({ name: true })),
});
export type PredefinedRulesFile = z.infer<typeof PredefinedRulesFileSchema>;

// ---------------------------------------------------------------------------
// Filter options
// ---------------------------------------------------------------------------

export const MAX_PASSES_LIMIT = 64;

export const FilterOptionsSchema = z.object({
  /**
   * Upper bound on passes for fixed-point application.
   * Bounds the number of passes only, not how long the text may grow.
   */
  maxPasses: z.number().int().min(1).max(MAX_PASSES_LIMIT),
});
export type FilterOptions = z.infer<typeof FilterOptionsSchema>;

/** Default filter options */
export const DEFAULT_FILTER_OPTIONS: FilterOptions = {
  maxPasses: 16,
} as const;
