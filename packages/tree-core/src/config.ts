// ---------------------------------------------------------------------------
// Configuration schemas — validated once, at the builder / forest boundary
// ---------------------------------------------------------------------------

import { z } from 'zod';
import type { Predicate } from './predicates.js';
import { isPredicate } from './predicates.js';
import { ConfigurationError } from './errors.js';

const predicateSchema = z.custom<Predicate>(
  isPredicate,
  'Expected a predicate with name, symbol and test()',
);

export const inductionConfigSchema = z.object({
  /** Nodes with this many items or fewer become leaves. */
  minimalLeafSize: z.number().int().min(0).default(0),
  attributePredicates: z.record(z.string(), z.array(predicateSchema)).default({}),
  defaultPredicates: z.array(predicateSchema).default([]),
  ignoredAttributes: z.array(z.string()).default([]),
});

export const forestOptionsSchema = z.object({
  ensembleSize: z.number().int().min(1, 'Ensemble needs at least one tree'),
  seed: z.number().int().optional(),
});

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type InductionConfig = z.input<typeof inductionConfigSchema>;
export type ForestOptions = z.infer<typeof forestOptionsSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;

/** Resolved, immutable settings consumed by tree induction. */
export interface InductionSettings {
  readonly minimalLeafSize: number;
  readonly attributePredicates: ReadonlyMap<string, readonly Predicate[]>;
  readonly defaultPredicates: readonly Predicate[];
  readonly ignoredAttributes: ReadonlySet<string>;
}

/** Parse with `schema`, throwing `ConfigurationError` listing every issue. */
export function parseConfig<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

export function resolveInductionSettings(config: InductionConfig = {}): InductionSettings {
  const parsed = parseConfig(inductionConfigSchema, config);
  return Object.freeze({
    minimalLeafSize: parsed.minimalLeafSize,
    attributePredicates: new Map(Object.entries(parsed.attributePredicates)),
    defaultPredicates: Object.freeze([...parsed.defaultPredicates]),
    ignoredAttributes: new Set(parsed.ignoredAttributes),
  });
}

/**
 * Log level from `ARBOR_LOG_LEVEL`; `warn` when unset.
 * Fails fast on an unknown value rather than logging nothing.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env['ARBOR_LOG_LEVEL'];
  if (raw === undefined || raw === '') return 'warn';
  const result = logLevelSchema.safeParse(raw.toLowerCase());
  if (!result.success) {
    throw new ConfigurationError([
      `ARBOR_LOG_LEVEL: expected one of ${logLevelSchema.options.join(', ')}, received "${raw}"`,
    ]);
  }
  return result.data;
}
