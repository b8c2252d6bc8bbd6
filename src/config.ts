/**
 * Configuration management for the component detector
 *
 * Detection is driven entirely by an explicit config object: the ordered
 * signature registry, the atomic-design table and the quality thresholds.
 * Nothing is read from disk or the environment.
 */

import { z } from 'zod';
import {
  DEFAULT_DESIGN_CATEGORIES,
  DEFAULT_SIGNATURE_REGISTRY,
} from './core/registry.js';
import type { DetectorConfig, QualityThresholds } from './core/types/index.js';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: DetectorConfig = {
  registry: DEFAULT_SIGNATURE_REGISTRY,
  designCategories: DEFAULT_DESIGN_CATEGORIES,
  qualityThresholds: {
    overall: 0.7,
    reusability: 0.6,
    accessibility: 0.8,
    maturity: 0.7,
  },
};

/** Overrides accepted by {@link mergeConfig}. */
export interface DetectorConfigOverrides {
  registry?: DetectorConfig['registry'];
  designCategories?: DetectorConfig['designCategories'];
  qualityThresholds?: Partial<QualityThresholds>;
}

/**
 * Thrown when a configuration cannot drive detection. This is a programmer
 * error and surfaces before any object is examined.
 */
export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid detector configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

const patternListSchema = z
  .array(z.string().min(1, 'patterns must not be empty strings'))
  .min(1, 'must list at least one pattern');

const signatureDefSchema = z.object({
  name: z.string().min(1, 'must not be empty'),
  namePatterns: patternListSchema,
  typePatterns: patternListSchema,
  propertyPatterns: z.record(z.unknown()),
  structuralPatterns: z.array(z.string()),
  confidenceThreshold: z
    .number()
    .gt(0, 'must be greater than 0')
    .lte(1, 'must be at most 1'),
});

const registrySchema = z
  .array(signatureDefSchema)
  .min(1, 'registry must contain at least one signature')
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `duplicate signature name "${entry.name}"`,
        });
      }
      seen.add(entry.name);
    });
  });

const tierSchema = z.array(z.string().min(1));

const designCategoriesSchema = z.object({
  atoms: tierSchema,
  molecules: tierSchema,
  organisms: tierSchema,
  templates: tierSchema,
  pages: tierSchema,
});

const ratioSchema = z.number().min(0).max(1);

const configSchema = z.object({
  registry: registrySchema,
  designCategories: designCategoriesSchema,
  qualityThresholds: z.object({
    overall: ratioSchema,
    reusability: ratioSchema,
    accessibility: ratioSchema,
    maturity: ratioSchema,
  }),
});

/**
 * Merge overrides onto a base configuration. Registry and atomic-design
 * table are replaced wholesale; thresholds merge key by key.
 */
export function mergeConfig(
  defaults: DetectorConfig,
  overrides: DetectorConfigOverrides = {},
): DetectorConfig {
  return {
    registry: overrides.registry ?? defaults.registry,
    designCategories: overrides.designCategories ?? defaults.designCategories,
    qualityThresholds: {
      ...defaults.qualityThresholds,
      ...(overrides.qualityThresholds || {}),
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: DetectorConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      ),
    );
  }
}

/**
 * Get configuration with validation
 */
export function getConfig(overrides?: DetectorConfigOverrides): DetectorConfig {
  const config = mergeConfig(DEFAULT_CONFIG, overrides);
  validateConfig(config);
  return config;
}
