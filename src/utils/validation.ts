/**
 * Zod Validation Schemas
 *
 * Input validation for every MCP tool.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { REFERENCE_PROPERTIES } from '../models/comparison.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ArticleUrl = z.string().url('Must be an absolute article URL');

export const ReferenceProperty = z.enum(REFERENCE_PROPERTIES);

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH TOOLS
// ═══════════════════════════════════════════════════════════════════════════════

export const GraphStatsInput = z.object({});

export const GraphImportInput = z.object({
  path: z.string().min(1).describe('Path to an N-Triples file'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CITY TOOLS
// ═══════════════════════════════════════════════════════════════════════════════

export const CitySearchInput = z.object({
  query: z.string().trim().min(3, 'Search needs at least 3 characters').describe('Part of "name, country"'),
  limit: z.number().int().min(1).max(1000).default(100).describe('Maximum options returned'),
});

export const CityTwinsInput = z.object({
  city_url: ArticleUrl.describe('Article URL of the city'),
});

export const TwinReferencesInput = z.object({
  city_url: ArticleUrl.describe('Article URL of the city'),
  twin_url: ArticleUrl.describe('Article URL of the twin'),
});

export const CompareTwinsInput = z.object({
  city_url: ArticleUrl.describe('Article URL of the city'),
  hide_known: z.boolean().default(false).describe('Leave out twins the knowledge base already records'),
});

export const CompareReferencesFields = z.object({
  city_url: ArticleUrl.describe('Article URL of the city'),
  twin_url: ArticleUrl.optional().describe('Article URL of the twin as listed on the wiki'),
  twin_id: z.string().url().optional().describe('Entity URL of the twin in the knowledge base'),
});

export const CompareReferencesInput = CompareReferencesFields.refine(
  (input) => input.twin_url !== undefined || input.twin_id !== undefined,
  { message: 'Either twin_url or twin_id is required' }
);

export const ReconcileInput = z.object({
  city_url: ArticleUrl.describe('Article URL of the city'),
  twin_url: ArticleUrl.describe('Article URL of the twin as listed on the wiki'),
  twin_id: z
    .string()
    .url()
    .optional()
    .describe('Entity URL of the twin in the knowledge base; resolved from twin_url when omitted'),
  selections: z
    .array(
      z.object({
        reference_index: z.number().int().min(0),
        property: ReferenceProperty,
      })
    )
    .default([])
    .describe('Reference fields to publish, as returned by twin_cities_compare_references'),
  two_sided: z.boolean().default(true).describe('Also write the reverse statement on the twin'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE EXPORTS
// ═══════════════════════════════════════════════════════════════════════════════

export type GraphImportInput = z.infer<typeof GraphImportInput>;
export type CitySearchInput = z.infer<typeof CitySearchInput>;
export type CityTwinsInput = z.infer<typeof CityTwinsInput>;
export type TwinReferencesInput = z.infer<typeof TwinReferencesInput>;
export type CompareTwinsInput = z.infer<typeof CompareTwinsInput>;
export type CompareReferencesInput = z.infer<typeof CompareReferencesInput>;
export type ReconcileInput = z.infer<typeof ReconcileInput>;
