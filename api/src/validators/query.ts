/**
 * Query Validation Schemas
 *
 * POST /v1/query
 * { "query": "Q1 revenue", "user_id": "a@x.com", "user_groups": ["finance"], "type": "retrieve" }
 */

import { z } from 'zod';

const optionalIdentifier = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? val : undefined));

export const queryRequestSchema = z.object({
  query: z
    .string({ required_error: 'Query is required' })
    .trim()
    .min(1, 'Query is required')
    .max(4000, 'Query must be at most 4000 characters'),
  user_id: optionalIdentifier,
  user_groups: z.array(z.string().trim().max(256)).max(500).default([]),
  max_results: z.number().int().min(1).max(100).default(10),
  type: z.enum(['retrieve', 'retrieve_and_generate']).default('retrieve'),
  use_caching: z.boolean().default(true),
  sources: z.array(z.enum(['knowledge_base', 'enterprise_search'])).min(1).optional(),
  user_token: optionalIdentifier,
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;
