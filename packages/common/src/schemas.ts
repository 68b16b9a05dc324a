import { z } from 'zod';

export const violationSchema = z.object({
  rule: z.string(),
  message: z.string(),
  file: z.string().nullable(),
  line: z.number().int().nullable(),
  severity: z.enum(['critical', 'warning', 'info']),
  engine: z.string(),
  path: z.string().nullable()
});

export const relatedChangeSchema = z.object({
  filePath: z.string(),
  originalContent: z.string(),
  proposedContent: z.string()
});

export const proposedFixSchema = z.object({
  id: z.string(),
  ruleId: z.string(),
  ruleIds: z.array(z.string()),
  filePath: z.string(),
  line: z.number().int().nullable(),
  originalContent: z.string(),
  proposedContent: z.string(),
  explanation: z.string(),
  complexity: z.enum(['simple', 'moderate', 'complex']),
  safety: z.enum(['safe', 'review_required']),
  violations: z.array(violationSchema),
  addedImports: z.array(z.string()),
  removedImports: z.array(z.string()),
  relatedChanges: z.array(relatedChangeSchema)
});

export const buildResultSchema = z.object({
  success: z.boolean(),
  output: z.string(),
  error: z.string().nullable(),
  durationMs: z.number()
});

export const validationResultSchema = z.object({
  category: z.string(),
  violationsBefore: z.number().int(),
  violationsAfter: z.number().int(),
  violationsFixed: z.number().int(),
  newViolations: z.number().int(),
  build: buildResultSchema.nullable(),
  success: z.boolean(),
  message: z.string()
});

export const sessionStatusSchema = z.enum([
  'queued',
  'triaging',
  'awaiting_review',
  'applying',
  'applied',
  'validating',
  'completed',
  'failed'
]);
