import { z } from 'zod';

export const sessionParamsSchema = z.object({
  id: z.coerce.number().int().positive()
});

export const createSessionBodySchema = z.object({
  projectRoot: z.string().min(1),
  category: z.string().min(1).optional(),
  fixedRules: z.array(z.string()).default([]),
  /** Scan report: a list of engine records or an object of per-engine lists. */
  report: z.unknown()
});

export const decisionBodySchema = z.object({
  fixId: z.string().min(1),
  action: z.enum(['approve', 'reject', 'skip', 'reopen']),
  comment: z.string().min(1).optional()
});

export const bulkDecisionBodySchema = z.object({
  action: z.enum(['approve_all', 'approve_changed', 'reject_all'])
});

export const applyBodySchema = z
  .object({
    branch: z.string().min(1).optional()
  })
  .default({});

export const consistencyBodySchema = z.object({
  specViolations: z.array(z.unknown()),
  codeViolations: z.array(z.unknown()),
  inventory: z
    .object({
      specArtifacts: z.array(z.string()).optional(),
      codeArtifacts: z.array(z.string()).optional()
    })
    .optional()
});

export type CreateSessionBody = z.infer<typeof createSessionBodySchema>;
export type DecisionBody = z.infer<typeof decisionBodySchema>;
export type BulkDecisionBody = z.infer<typeof bulkDecisionBodySchema>;
