import { z } from 'zod';
import { MODULES, SEVERITIES, STAGES, VALIDATION_REQUEST_TYPES, isValidationRequestType } from '../domain/index.js';
import type { ValidationRequestType } from '../domain/index.js';

const actor = z.string().min(1).max(255);

const stageEnum = z.enum(STAGES);
const anyStageEnum = z.enum([...STAGES, 'cancelled'] as const);
const requestTypeEnum = z.custom<ValidationRequestType>(
  (value) => typeof value === 'string' && isValidationRequestType(value),
  { message: `Must be one of: ${VALIDATION_REQUEST_TYPES.join(', ')}` },
);

/** Schema for POST /api/v1/pipeline-items. */
export const createPipelineItemSchema = z.object({
  title: z.string().min(1).max(255),
  category: z.string().min(1).max(255).nullable().optional(),
  actor,
});

/**
 * Schema for POST /api/v1/pipeline-items/:id/advance.
 * `override` bypasses validation gates and needs a reason.
 */
export const advanceSchema = z.object({
  actor,
  expected_stage: anyStageEnum.optional(),
  override: z
    .object({
      target_stage: stageEnum,
      reason: z.string().min(1).max(1000),
    })
    .optional(),
});

/** Schema for POST /api/v1/pipeline-items/:id/validations. */
export const validateSchema = z
  .object({
    request_type: requestTypeEnum.optional(),
  })
  .default({});

export const clearRejectionSchema = z.object({ actor });

export const cancelSchema = z.object({
  actor,
  reason: z.string().min(1).max(1000),
});

export const pipelineQuerySchema = z.object({
  stage: anyStageEnum.optional(),
});

export const requestTypeParamSchema = requestTypeEnum;

/** Schema for POST /api/v1/validations/:correlationId/response. */
export const validationResponseSchema = z.object({
  verdict: z.enum(['approved', 'rejected']),
  summary: z.string().max(2000).optional(),
  responding_module: z.enum(MODULES).optional(),
});

export const validationQuerySchema = z.object({
  state: z.enum(['waiting', 'approved', 'rejected', 'timed_out']).optional(),
  pipeline_item_id: z.string().min(1).optional(),
});

export const alertQuerySchema = z.object({
  status: z.enum(['open', 'resolved']).optional(),
  severity: z.enum(SEVERITIES).optional(),
  category: z.string().min(1).max(255).optional(),
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export const resolveAlertSchema = z
  .object({
    resolved_by: actor.optional(),
  })
  .default({});

export type CreatePipelineItemBody = z.infer<typeof createPipelineItemSchema>;
export type AdvanceBody = z.infer<typeof advanceSchema>;
