import { z } from 'zod';
import { JOB_STATUSES, ROLES } from '@shared/constants';

// Emptiness and deadline rules are enforced by the ledger so that they surface
// as ledger error codes; these schemas only check shape.

const identity = z.string().trim().min(1);
const unixSeconds = z.number().int().nonnegative();
const minorUnits = z.number().int().safe();

export const jobIdParamSchema = z.coerce.number().int().positive();

export const postJobBodySchema = z.object({
  title: z.string(),
  description: z.string().default(''),
  deadline: unixSeconds,
  value: minorUnits,
});

export const updateJobBodySchema = z.object({
  title: z.string(),
  description: z.string().default(''),
  deadline: unixSeconds,
  additionalValue: minorUnits.default(0),
});

export const submitWorkBodySchema = z.object({
  proofHash: z.string(),
});

export const listJobsQuerySchema = z.object({
  client: identity.optional(),
  freelancer: identity.optional(),
  status: z.enum(JOB_STATUSES).optional(),
});

export const roleBodySchema = z.object({
  role: z.enum(ROLES),
});

export const roleParamSchema = z.enum(ROLES);

export const adminBodySchema = z.object({
  identity,
});

export type PostJobBody = z.infer<typeof postJobBodySchema>;
export type UpdateJobBody = z.infer<typeof updateJobBodySchema>;
