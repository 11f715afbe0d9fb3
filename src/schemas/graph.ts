/**
 * Graph API response envelope schemas
 */

import { z } from 'zod';

export const graphErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
    code: z.number().int().optional(),
    error_subcode: z.number().int().optional(),
    fbtrace_id: z.string().optional(),
  }),
});

export const memberRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().default('Unknown'),
});

export const membersPageSchema = z.object({
  data: z.array(memberRecordSchema),
  paging: z
    .object({
      cursors: z
        .object({
          before: z.string().optional(),
          after: z.string().optional(),
        })
        .optional(),
      next: z.string().optional(),
      previous: z.string().optional(),
    })
    .optional(),
});

export const memberMetadataSchema = z.object({
  id: z.string().min(1),
  name: z.string().default('Unknown'),
  location: z
    .object({
      id: z.string().optional(),
      name: z.string().optional(),
    })
    .optional(),
});

// ids=a,b,c replies with an object keyed by id
export const memberMetadataBatchSchema = z.record(memberMetadataSchema);

export const debugTokenSchema = z.object({
  data: z.object({
    is_valid: z.boolean(),
    app_id: z.string().optional(),
    user_id: z.string().optional(),
    expires_at: z.number().optional(),
    scopes: z.array(z.string()).optional(),
  }),
});

export const deleteResultSchema = z.union([z.object({ success: z.boolean() }), z.boolean()]);
