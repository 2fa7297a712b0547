import { z } from 'zod';

const idSchema = z.number().int().positive();
const timestampSchema = z.string();

export const namespaceSchema = z.object({
  id: idSchema,
  name: z.string(),
  path: z.string(),
  full_path: z.string().min(1),
  kind: z.string()
});

export const groupSchema = z.object({
  id: idSchema,
  name: z.string(),
  path: z.string(),
  full_path: z.string().min(1),
  web_url: z.string(),
  description: z.string().nullable().optional(),
  visibility: z.string().optional(),
  parent_id: idSchema.nullable().optional()
});

export const projectSchema = z.object({
  id: idSchema,
  name: z.string(),
  path: z.string(),
  path_with_namespace: z.string().min(1),
  web_url: z.string(),
  namespace: namespaceSchema,
  description: z.string().nullable().optional(),
  visibility: z.string().optional(),
  archived: z.boolean().optional()
});

export const accessTokenStateSchema = z.enum(['active', 'inactive']);

export const accessTokenSchema = z.object({
  id: idSchema,
  name: z.string(),
  scopes: z.array(z.string()),
  active: z.boolean(),
  revoked: z.boolean(),
  created_at: timestampSchema,
  expires_at: timestampSchema.nullable(),
  last_used_at: timestampSchema.nullable().optional(),
  access_level: z.number().int().optional(),
  user_id: idSchema.optional()
});

export const userSummarySchema = z.object({
  id: idSchema,
  username: z.string(),
  name: z.string()
});

export const pipelineTriggerSchema = z.object({
  id: idSchema,
  description: z.string(),
  created_at: timestampSchema,
  updated_at: timestampSchema.nullable().optional(),
  last_used: timestampSchema.nullable().optional(),
  owner: userSummarySchema.nullable().optional()
});

export const ciVariableSchema = z.object({
  key: z.string(),
  value: z.string(),
  variable_type: z.enum(['env_var', 'file']),
  protected: z.boolean(),
  masked: z.boolean(),
  hidden: z.boolean().optional(),
  raw: z.boolean().optional(),
  environment_scope: z.string(),
  description: z.string().nullable().optional()
});

export type Namespace = z.infer<typeof namespaceSchema>;
export type Group = z.infer<typeof groupSchema>;
export type Project = z.infer<typeof projectSchema>;
export type AccessTokenState = z.infer<typeof accessTokenStateSchema>;
export type AccessToken = z.infer<typeof accessTokenSchema>;
export type UserSummary = z.infer<typeof userSummarySchema>;
export type PipelineTrigger = z.infer<typeof pipelineTriggerSchema>;
export type CiVariable = z.infer<typeof ciVariableSchema>;
