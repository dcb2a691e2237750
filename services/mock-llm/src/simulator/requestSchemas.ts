import { z } from 'zod';
import type { GenerateContentRequest, SchemaNode } from '@inferlab/shared-types';

export const schemaNodeSchema: z.ZodType<SchemaNode> = z.lazy(() =>
  z.object({
    type: z.string().optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    properties: z.record(schemaNodeSchema).optional(),
    items: schemaNodeSchema.optional(),
    enum: z.array(z.string()).optional(),
    nullable: z.boolean().optional(),
    required: z.array(z.string()).optional(),
  })
);

const partSchema = z.object({ text: z.string().optional() }).passthrough();

const contentSchema = z.object({
  role: z.string().optional(),
  parts: z.array(partSchema).default([]),
});

const functionDeclarationSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  parameters: schemaNodeSchema.optional(),
});

export const generateContentRequestSchema: z.ZodType<GenerateContentRequest, z.ZodTypeDef, unknown> = z.object({
  contents: z.array(contentSchema).default([]),
  generationConfig: z
    .object({
      temperature: z.number().optional(),
      maxOutputTokens: z.number().optional(),
      responseMimeType: z.string().optional(),
      responseSchema: schemaNodeSchema.optional(),
    })
    .passthrough()
    .optional(),
  tools: z
    .array(z.object({ functionDeclarations: z.array(functionDeclarationSchema).optional() }).passthrough())
    .optional(),
  systemInstruction: contentSchema.optional(),
});

export const batchEmbedRequestSchema = z.object({
  requests: z.array(z.unknown()),
});

export const predictRequestSchema = z.object({
  instances: z.array(z.unknown()),
});
