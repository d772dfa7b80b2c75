/**
 * Manifest Schemas
 *
 * JSON formats of `agents/<dir>/agent.json` and `workflows/<name>.json`.
 *
 * @module agent-orchestrator/discovery/manifest
 */

import { z } from 'zod';
import { CAPABILITY_KEYS } from '../catalog/types.js';

const nonBlank = z.string().trim().min(1);

const keywordList = z
  .array(nonBlank)
  .default([])
  .transform((keywords) => Array.from(new Set(keywords.map((k) => k.toLowerCase()))));

export const agentManifestSchema = z
  .object({
    name: nonBlank,
    description: z.string().default(''),
    executablePath: nonBlank,
    workingDirectory: z.string().optional(),
    environment: z.record(z.string()).default({}),
    arguments: z.array(z.string()).default([]),
    keywords: keywordList,
    category: z.string().default(''),
    capability: z.enum(CAPABILITY_KEYS).optional(),
  })
  .strict();

export const workflowManifestSchema = z
  .object({
    name: nonBlank,
    description: z.string().default(''),
    steps: z.array(nonBlank).min(1, 'a workflow needs at least one step'),
    outputMappings: z.record(z.array(nonBlank)).default({}),
    keywords: keywordList,
    category: z.string().default(''),
  })
  .strict();

export type AgentManifest = z.infer<typeof agentManifestSchema>;
export type WorkflowManifest = z.infer<typeof workflowManifestSchema>;

/**
 * One-line summary of zod issues
 *
 * @example
 * ```typescript
 * formatIssues(error); // 'executablePath: Required; keywords.0: Expected string, received number'
 * ```
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Best-effort name of a manifest that failed validation
 */
export function peekName(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
    return raw.name;
  }
  return undefined;
}
