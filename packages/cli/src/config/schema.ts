import { z } from 'zod'

export const apiKeyEntrySchema = z.object({
  name: z.string().min(1, 'API key name is required'),
  description: z.string().optional(),
  key: z.string().min(1, 'API key is required'),
  baseURL: z.string().min(1, 'Base URL is required'),
})

export const configFileSchema = z.object({
  apiKeys: z.array(apiKeyEntrySchema),
})

export const modelEntrySchema = z.object({
  id: z.string().min(1, 'Model id is required'),
})

export const modelsFileSchema = z.object({
  data: z.array(modelEntrySchema),
})

// Every settings key is optional; absent keys fall back to their defaults
export const settingsSchema = z.object({
  quickStart: z.boolean().optional().default(false),
  defaultApiKey: z.string().optional().default(''),
  defaultModel: z.string().optional().default(''),
  resume: z.boolean().optional().default(true),
  selector: z.enum(['auto', 'fuzzy', 'numbered']).optional().default('auto'),
})

/**
 * Render the first issue of a failed parse as `path: message`
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) {
    return error.message
  }
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)'
  return `${location}: ${issue.message}`
}
