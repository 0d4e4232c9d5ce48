import type { ApiKeyEntry, ResolvedSelection, Settings } from './types'

/**
 * First entry whose name matches exactly; names are not checked for uniqueness
 */
export function findApiKeyByName(entries: ApiKeyEntry[], name: string): ApiKeyEntry | undefined {
  return entries.find(entry => entry.name === name)
}

/**
 * Resolve the default pair when quick start is enabled. The model id is taken
 * as-is; only the API key reference is checked against the entries.
 */
export function resolveByQuickStart(settings: Settings, entries: ApiKeyEntry[]): ResolvedSelection | undefined {
  if (settings.quickStart !== true || !settings.defaultApiKey || !settings.defaultModel) {
    return undefined
  }

  const apiKey = findApiKeyByName(entries, settings.defaultApiKey)
  if (!apiKey) {
    return undefined
  }

  return { apiKey, model: { id: settings.defaultModel } }
}

/**
 * Whether quick start is configured but points at an API key that does not exist
 */
export function hasDanglingDefaultApiKey(settings: Settings, entries: ApiKeyEntry[]): boolean {
  return settings.quickStart
    && settings.defaultApiKey !== ''
    && settings.defaultModel !== ''
    && !findApiKeyByName(entries, settings.defaultApiKey)
}
