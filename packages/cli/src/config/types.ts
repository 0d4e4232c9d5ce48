export interface ApiKeyEntry {
  name: string
  description?: string
  key: string
  baseURL: string
}

export interface ModelEntry {
  id: string
}

/**
 * Selection strategy preference
 */
export type SelectorPreference = 'auto' | 'fuzzy' | 'numbered'

export interface Settings {
  quickStart: boolean
  defaultApiKey: string // Name of an entry in config.json
  defaultModel: string // Model id, used verbatim
  resume: boolean // Append --resume to the delegate command
  selector: SelectorPreference
}

export interface LauncherPaths {
  configDir: string
  configFile: string
  modelsFile: string
  settingsFile: string
}

export interface ResolvedSelection {
  apiKey: ApiKeyEntry
  model: ModelEntry
}
