import type { ApiKeyEntry, ModelEntry, SelectorPreference } from '../config/types'
import type { Translator } from '../i18n'
import type { UILogger } from '../utils/cli/ui'
import type { Selector, SelectorChoice } from './types'
import { CONFIG_FILE_NAME, MODELS_FILE_NAME } from '../config/paths'
import { LauncherError } from '../errors'
import { findExecutable } from '../utils/system/path-utils'
import { FUZZY_SEPARATOR, FuzzySelector } from './fuzzy'
import { NumberedSelector } from './numbered'

export { extractSelectionKey, FuzzySelector, runFuzzyFinder } from './fuzzy'
export { NumberedSelector, parseSelectionIndex } from './numbered'
export type { SelectionPrompt, Selector, SelectorChoice, SelectorKind } from './types'

export const FUZZY_FINDER_COMMAND = 'fzf'

export interface CreateSelectorOptions {
  preference: SelectorPreference
  env: NodeJS.ProcessEnv
  isInteractive: boolean // stdin is a TTY
  ui: UILogger
  t: Translator
}

/**
 * Fuzzy selection when fzf is on PATH and stdin is interactive, numbered otherwise
 */
export function createSelector(options: CreateSelectorOptions): Selector {
  const { preference, env, isInteractive, ui, t } = options
  const numbered = new NumberedSelector(ui, t)

  if (preference === 'numbered') {
    return numbered
  }

  const finderPath = findExecutable(FUZZY_FINDER_COMMAND, { env })
  ui.verbose(`fzf: ${finderPath ?? 'not found'}, interactive stdin: ${isInteractive}`)

  if (finderPath && isInteractive) {
    return new FuzzySelector(finderPath)
  }

  if (preference === 'fuzzy') {
    ui.warning(t('fuzzyUnavailable'))
  }
  return numbered
}

export function apiKeyChoice(entry: ApiKeyEntry): SelectorChoice<ApiKeyEntry> {
  return {
    key: entry.name,
    label: entry.description ? `${entry.name}${FUZZY_SEPARATOR}${entry.description}` : entry.name,
    value: entry,
  }
}

export function modelChoice(entry: ModelEntry): SelectorChoice<ModelEntry> {
  return { key: entry.id, label: entry.id, value: entry }
}

export async function selectApiKeyInteractive(entries: ApiKeyEntry[], selector: Selector, t: Translator): Promise<ApiKeyEntry | undefined> {
  if (entries.length === 0) {
    throw LauncherError.noChoicesAvailable('apiKey', CONFIG_FILE_NAME)
  }
  return selector.select(entries.map(apiKeyChoice), { message: t('selectApiKey'), kind: 'apiKey' })
}

export async function selectModelInteractive(entries: ModelEntry[], selector: Selector, t: Translator): Promise<ModelEntry | undefined> {
  if (entries.length === 0) {
    throw LauncherError.noChoicesAvailable('model', MODELS_FILE_NAME)
  }
  return selector.select(entries.map(modelChoice), { message: t('selectModel'), kind: 'model' })
}
