import type { ApiKeyEntry, LauncherPaths, ModelEntry, ResolvedSelection, Settings } from '../config/types'
import type { Translator } from '../i18n'
import type { CreateSelectorOptions, Selector } from '../selection'
import type { LaunchOptions } from './options'
import process from 'node:process'
import { ConfigFileManager } from '../config/file-operations'
import { resolveLauncherPaths } from '../config/paths'
import { hasDanglingDefaultApiKey, resolveByQuickStart } from '../config/resolve'
import { isLauncherError, LauncherError } from '../errors'
import { createTranslator, detectLocale } from '../i18n'
import { createSelector, selectApiKeyInteractive, selectModelInteractive } from '../selection'
import { suggestNames } from '../utils/cli/fuzzy-match'
import { UILogger } from '../utils/cli/ui'
import { buildCommand, buildResumeCommand, locateBridge, startBridge } from './bridge'
import { parseLaunchOptions } from './options'

/**
 * Everything a run depends on from the outside world, resolved once at startup
 */
export interface LauncherContext {
  paths: LauncherPaths
  env: NodeJS.ProcessEnv
  isInteractive: boolean
  ui: UILogger
  t: Translator
}

export type SelectorFactory = (options: CreateSelectorOptions) => Selector

export class Launcher {
  private configFiles: ConfigFileManager

  constructor(
    private context: LauncherContext,
    private selectorFactory: SelectorFactory = createSelector,
  ) {
    this.configFiles = new ConfigFileManager(context.paths)
  }

  async run(options: LaunchOptions): Promise<number> {
    switch (options.mode) {
      case 'list':
        return this.list()
      case 'resume':
        return this.resume()
      default:
        return this.launch(options)
    }
  }

  private list(): number {
    this.configFiles.validate()
    this.context.ui.displayInventory(this.configFiles.loadApiKeys(), this.configFiles.loadModels())
    return 0
  }

  /**
   * `claude-bridge --resume` without touching the configuration
   */
  private async resume(): Promise<number> {
    const { env, ui, t } = this.context
    const bridgePath = locateBridge(env)
    ui.info(t('resuming'))
    return startBridge(bridgePath, buildResumeCommand(), env, ui, t)
  }

  private async launch(options: LaunchOptions): Promise<number> {
    const { env, ui, t, paths } = this.context
    const bridgePath = locateBridge(env)
    ui.verbose(`claude-bridge: ${bridgePath}`)
    ui.verbose(`Config directory: ${paths.configDir}`)

    this.configFiles.validate()
    const apiKeys = this.configFiles.loadApiKeys()
    const models = this.configFiles.loadModels()
    const settings = this.configFiles.loadSettings()

    const quickStart = options.mode === 'prompt' ? undefined : this.quickStart(settings, apiKeys)
    const selection = quickStart ?? await this.selectInteractive(settings, apiKeys, models)

    const resume = settings.resume && !options.fresh
    ui.displayBoxedSelection(selection, resume)

    return startBridge(bridgePath, buildCommand(selection.apiKey, selection.model, resume), env, ui, t)
  }

  private quickStart(settings: Settings, apiKeys: ApiKeyEntry[]): ResolvedSelection | undefined {
    const { ui, t } = this.context
    const selection = resolveByQuickStart(settings, apiKeys)
    if (selection) {
      ui.verbose(`Quick start: ${selection.apiKey.name} / ${selection.model.id}`)
      return selection
    }

    if (hasDanglingDefaultApiKey(settings, apiKeys)) {
      ui.warning(t('quickStartKeyMissing', { name: settings.defaultApiKey }))
      const suggestions = suggestNames(settings.defaultApiKey, apiKeys.map(entry => entry.name))
      if (suggestions.length > 0) {
        ui.displayGrey(t('didYouMean', { suggestions: suggestions.join(', ') }))
      }
    }
    return undefined
  }

  private async selectInteractive(settings: Settings, apiKeys: ApiKeyEntry[], models: ModelEntry[]): Promise<ResolvedSelection> {
    const { env, isInteractive, ui, t } = this.context
    const selector = this.selectorFactory({ preference: settings.selector, env, isInteractive, ui, t })
    ui.verbose(`Selector: ${selector.kind}`)

    const apiKey = await selectApiKeyInteractive(apiKeys, selector, t)
    if (!apiKey) {
      throw LauncherError.noSelection('apiKey')
    }

    const model = await selectModelInteractive(models, selector, t)
    if (!model) {
      throw LauncherError.noSelection('model')
    }

    return { apiKey, model }
  }
}

export function createLauncherContext(
  options: LaunchOptions,
  t: Translator,
  env: NodeJS.ProcessEnv = process.env,
  isInteractive: boolean = process.stdin.isTTY === true,
): LauncherContext {
  return {
    paths: resolveLauncherPaths(env, options.configDir),
    env,
    isInteractive,
    ui: new UILogger(options.verbose, t),
    t,
  }
}

function reportFailure(error: unknown, ui: UILogger, t: Translator): number {
  if (isLauncherError(error)) {
    ui.error(error.localize(t))
    const hint = error.localizeHint(t)
    if (hint) {
      ui.info(hint)
    }
    return error.exitCode
  }

  ui.error(t('unexpectedError', { reason: error instanceof Error ? error.message : String(error) }))
  return 1
}

/**
 * Parse `argv` (user arguments only), run the launcher and resolve with the
 * process exit code
 */
export async function runLauncher(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const t = createTranslator(detectLocale(env))
  const outcome = parseLaunchOptions(argv)
  if (outcome.kind === 'exit') {
    return outcome.exitCode
  }

  const context = createLauncherContext(outcome.options, t, env)
  try {
    return await new Launcher(context).run(outcome.options)
  }
  catch (error) {
    return reportFailure(error, context.ui, t)
  }
}
