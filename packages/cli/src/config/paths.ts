import type { LauncherPaths } from './types'
import * as os from 'node:os'
import * as path from 'node:path'
import process from 'node:process'

export const CONFIG_DIR_NAME = '.bridge-launcher'
export const CONFIG_HOME_ENV = 'BRIDGE_LAUNCHER_HOME'

export const CONFIG_FILE_NAME = 'config.json'
export const MODELS_FILE_NAME = 'models.json'
export const SETTINGS_FILE_NAME = 'settings.json'

/**
 * Resolve the config directory: explicit override, then $BRIDGE_LAUNCHER_HOME,
 * then ~/.bridge-launcher
 */
export function resolveLauncherPaths(env: NodeJS.ProcessEnv = process.env, override?: string): LauncherPaths {
  const fromEnv = env[CONFIG_HOME_ENV]?.trim()
  const configDir = path.resolve(override?.trim() || fromEnv || path.join(os.homedir(), CONFIG_DIR_NAME))

  return {
    configDir,
    configFile: path.join(configDir, CONFIG_FILE_NAME),
    modelsFile: path.join(configDir, MODELS_FILE_NAME),
    settingsFile: path.join(configDir, SETTINGS_FILE_NAME),
  }
}
