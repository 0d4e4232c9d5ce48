import type { ChildProcess } from 'node:child_process'
import type { ApiKeyEntry, ModelEntry } from '../config/types'
import type { Translator } from '../i18n'
import type { UILogger } from '../utils/cli/ui'
import { spawn } from 'node:child_process'
import { constants as osConstants } from 'node:os'
import process from 'node:process'
import { LauncherError } from '../errors'
import { maskSecret } from '../utils/cli/ui'
import { findExecutable } from '../utils/system/path-utils'

export const BRIDGE_COMMAND = 'claude-bridge'

export interface CommandSpec {
  program: string
  args: string[]
}

/**
 * `claude-bridge openai <model> --baseURL <url> --apiKey <key> [--resume]`
 */
export function buildCommand(apiKey: ApiKeyEntry, model: ModelEntry, resume: boolean): CommandSpec {
  const args = ['openai', model.id, '--baseURL', apiKey.baseURL, '--apiKey', apiKey.key]
  if (resume) {
    args.push('--resume')
  }
  return { program: BRIDGE_COMMAND, args }
}

export function buildResumeCommand(): CommandSpec {
  return { program: BRIDGE_COMMAND, args: ['--resume'] }
}

/**
 * Printable command line with the value of --apiKey masked
 */
export function formatCommand(command: CommandSpec): string {
  const args = command.args.map((arg, index) =>
    index > 0 && command.args[index - 1] === '--apiKey' ? maskSecret(arg) : arg)
  return [command.program, ...args].join(' ')
}

/**
 * Absolute path of the delegate executable; DELEGATE_NOT_FOUND when missing
 */
export function locateBridge(env: NodeJS.ProcessEnv): string {
  const bridgePath = findExecutable(BRIDGE_COMMAND, { env })
  if (!bridgePath) {
    throw LauncherError.delegateNotFound()
  }
  return bridgePath
}

/**
 * Exit status to report for a finished child: its own code, or 128 + signal
 * number when it was killed by a signal
 */
export function toExitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code
  }
  const signalNumber: unknown = Object.entries(osConstants.signals).find(([name]) => name === signal)?.[1]
  return typeof signalNumber === 'number' ? 128 + signalNumber : 1
}

/**
 * Run the delegate in the foreground and resolve with its exit status
 */
export async function startBridge(
  executablePath: string,
  command: CommandSpec,
  env: NodeJS.ProcessEnv,
  ui: UILogger,
  t: Translator,
): Promise<number> {
  ui.verbose(`Running: ${formatCommand(command)}`)

  return new Promise((resolve) => {
    const bridge: ChildProcess = spawn(executablePath, command.args, {
      stdio: 'inherit',
      env,
      shell: process.platform === 'win32',
    })

    const forwardInterrupt = (): void => {
      bridge.kill('SIGINT')
    }
    const forwardTerminate = (): void => {
      bridge.kill('SIGTERM')
    }
    process.on('SIGINT', forwardInterrupt)
    process.on('SIGTERM', forwardTerminate)

    const detach = (): void => {
      process.off('SIGINT', forwardInterrupt)
      process.off('SIGTERM', forwardTerminate)
    }

    bridge.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      detach()
      resolve(toExitStatus(code, signal))
    })

    bridge.on('error', (error: Error) => {
      detach()
      ui.error(t('delegateStartFailed', { reason: error.message }))
      resolve(1)
    })
  })
}
