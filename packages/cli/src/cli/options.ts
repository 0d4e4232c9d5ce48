import type { OutputConfiguration } from 'commander'
import { Command, CommanderError } from 'commander'
import { version } from '../../package.json'

export type LaunchMode = 'auto' | 'prompt' | 'resume' | 'list'

export interface LaunchOptions {
  mode: LaunchMode
  fresh: boolean
  verbose: boolean
  configDir?: string
}

export type ParseOutcome =
  | { kind: 'launch', options: LaunchOptions }
  | { kind: 'exit', exitCode: number }

interface ProgramOptions {
  prompt?: boolean
  resume?: boolean
  list?: boolean
  fresh?: boolean
  verbose?: boolean
  configDir?: string
}

// Option name (as in `option:<name>` events) to the mode it selects
const MODE_OPTIONS: Array<[string, LaunchMode]> = [
  ['resume', 'resume'],
  ['prompt', 'prompt'],
  ['list', 'list'],
]

const HELP_FOOTER = `
Configuration files (in ~/.bridge-launcher, or $BRIDGE_LAUNCHER_HOME):
  config.json     {"apiKeys": [{"name", "description", "key", "baseURL"}]}
  models.json     {"data": [{"id"}]}
  settings.json   {"quickStart", "defaultApiKey", "defaultModel", "resume", "selector"}

Examples:
  $ bridge-launcher             quick start if configured, otherwise choose
  $ bridge-launcher -p          always choose an API key and a model
  $ bridge-launcher --resume    run claude-bridge --resume directly`

export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command()

  program
    .name('bridge-launcher')
    .version(version, '-v, --version', 'Display version number')
    .description('Choose an API key and a model, then start claude-bridge')
    .option('-p, --prompt', 'Always choose the API key and model interactively')
    .option('--resume', 'Skip selection and run claude-bridge --resume')
    .option('--fresh', 'Do not append --resume to the launched command')
    .option('--list', 'List configured API keys and models')
    .option('--config-dir <dir>', 'Read configuration from this directory')
    .option('--verbose', 'Enable verbose output')
    .addHelpText('after', HELP_FOOTER)
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()

  if (output) {
    program.configureOutput(output)
  }

  return program
}

/**
 * Parse user arguments (without the node/script prefix). Help, version and
 * usage errors end the run with commander's exit code.
 */
export function parseLaunchOptions(argv: string[], output?: OutputConfiguration): ParseOutcome {
  const program = createProgram(output)

  // Commander emits option events in argv order, so the first mode flag wins.
  // Option values such as the <dir> of --config-dir never emit one.
  let mode: LaunchMode = 'auto'
  for (const [name, optionMode] of MODE_OPTIONS) {
    program.on(`option:${name}`, () => {
      if (mode === 'auto') {
        mode = optionMode
      }
    })
  }

  try {
    program.parse(argv, { from: 'user' })
  }
  catch (error) {
    if (error instanceof CommanderError) {
      return { kind: 'exit', exitCode: error.exitCode }
    }
    throw error
  }

  const options = program.opts<ProgramOptions>()
  return {
    kind: 'launch',
    options: {
      mode,
      fresh: options.fresh === true,
      verbose: options.verbose === true,
      configDir: options.configDir,
    },
  }
}
