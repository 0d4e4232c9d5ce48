import type { LauncherContext, SelectorFactory } from '../../src/cli/launcher'
import type { LaunchOptions } from '../../src/cli/options'
import type { CreateSelectorOptions, SelectionPrompt, Selector, SelectorChoice } from '../../src/selection'
import { ChildProcess, spawn } from 'node:child_process'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { Launcher, runLauncher } from '../../src/cli/launcher'
import { resolveLauncherPaths } from '../../src/config/paths'
import { LAUNCHER_ERROR_CODES } from '../../src/errors'
import { createTranslator } from '../../src/i18n'
import { UILogger } from '../../src/utils/cli/ui'
import { findExecutable } from '../../src/utils/system/path-utils'

vi.mock('node:child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:child_process')>()
  return {
    ...actual,
    spawn: vi.fn(),
  }
})

vi.mock('../../src/utils/system/path-utils', () => ({
  findExecutable: vi.fn(),
}))

const mockSpawn = vi.mocked(spawn)
const mockFindExecutable = vi.mocked(findExecutable)

const BRIDGE_PATH = '/usr/local/bin/claude-bridge'

function exitingProcess(code: number): ChildProcess {
  const child = new ChildProcess()
  setTimeout(() => child.emit('close', code, null), 10)
  return child
}

/**
 * Picks fixed positions in order: first call gets picks[0], second picks[1]
 */
class ScriptedSelector implements Selector {
  readonly kind = 'numbered'
  prompts: SelectionPrompt[] = []

  constructor(private picks: Array<number | undefined>) {}

  async select<T>(choices: SelectorChoice<T>[], prompt: SelectionPrompt): Promise<T | undefined> {
    const pick = this.picks[this.prompts.length]
    this.prompts.push(prompt)
    return pick === undefined ? undefined : choices[pick].value
  }
}

describe('launcher', () => {
  const t = createTranslator('en-US')
  let configDir: string
  let ui: UILogger
  let selector: ScriptedSelector
  let selectorOptions: CreateSelectorOptions[]

  const write = (name: string, content: unknown): void => {
    fs.writeFileSync(path.join(configDir, name), JSON.stringify(content), 'utf-8')
  }

  const writeConfig = (settings: Record<string, unknown>): void => {
    write('config.json', {
      apiKeys: [
        { name: 'A', description: 'first', key: 'sk-a', baseURL: 'http://a' },
        { name: 'B', description: 'second', key: 'sk-b', baseURL: 'http://b' },
      ],
    })
    write('models.json', { data: [{ id: 'gpt-4' }, { id: 'gpt-4o' }] })
    write('settings.json', settings)
  }

  const createLauncher = (picks: Array<number | undefined> = []): Launcher => {
    selector = new ScriptedSelector(picks)
    const factory: SelectorFactory = (options) => {
      selectorOptions.push(options)
      return selector
    }
    const context: LauncherContext = {
      paths: resolveLauncherPaths({}, configDir),
      env: { PATH: '/usr/local/bin' },
      isInteractive: true,
      ui,
      t,
    }
    return new Launcher(context, factory)
  }

  const options = (overrides: Partial<LaunchOptions> = {}): LaunchOptions => ({
    mode: 'auto',
    fresh: false,
    verbose: false,
    ...overrides,
  })

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-launcher-'))
    selectorOptions = []
    ui = new UILogger(false, t)
    vi.spyOn(ui, 'info').mockImplementation(() => undefined)
    vi.spyOn(ui, 'warning').mockImplementation(() => undefined)
    vi.spyOn(ui, 'displayGrey').mockImplementation(() => undefined)
    vi.spyOn(ui, 'displayBoxedSelection').mockImplementation(() => undefined)
    vi.spyOn(ui, 'displayInventory').mockImplementation(() => undefined)
    mockFindExecutable.mockReturnValue(BRIDGE_PATH)
  })

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true })
    vi.clearAllMocks()
  })

  describe('quick start', () => {
    it('should launch the default pair without prompting', async () => {
      writeConfig({ quickStart: true, defaultApiKey: 'B', defaultModel: 'custom-model' })
      mockSpawn.mockReturnValueOnce(exitingProcess(0))

      const exitCode = await createLauncher().run(options())

      expect(exitCode).toBe(0)
      expect(selectorOptions).toEqual([])
      expect(mockSpawn).toHaveBeenCalledWith(
        BRIDGE_PATH,
        ['openai', 'custom-model', '--baseURL', 'http://b', '--apiKey', 'sk-b', '--resume'],
        expect.objectContaining({ stdio: 'inherit' }),
      )
    })

    it('should forward the delegate exit status', async () => {
      writeConfig({ quickStart: true, defaultApiKey: 'A', defaultModel: 'gpt-4' })
      mockSpawn.mockReturnValueOnce(exitingProcess(3))

      await expect(createLauncher().run(options())).resolves.toBe(3)
    })

    it('should warn and fall back to selection when the default key is missing', async () => {
      writeConfig({ quickStart: true, defaultApiKey: 'b', defaultModel: 'gpt-4' })
      mockSpawn.mockReturnValueOnce(exitingProcess(0))

      await createLauncher([0, 1]).run(options())

      expect(ui.warning).toHaveBeenCalledWith('Default API key "b" not found, falling back to interactive selection.')
      expect(ui.displayGrey).toHaveBeenCalledWith('Did you mean: B?')
      expect(mockSpawn).toHaveBeenCalledWith(
        BRIDGE_PATH,
        ['openai', 'gpt-4o', '--baseURL', 'http://a', '--apiKey', 'sk-a', '--resume'],
        expect.any(Object),
      )
    })

    it('should select interactively when quick start is off', async () => {
      writeConfig({ quickStart: false, defaultApiKey: 'A', defaultModel: 'gpt-4' })
      mockSpawn.mockReturnValueOnce(exitingProcess(0))

      await createLauncher([1, 0]).run(options())

      expect(selector.prompts).toEqual([
        { message: 'Select API key', kind: 'apiKey' },
        { message: 'Select model', kind: 'model' },
      ])
      expect(ui.warning).not.toHaveBeenCalled()
    })
  })

  describe('prompt mode', () => {
    it('should ignore quick start and use the selected pair', async () => {
      writeConfig({ quickStart: true, defaultApiKey: 'A', defaultModel: 'gpt-4', selector: 'numbered' })
      mockSpawn.mockReturnValueOnce(exitingProcess(0))

      await createLauncher([1, 1]).run(options({ mode: 'prompt' }))

      expect(selectorOptions).toEqual([
        { preference: 'numbered', env: { PATH: '/usr/local/bin' }, isInteractive: true, ui, t },
      ])
      expect(ui.displayBoxedSelection).toHaveBeenCalledWith(
        { apiKey: { name: 'B', description: 'second', key: 'sk-b', baseURL: 'http://b' }, model: { id: 'gpt-4o' } },
        true,
      )
      expect(mockSpawn).toHaveBeenCalledWith(
        BRIDGE_PATH,
        ['openai', 'gpt-4o', '--baseURL', 'http://b', '--apiKey', 'sk-b', '--resume'],
        expect.any(Object),
      )
    })

    it('should stop when no api key is chosen', async () => {
      writeConfig({})

      await expect(createLauncher([undefined]).run(options({ mode: 'prompt' })))
        .rejects
        .toMatchObject({ code: LAUNCHER_ERROR_CODES.NO_SELECTION, message: 'No API key selected.' })
      expect(mockSpawn).not.toHaveBeenCalled()
    })

    it('should stop when no model is chosen', async () => {
      writeConfig({})

      await expect(createLauncher([0, undefined]).run(options({ mode: 'prompt' })))
        .rejects
        .toMatchObject({ code: LAUNCHER_ERROR_CODES.NO_SELECTION, message: 'No model selected.' })
    })

    it('should refuse an empty model list before prompting for a model', async () => {
      writeConfig({})
      write('models.json', { data: [] })

      await expect(createLauncher([0]).run(options({ mode: 'prompt' })))
        .rejects
        .toMatchObject({ code: LAUNCHER_ERROR_CODES.NO_CHOICES_AVAILABLE })
      expect(selector.prompts).toEqual([{ message: 'Select API key', kind: 'apiKey' }])
    })
  })

  describe('resume flag', () => {
    it('should leave out --resume when settings turn it off', async () => {
      writeConfig({ quickStart: true, defaultApiKey: 'A', defaultModel: 'gpt-4', resume: false })
      mockSpawn.mockReturnValueOnce(exitingProcess(0))

      await createLauncher().run(options())

      expect(mockSpawn).toHaveBeenCalledWith(
        BRIDGE_PATH,
        ['openai', 'gpt-4', '--baseURL', 'http://a', '--apiKey', 'sk-a'],
        expect.any(Object),
      )
    })

    it('should leave out --resume for a fresh run', async () => {
      writeConfig({ quickStart: true, defaultApiKey: 'A', defaultModel: 'gpt-4' })
      mockSpawn.mockReturnValueOnce(exitingProcess(0))

      await createLauncher().run(options({ fresh: true }))

      expect(mockSpawn).toHaveBeenCalledWith(
        BRIDGE_PATH,
        ['openai', 'gpt-4', '--baseURL', 'http://a', '--apiKey', 'sk-a'],
        expect.any(Object),
      )
      expect(ui.displayBoxedSelection).toHaveBeenCalledWith(expect.any(Object), false)
    })
  })

  describe('failures', () => {
    it('should report missing files before parsing any of them', async () => {
      write('settings.json', 'not json at all')

      await expect(createLauncher().run(options()))
        .rejects
        .toMatchObject({ code: LAUNCHER_ERROR_CODES.CONFIG_MISSING })
      expect(mockSpawn).not.toHaveBeenCalled()
    })

    it('should check for claude-bridge before reading configuration', async () => {
      mockFindExecutable.mockReturnValue(null)

      await expect(createLauncher().run(options()))
        .rejects
        .toMatchObject({ code: LAUNCHER_ERROR_CODES.DELEGATE_NOT_FOUND })
    })
  })

  describe('list mode', () => {
    it('should show keys and models without needing claude-bridge', async () => {
      writeConfig({})
      mockFindExecutable.mockReturnValue(null)

      await expect(createLauncher().run(options({ mode: 'list' }))).resolves.toBe(0)
      expect(ui.displayInventory).toHaveBeenCalledWith(
        [
          { name: 'A', description: 'first', key: 'sk-a', baseURL: 'http://a' },
          { name: 'B', description: 'second', key: 'sk-b', baseURL: 'http://b' },
        ],
        [{ id: 'gpt-4' }, { id: 'gpt-4o' }],
      )
    })
  })
})

describe('runLauncher', () => {
  let configDir: string
  let env: NodeJS.ProcessEnv

  beforeEach(() => {
    configDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-launcher-')), 'missing')
    env = { PATH: '/usr/local/bin', LANG: 'en_US.UTF-8', BRIDGE_LAUNCHER_HOME: configDir }
    mockFindExecutable.mockReturnValue(BRIDGE_PATH)
  })

  afterEach(() => {
    fs.rmSync(path.dirname(configDir), { recursive: true, force: true })
    vi.clearAllMocks()
  })

  it('should run claude-bridge --resume without reading any configuration', async () => {
    mockSpawn.mockReturnValueOnce(exitingProcess(3))

    const exitCode = await runLauncher(['--resume'], env)

    expect(exitCode).toBe(3)
    expect(mockSpawn).toHaveBeenCalledTimes(1)
    expect(mockSpawn).toHaveBeenCalledWith(BRIDGE_PATH, ['--resume'], expect.objectContaining({ env }))
  })

  it('should exit 1 when configuration files are missing', async () => {
    await expect(runLauncher([], env)).resolves.toBe(1)
    expect(mockSpawn).not.toHaveBeenCalled()
  })

  it('should exit 1 when claude-bridge is not installed', async () => {
    mockFindExecutable.mockReturnValue(null)

    await expect(runLauncher(['--resume'], env)).resolves.toBe(1)
    expect(mockSpawn).not.toHaveBeenCalled()
  })
})
