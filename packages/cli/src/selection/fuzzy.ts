import type { ChildProcess } from 'node:child_process'
import type { SelectionPrompt, Selector, SelectorChoice } from './types'
import { spawn } from 'node:child_process'
import { LauncherError } from '../errors'

export const FUZZY_SEPARATOR = ' - '

// fzf: 1 = no match, 130 = interrupted with ESC or CTRL-C
const EMPTY_EXIT_CODES = new Set([1, 130])

/**
 * Key part of a selected line: everything before the first " - "
 */
export function extractSelectionKey(line: string): string {
  const separatorIndex = line.indexOf(FUZZY_SEPARATOR)
  return (separatorIndex === -1 ? line : line.slice(0, separatorIndex)).trim()
}

/**
 * Run the fuzzy finder over `lines`; resolves the chosen line, or undefined when
 * nothing was chosen
 */
export async function runFuzzyFinder(executablePath: string, lines: string[], prompt: string): Promise<string | undefined> {
  return new Promise((resolve, reject) => {
    // stderr and the terminal stay attached so the finder can draw its UI
    const finder: ChildProcess = spawn(executablePath, ['--height', '40%', '--reverse', '--prompt', `${prompt}> `], {
      stdio: ['pipe', 'pipe', 'inherit'],
    })

    let output = ''
    finder.stdout?.setEncoding('utf-8')
    finder.stdout?.on('data', (chunk: string) => {
      output += chunk
    })

    finder.on('error', (error: Error) => {
      reject(error)
    })

    finder.on('close', (code: number | null) => {
      if (code === 0) {
        const line = output.split('\n')[0].trim()
        resolve(line === '' ? undefined : line)
      }
      else if (code === null || EMPTY_EXIT_CODES.has(code)) {
        resolve(undefined)
      }
      else {
        reject(LauncherError.fuzzyFinderFailed(code))
      }
    })

    // The finder may exit without reading every line; its exit code decides then
    finder.stdin?.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'EPIPE') {
        reject(error)
      }
    })
    finder.stdin?.end(`${lines.join('\n')}\n`)
  })
}

/**
 * Incremental search through an external fuzzy finder (fzf)
 */
export class FuzzySelector implements Selector {
  readonly kind = 'fuzzy'

  constructor(private executablePath: string) {}

  async select<T>(choices: SelectorChoice<T>[], prompt: SelectionPrompt): Promise<T | undefined> {
    const line = await runFuzzyFinder(this.executablePath, choices.map(choice => choice.label), prompt.message)
    if (line === undefined) {
      return undefined
    }

    const key = extractSelectionKey(line)
    const choice = choices.find(candidate => candidate.label === line)
      ?? choices.find(candidate => candidate.key === key)
    if (!choice) {
      throw LauncherError.nameLookupFailed(prompt.kind, key)
    }
    return choice.value
  }
}

