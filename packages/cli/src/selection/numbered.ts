import type { Readable } from 'node:stream'
import type { Translator } from '../i18n'
import type { UILogger } from '../utils/cli/ui'
import type { SelectionPrompt, Selector, SelectorChoice } from './types'
import process from 'node:process'
import inquirer from 'inquirer'
import { LauncherError } from '../errors'

/**
 * Turn the typed answer into a 0-based index. An empty answer means no selection;
 * anything that is not a positive integer within 1..count is rejected.
 */
export function parseSelectionIndex(input: string, count: number): number | undefined {
  const answer = input.trim()
  if (answer === '') {
    return undefined
  }

  if (/^\d+$/.test(answer)) {
    const position = Number.parseInt(answer, 10)
    if (position >= 1 && position <= count) {
      return position - 1
    }
  }

  throw LauncherError.invalidSelection(answer, count)
}

/**
 * Built-in fallback: print a numbered list and read one line
 */
export class NumberedSelector implements Selector {
  readonly kind = 'numbered'

  constructor(private ui: UILogger, private t: Translator, private input: Readable = process.stdin) {}

  async select<T>(choices: SelectorChoice<T>[], prompt: SelectionPrompt): Promise<T | undefined> {
    this.ui.info(prompt.message)
    this.ui.displayNumberedList(choices.map(choice => choice.label))

    const answer = await this.readAnswer(choices.length)
    if (answer === undefined) {
      return undefined
    }

    const index = parseSelectionIndex(answer, choices.length)
    return index === undefined ? undefined : choices[index].value
  }

  /**
   * Resolves undefined when the input ends before an answer is submitted
   */
  private readAnswer(count: number): Promise<string | undefined> {
    if (this.input.readableEnded) {
      return Promise.resolve(undefined)
    }

    return new Promise((resolve, reject) => {
      const onEnd = (): void => {
        // A line read just before EOF is still being submitted
        setImmediate(() => resolve(undefined))
      }
      this.input.once('end', onEnd)

      inquirer.prompt<{ choice: string }>([
        {
          type: 'input',
          name: 'choice',
          message: this.t('enterNumber', { max: count }),
        },
      ]).then((answers) => {
        this.input.off('end', onEnd)
        resolve(answers.choice ?? '')
      }, (error: unknown) => {
        this.input.off('end', onEnd)
        reject(error)
      })
    })
  }
}
