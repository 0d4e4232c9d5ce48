import type { ApiKeyEntry, ModelEntry, ResolvedSelection } from '../../config/types'
import type { Translator } from '../../i18n'
import boxen from 'boxen'
import chalk from 'chalk'
import { createTranslator } from '../../i18n'

// Force chalk to enable colors when bundled
chalk.level = 1

const log = console.log

export function maskSecret(secret: string): string {
  return `${secret.slice(0, 8)}***`
}

export class UILogger {
  constructor(private isVerbose: boolean = false, private t: Translator = createTranslator()) {}

  displayApiKey(entry: ApiKeyEntry): void {
    log(`${chalk.gray('○')} ${chalk.cyan.bold(entry.name)}${entry.description ? chalk.gray(` - ${entry.description}`) : ''}`)
    log(`  ${chalk.gray(`└─ ${this.t('labelBaseURL')}`)} ${chalk.white(entry.baseURL)}`)
    log(`  ${chalk.gray(`└─ ${this.t('labelApiKey')}`)} ${chalk.white(maskSecret(entry.key))}`)
  }

  displayInventory(apiKeys: ApiKeyEntry[], models: ModelEntry[]): void {
    log()
    log(chalk.bold(this.t('listApiKeys')))
    if (apiKeys.length === 0) {
      log(chalk.gray(`  ${this.t('listEmpty')}`))
    }
    apiKeys.forEach(entry => this.displayApiKey(entry))

    log()
    log(chalk.bold(this.t('listModels')))
    if (models.length === 0) {
      log(chalk.gray(`  ${this.t('listEmpty')}`))
    }
    models.forEach(model => log(`${chalk.gray('○')} ${chalk.white(model.id)}`))
    log()
  }

  /**
   * One line per choice, numbered from 1
   */
  displayNumberedList(labels: string[]): void {
    labels.forEach((label, index) => {
      log(`  ${chalk.cyan(`${index + 1})`)} ${label}`)
    })
  }

  displayError(message: string): void {
    log(chalk.red(message))
  }

  displayWarning(message: string): void {
    log(chalk.yellow(message))
  }

  displayInfo(message: string): void {
    log(chalk.blue(message))
  }

  displayGrey(message: string): void {
    log(chalk.gray(message))
  }

  displayVerbose(message: string): void {
    if (this.isVerbose) {
      log(chalk.gray(`[Verbose] ${message}`))
    }
  }

  // Method aliases for convenience
  error = this.displayError.bind(this)
  warning = this.displayWarning.bind(this)
  info = this.displayInfo.bind(this)
  verbose = this.displayVerbose.bind(this)

  displayBoxedSelection(selection: ResolvedSelection, resume: boolean): void {
    const { apiKey, model } = selection
    const details = [
      `${chalk.bold(this.t('labelName'))} ${chalk.cyan(apiKey.name)}`,
      `${chalk.bold(this.t('labelBaseURL'))} ${chalk.white(apiKey.baseURL)}`,
      `${chalk.bold(this.t('labelApiKey'))} ${chalk.white(maskSecret(apiKey.key))}`,
      `${chalk.bold(this.t('labelModel'))} ${chalk.white(model.id)}`,
      `${chalk.bold(this.t('labelResume'))} ${chalk.white(resume ? this.t('yes') : this.t('no'))}`,
    ]

    log(boxen(details.join('\n'), {
      title: this.t('usingConfiguration'),
      titleAlignment: 'center',
      padding: 1,
      borderStyle: 'round',
      borderColor: 'cyan',
    }))
    log()
  }
}
