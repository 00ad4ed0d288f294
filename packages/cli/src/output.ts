import chalk from 'chalk'
import { isCoreError } from '@graphweave/core'

/**
 * Output result as JSON
 */
export function outputResult(data: unknown): void {
  console.log(JSON.stringify(data, null, 2))
}

/**
 * Display an error and mark the process as failed
 */
export function handleError(error: unknown): void {
  if (isCoreError(error)) {
    console.error(chalk.red(`\nError: ${error.code}`))
    console.error(chalk.white(error.message))
    if (error.suggestion) {
      console.error(chalk.yellow(`\nSuggestion: ${error.suggestion}`))
    }
  } else if (error instanceof Error) {
    console.error(chalk.red(`\nError: ${error.message}`))
  } else {
    console.error(chalk.red('\nUnknown error occurred'))
  }
  process.exitCode = 1
}
