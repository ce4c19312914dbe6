import chalk from 'chalk';
import type { ValidationError, ValidationErrors } from '../../compose/utils/errors';

const formatError = (error: ValidationError, lines: string[]): string[] => {
  const output: string[] = [];
  const line = error.row ? lines[error.row - 1] : undefined;
  if (error.row && line !== undefined) {
    output.push(`${chalk.red('›')} ${chalk.gray(`${error.row} |`)} ${chalk.cyan(line)}`);
  }
  output.push(chalk.red(`  ${error.path || '<root>'}: ${error.message}`));
  return output;
};

/**
 * Prints each validation error under the source line it was found on. Errors without a known row
 * are printed by path alone.
 */
export const prettyValidationErrors = (error: ValidationErrors): void => {
  const lines = error.file ? error.file.contents.split('\n') : [];
  const sorted = [...error.errors].sort((a, b) => (a.row || 0) - (b.row || 0));

  console.error(chalk.red(error.name));
  for (const validation_error of sorted) {
    console.error(formatError(validation_error, lines).join('\n'));
  }
};
