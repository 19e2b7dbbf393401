import chalk from 'chalk';
import { isGridBotError } from '../../core/errors';

/**
 * Handle CLI errors with consistent formatting
 * @param error Error object or message
 * @param context Context where the error occurred
 */
export function handleError(error: unknown, context?: string): never {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const contextStr = context ? ` [${context}]` : '';
  const codeStr = isGridBotError(error) ? ` (${error.code})` : '';

  console.error(chalk.red(`❌ Error${contextStr}${codeStr}: ${errorMessage}`));

  if (process.env.NODE_ENV === 'development' && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }

  process.exit(1);
}

/**
 * Handle async command execution with error handling
 * @param fn Async function to execute
 * @param context Context for error handling
 */
export async function executeCommand(fn: () => Promise<void>, context: string): Promise<void> {
  try {
    await fn();
  } catch (error) {
    handleError(error, context);
  }
}

export function showSuccess(message: string): void {
  console.log(chalk.green(`✅ ${message}`));
}

export function showInfo(message: string): void {
  console.log(chalk.blue(`ℹ️  ${message}`));
}

/**
 * Lays rows out as a table, one string per line. Cells wider than 20
 * characters are cut.
 */
export function renderTable(data: Record<string, string>[], headers?: string[]): string[] {
  if (data.length === 0) {
    return [];
  }

  const keys = headers ?? Object.keys(data[0]);
  const columnWidths = keys.map(key => {
    const maxWidth = Math.max(key.length, ...data.map(row => (row[key] ?? '').length));
    return Math.min(maxWidth, 20);
  });

  const lines = [keys.map((key, i) => chalk.bold(key.padEnd(columnWidths[i]))).join(' │ ')];
  lines.push(columnWidths.map(width => '─'.repeat(width)).join('─┼─'));

  for (const row of data) {
    lines.push(
      keys
        .map((key, i) => {
          let value = row[key] ?? '';
          if (value.length > columnWidths[i]) {
            value = value.substring(0, columnWidths[i] - 3) + '...';
          }
          return value.padEnd(columnWidths[i]);
        })
        .join(' │ ')
    );
  }
  return lines;
}
