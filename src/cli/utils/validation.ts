import chalk from 'chalk';

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Validate a non-negative decimal such as 2000 or 0.25
 * @param value Raw option value
 * @param fieldName Name of the field for error messages
 * @returns Trimmed decimal string
 */
export function validateDecimal(value: string, fieldName: string): string {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    console.error(chalk.red(`❌ ${fieldName} must be a decimal number, got "${value}"`));
    process.exit(1);
  }
  return trimmed;
}

/**
 * Validate a decimal that must be greater than zero
 */
export function validatePositiveDecimal(value: string, fieldName: string): string {
  const decimal = validateDecimal(value, fieldName);
  if (/^0+(\.0+)?$/.test(decimal)) {
    console.error(chalk.red(`❌ ${fieldName} must be greater than zero`));
    process.exit(1);
  }
  return decimal;
}

/**
 * Validate positive integer
 * @param value Value to validate
 * @param fieldName Name of the field for error messages
 * @returns Valid positive integer
 */
export function validatePositiveInteger(value: string, fieldName: string): number {
  const num = Number(value);

  if (!Number.isInteger(num) || num <= 0) {
    console.error(chalk.red(`❌ ${fieldName} must be a positive whole number`));
    process.exit(1);
  }

  return num;
}
