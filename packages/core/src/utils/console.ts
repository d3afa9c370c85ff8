import chalk from 'chalk';

// Message type enum for categorizing messages
export enum MessageType {
  INFO = 'info',
  SUCCESS = 'success',
  WARNING = 'warning',
  ERROR = 'error'
}

// Exported for testing purposes only - allows tests to reference icons without hardcoding values
export const MESSAGE_ICONS = {
  INFO: 'ℹ',
  SUCCESS: '✓',
  WARNING: '⚠',
  ERROR: '✖'
} as const;

interface MessageFormat {
  icon: string;
  color: (text: string) => string;
}

const MESSAGE_FORMATS: Record<MessageType, MessageFormat> = {
  [MessageType.INFO]: { icon: MESSAGE_ICONS.INFO, color: chalk.blueBright },
  [MessageType.SUCCESS]: { icon: MESSAGE_ICONS.SUCCESS, color: chalk.greenBright },
  [MessageType.WARNING]: { icon: MESSAGE_ICONS.WARNING, color: chalk.yellowBright },
  [MessageType.ERROR]: { icon: MESSAGE_ICONS.ERROR, color: chalk.redBright }
};

const ICON_SPACING = '  '; // Two spaces after icon

/**
 * Formats a message with the icon for its type. Only the icon is colored,
 * the text keeps the default terminal color.
 */
export function formatMessage(message: string, type: MessageType): string {
  const format = MESSAGE_FORMATS[type];
  return `${format.color(format.icon)}${ICON_SPACING}${message}`;
}

/**
 * Outputs an info message to stderr.
 *
 * @param message - The message text to log.
 */
export function logInfo(message: string): void {
  console.error(formatMessage(message, MessageType.INFO));
}

/**
 * Outputs a success message to stderr.
 *
 * @param message - The message text to log.
 */
export function logSuccess(message: string): void {
  console.error(formatMessage(message, MessageType.SUCCESS));
}

/**
 * Outputs a warning message to stderr.
 *
 * @param message - The message text to log.
 */
export function logWarning(message: string): void {
  console.error(formatMessage(message, MessageType.WARNING));
}

/**
 * Outputs an error message to stderr. Used for per-sample failures and fatal
 * errors before the process exits.
 *
 * @param message - The message text to log.
 */
export function logError(message: string): void {
  console.error(formatMessage(message, MessageType.ERROR));
}

/**
 * Writes raw text to stderr without icon or color.
 * Kept apart from the CLI so core modules can use it without circular imports.
 */
export function writeStderr(message: string): void {
  process.stderr.write(message);
}
