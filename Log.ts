// Log.ts
// ======
// Console output helpers shared by the gchat modules.

export const DIM    = '\x1b[2m';
export const BOLD   = '\x1b[1m';
export const RED    = '\x1b[31m';
export const GREEN  = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RESET  = '\x1b[0m';

const PREFIX = '[gchat]';

// Logging
// -------

// Prints a prefixed status message
export function logStep(message: string): void {
  console.log(`${PREFIX} ${message}`);
}

// Prints a dimmed detail line (payload previews, token counts)
export function logDetail(message: string): void {
  console.log(`${DIM}${PREFIX} ${message}${RESET}`);
}

// Prints a non-fatal warning
export function logWarn(message: string): void {
  console.warn(`${YELLOW}${PREFIX} ${message}${RESET}`);
}

// Prints an error without stopping the process
export function logError(message: string): void {
  console.error(`${RED}${PREFIX} ${message}${RESET}`);
}

// Errors
// ------

// Converts unknown errors to readable strings
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Reads the errno code off a filesystem error, if any
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
