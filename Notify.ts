// Notify.ts
// =========
// Renders the end-of-cycle notification on the terminal.

import { GREEN, RED, RESET } from './Log';

const BELL = '\x07';

export interface Notification {
  success: boolean;
  message: string;
}

export interface RenderOptions {
  bell: boolean;
  out?: { write(chunk: string): unknown };
}

// One coloured line; one bell for success, two for failure
export function renderNotification(notification: Notification, options: RenderOptions): void {
  const out = options.out ?? process.stdout;
  const color = notification.success ? GREEN : RED;
  out.write(`${color}[gchat] ${notification.message}${RESET}\n`);
  if (options.bell) {
    out.write(notification.success ? BELL : BELL + BELL);
  }
}
