import { format } from 'util';

const TAG = '[EPG]';

function debugEnabled(): boolean {
  const v = (process.env.EPG_DEBUG || '').toLowerCase();
  return v === '1' || v === 'true';
}

export const log = {
  info(message: string, ...args: unknown[]): void {
    console.log(TAG, format(message, ...args));
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(TAG, format(message, ...args));
  },
  error(message: string, ...args: unknown[]): void {
    console.error(TAG, format(message, ...args));
  },
  debug(message: string, ...args: unknown[]): void {
    if (!debugEnabled()) return;
    console.log(TAG, format(message, ...args));
  },
};
