import { isDebugEnabled } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export function logEvent(level: LogLevel, event: string, detail: Record<string, unknown> = {}) {
  if (level === 'debug' && !isDebugEnabled()) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    event,
    ...detail,
  };
  const line = JSON.stringify(payload);
  if (level === 'error') {
    console.error(line);
    return;
  }
  if (level === 'warn') {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}
