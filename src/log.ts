import pino from 'pino';

export const log = pino({
  name: 'piper-tts-gateway',
  level: process.env.LOG_LEVEL && process.env.LOG_LEVEL.trim() !== '' ? process.env.LOG_LEVEL : 'info',
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof log;

export function previewText(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
