import { format } from 'date-fns';
import { z } from 'zod';

/**
 * Shape of one entry written by AppLogger.
 */
const logEntrySchema = z.object({
  time: z.string(),
  level: z.string(),
  msg: z.string(),
  context: z.string().optional(),
});

/**
 * Render a log-file line as "yyyy-MM-dd HH:mm:ss - LEVEL - [Context] message".
 * Lines that are not log entries are returned unchanged.
 */
export function formatLogLine(line: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line;
  }

  const result = logEntrySchema.safeParse(parsed);
  if (!result.success) return line;

  const { time, level, msg, context } = result.data;
  const at = new Date(time);
  const timestamp = Number.isNaN(at.getTime()) ? time : format(at, 'yyyy-MM-dd HH:mm:ss');

  return `${timestamp} - ${level.toUpperCase()} - ${context ? `[${context}] ` : ''}${msg}`;
}
