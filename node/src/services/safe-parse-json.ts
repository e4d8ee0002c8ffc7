/**
 * JSON parse for text-model output: strips markdown fences and retries with
 * single quotes normalized. Returns null when no JSON object can be read.
 */
import { logger } from '@/services/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function stripFences(raw: string): string {
  const txt = raw.trim();
  if (!txt.startsWith('```')) return txt;

  const firstNewline = txt.indexOf('\n');
  const lastFence = txt.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return txt.slice(firstNewline + 1, lastFence).trim();
  }
  return txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
}

export function safeParseJson(raw: string, context: string): Record<string, unknown> | null {
  const txt = stripFences(raw);

  const parsed = tryParse(txt);
  if (isRecord(parsed)) return parsed;

  const normalized = tryParse(txt.replace(/'/g, '"'));
  if (isRecord(normalized)) return normalized;

  logger.warn('safeParseJson:parse_error', { context, raw: txt.slice(0, 300) });
  return null;
}
