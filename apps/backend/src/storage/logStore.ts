import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import crypto from 'node:crypto';
import type { GovernanceEvent, LogEvent, LogLevel, LogEventType } from '@veto-governor/shared';

// ─── Config ──────────────────────────────────────────────

function logDir(): string {
  return process.env.LOG_STORE_PATH || join(process.cwd(), '.data');
}

function logFile(): string {
  return join(logDir(), 'logs.jsonl');
}

function ensureDir(): void {
  const dir = logDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/** JSON replacer: bigints are written as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

// ─── Public API ──────────────────────────────────────────

export function appendLog(event: LogEvent): void {
  ensureDir();
  appendFileSync(logFile(), JSON.stringify(event, bigintReplacer) + '\n', 'utf-8');
}

export function createLogEvent(
  type: LogEventType,
  payload: unknown,
  level: LogLevel = 'INFO',
): LogEvent {
  return {
    id: crypto.randomUUID(),
    timestamp: Date.now(),
    type,
    payload,
    level,
  };
}

/** Level a governance event is logged at; a bounced withdraw is a warning. */
export function levelFor(event: GovernanceEvent): LogLevel {
  if (event.type === 'Withdraw' && !event.sent) return 'WARN';
  return 'INFO';
}

/** Default engine event sink: one log line per governance event. */
export function logGovernanceEvent(event: GovernanceEvent): void {
  appendLog(createLogEvent(event.type, event, levelFor(event)));
}

const LEVELS: ReadonlySet<unknown> = new Set<LogLevel>(['INFO', 'WARN', 'ERROR']);

function isLogEvent(value: unknown): value is LogEvent {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.id === 'string' &&
    typeof v.timestamp === 'number' &&
    typeof v.type === 'string' &&
    LEVELS.has(v.level) &&
    'payload' in v
  );
}

export function readLatest(limit = 100): LogEvent[] {
  ensureDir();
  const file = logFile();
  if (!existsSync(file)) return [];

  const lines = readFileSync(file, 'utf-8')
    .split('\n')
    .filter(Boolean);

  const start = Math.max(0, lines.length - limit);
  const events: LogEvent[] = [];
  for (let i = start; i < lines.length; i++) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(lines[i]);
    } catch {
      parsed = undefined;
    }
    if (isLogEvent(parsed)) {
      events.push(parsed);
    } else {
      console.warn(`[logStore] skipping malformed line ${i + 1}`);
    }
  }
  return events;
}
