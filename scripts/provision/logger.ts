import fs from 'node:fs';
import path from 'node:path';
import type { StepId } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Every event a provisioning run records, with the fields it carries.
 */
export type ProvisionEventFields = {
  'provision.start': { cwd: string; dryRun: boolean; logFile: string };
  'provision.step.start': { stepId: StepId; stepNum: number; title: string };
  'provision.action.tolerated': { stepId: StepId; error: string };
  'provision.step.ok': { stepId: StepId; stepNum: number; tolerated: number };
  'provision.step.failed': { stepId: StepId; stepNum: number; error: string; exitCode: number };
  'provision.completed': Record<string, never>;
};

export type ProvisionEvent = keyof ProvisionEventFields;

const EVENT_LEVELS: Record<ProvisionEvent, LogLevel> = {
  'provision.start': 'info',
  'provision.step.start': 'info',
  'provision.action.tolerated': 'warn',
  'provision.step.ok': 'info',
  'provision.step.failed': 'error',
  'provision.completed': 'info'
};

export type ProvisionLogger = {
  event: <E extends ProvisionEvent>(event: E, fields: ProvisionEventFields[E]) => void;
};

function levelToNumber(level: LogLevel): number {
  // Align with pino numeric levels.
  switch (level) {
    case 'debug':
      return 20;
    case 'info':
      return 30;
    case 'warn':
      return 40;
    case 'error':
      return 50;
  }
}

/**
 * JSON-lines event log (pino line shape: `level`, `time`, `msg`, then the event's fields),
 * appended synchronously so a crash mid-run keeps every event written before it.
 */
export function createProvisionLogger(opts: { filePath: string; now?: () => number }): ProvisionLogger {
  const { filePath } = opts;
  const now = opts.now ?? Date.now;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  return {
    event: (event, fields) => {
      const line = {
        level: levelToNumber(EVENT_LEVELS[event]),
        time: now(),
        msg: event,
        ...fields
      };
      fs.appendFileSync(filePath, JSON.stringify(line) + '\n', 'utf8');
    }
  };
}
