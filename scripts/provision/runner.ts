import fs from 'node:fs';
import path from 'node:path';
import { symbols, formatCommand } from '../utils.js';
import type {
  ExecAction,
  ProvisionContext,
  ProvisionPlan,
  ProvisionStep,
  RunProvisionResult,
  StepOutcome
} from './types.js';

type ExecOutcome = { ok: true } | { ok: false; exitCode: number; error: string };

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

async function runExec(action: ExecAction, ctx: ProvisionContext): Promise<ExecOutcome> {
  const command = formatCommand(action.file, action.args);
  if (ctx.dryRun) {
    ctx.transcript.line(`[dry-run] ${command}`, 'blue');
    return { ok: true };
  }

  try {
    const res = await ctx.exec(action, { cwd: ctx.cwd, onOutput: ctx.transcript.write });
    if (res.ok) return { ok: true };
    return {
      ok: false,
      exitCode: res.exitCode === 0 ? 1 : res.exitCode,
      error: res.error ?? `${command} exited with code ${res.exitCode}`
    };
  } catch (e) {
    return { ok: false, exitCode: 1, error: `${command}: ${errorMessage(e)}` };
  }
}

/**
 * Run one step's actions in order. The first fatal action ends the step.
 */
export async function runStep(step: ProvisionStep, ctx: ProvisionContext): Promise<StepOutcome> {
  const tolerated: string[] = [];

  for (const action of step.actions) {
    switch (action.kind) {
      case 'echo':
        ctx.transcript.line(action.message);
        break;

      case 'chdir': {
        const target = path.resolve(ctx.cwd, action.path);
        if (ctx.dryRun) {
          ctx.transcript.line(`[dry-run] cd ${target}`, 'blue');
        } else if (!isDirectory(target)) {
          return { status: 'failed', error: `cd: ${target}: No such directory`, exitCode: 1 };
        }
        ctx.cwd = target;
        break;
      }

      case 'exec': {
        const res = await runExec(action, ctx);
        if (res.ok) break;
        if (action.tolerateFailure) {
          tolerated.push(res.error);
          ctx.logger.event('provision.action.tolerated', { stepId: step.id, error: res.error });
          ctx.transcript.line(`${symbols.warning} ${res.error} (ignored)`, 'yellow');
          break;
        }
        return { status: 'failed', error: res.error, exitCode: res.exitCode };
      }
    }
  }

  return { status: 'ok', tolerated };
}

/**
 * Execute the plan top to bottom and stop at the first failed step.
 *
 * Nothing is retried or rolled back: a failed run leaves the machine as far as it got.
 */
export async function runProvision(plan: ProvisionPlan, ctx: ProvisionContext): Promise<RunProvisionResult> {
  ctx.logger.event('provision.start', { cwd: ctx.cwd, dryRun: ctx.dryRun, logFile: ctx.transcript.filePath });
  ctx.transcript.line(plan.startMessage);

  for (const [idx, step] of plan.steps.entries()) {
    const stepNum = idx + 1;
    ctx.logger.event('provision.step.start', { stepId: step.id, stepNum, title: step.title });

    const outcome = await runStep(step, ctx);

    if (outcome.status === 'ok') {
      ctx.logger.event('provision.step.ok', { stepId: step.id, stepNum, tolerated: outcome.tolerated.length });
      continue;
    }

    ctx.logger.event('provision.step.failed', {
      stepId: step.id,
      stepNum,
      error: outcome.error,
      exitCode: outcome.exitCode
    });
    ctx.transcript.line(`${symbols.error} ${step.title} failed: ${outcome.error}`, 'red');
    return { status: 'failed', stepId: step.id, error: outcome.error, exitCode: outcome.exitCode };
  }

  ctx.logger.event('provision.completed', {});
  ctx.transcript.line(plan.completionMessage, 'green');
  return { status: 'completed' };
}

export function exitCodeFor(result: RunProvisionResult): number {
  return result.status === 'completed' ? 0 : result.exitCode;
}
