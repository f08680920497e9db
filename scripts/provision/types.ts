import type { StreamResult } from '../lib/process.js';
import type { ProvisionLogger } from './logger.js';
import type { Transcript } from './transcript.js';

export type StepId =
  | 'install-vcs'
  | 'install-runtime'
  | 'upgrade-installer'
  | 'install-library'
  | 'enter-home'
  | 'clone-repo'
  | 'chown-repo';

export type EchoAction = { kind: 'echo'; message: string };

export type ChdirAction = { kind: 'chdir'; path: string };

export type ExecAction = {
  kind: 'exec';
  file: string;
  args: string[];
  // Best effort: a non-zero exit is logged and the step goes on.
  tolerateFailure?: boolean;
};

export type ProvisionAction = EchoAction | ChdirAction | ExecAction;

export type ProvisionStep = {
  id: StepId;
  title: string;
  actions: ProvisionAction[];
};

export type ProvisionPlan = {
  startMessage: string;
  completionMessage: string;
  steps: ProvisionStep[];
};

/**
 * Runs one program to completion, forwarding its combined output.
 */
export type CommandExecutor = (
  action: ExecAction,
  opts: { cwd: string; onOutput: (chunk: string) => void }
) => Promise<StreamResult>;

export type ProvisionContext = {
  cwd: string;
  dryRun: boolean;
  exec: CommandExecutor;
  transcript: Transcript;
  logger: ProvisionLogger;
};

export type StepOutcome =
  | { status: 'ok'; tolerated: string[] }
  | { status: 'failed'; error: string; exitCode: number };

export type RunProvisionResult =
  | { status: 'completed' }
  | { status: 'failed'; stepId: StepId; error: string; exitCode: number };
