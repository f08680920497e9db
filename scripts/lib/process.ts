import os from 'node:os';
import { execa, type Options as ExecaOptions } from 'execa';

export type ExecOptions = ExecaOptions<string>;

export type ExecResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type StreamResult = {
  ok: boolean;
  exitCode: number;
  // Set when the process never ran (spawn error) or was killed by a signal.
  error?: string;
};

/**
 * Shell-style status for a signal death: 128 + signal number (SIGTERM → 143).
 */
export function signalExitCode(signal: string): number {
  const signals: Record<string, number | undefined> = { ...os.constants.signals };
  const signo = signals[signal];
  return typeof signo === 'number' ? 128 + signo : 1;
}

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

export async function execCmd(
  file: string,
  args: string[] = [],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const res = await execa(file, args, {
    encoding: 'utf8',
    reject: false,
    ...options
  });

  return {
    ok: (res.exitCode ?? 1) === 0,
    exitCode: res.exitCode ?? 1,
    stdout: normalizeText(res.stdout),
    stderr: normalizeText(res.stderr)
  };
}

/**
 * Run a program and forward its combined stdout/stderr, chunk by chunk, as it arrives.
 *
 * Output is not buffered for the caller: everything goes through `onOutput`.
 */
export async function execStreaming(
  file: string,
  args: string[],
  onOutput: (chunk: string) => void,
  options: { cwd?: string } = {}
): Promise<StreamResult> {
  const child = execa(file, args, {
    encoding: 'utf8',
    reject: false,
    all: true,
    buffer: false,
    stdin: 'ignore',
    cwd: options.cwd
  });

  // execa skips `encoding` when not buffering; decode here so split UTF-8 sequences survive.
  child.all?.setEncoding('utf8');
  child.all?.on('data', (chunk: string) => onOutput(chunk));

  const res = await child;
  if (res.signal) {
    return { ok: false, exitCode: signalExitCode(res.signal), error: `${file} was killed by ${res.signal}` };
  }
  // execa leaves exitCode unset when the program could not be spawned at all.
  if (typeof res.exitCode !== 'number') {
    return { ok: false, exitCode: 1, error: `Failed to run ${file}` };
  }
  return { ok: res.exitCode === 0, exitCode: res.exitCode };
}
