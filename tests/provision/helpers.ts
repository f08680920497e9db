/**
 * Test helpers for provisioning tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { StreamResult } from '../../scripts/lib/process.js';
import { createProvisionLogger, type ProvisionLogger } from '../../scripts/provision/logger.js';
import { createTranscript, type Transcript } from '../../scripts/provision/transcript.js';
import type { CommandExecutor, ProvisionContext } from '../../scripts/provision/types.js';
import { formatCommand } from '../../scripts/utils.js';

export async function createTempDir(prefix = 'vm-provision-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export type FakeCall = { command: string; cwd: string };

export type FakeResponse = StreamResult & { output?: string };

/**
 * In-process stand-in for the execa executor.
 *
 * Commands not listed in `responses` succeed silently; a response of type Error is thrown.
 */
export function createFakeExecutor(responses: Record<string, FakeResponse | Error> = {}): {
  exec: CommandExecutor;
  calls: FakeCall[];
} {
  const calls: FakeCall[] = [];
  const exec: CommandExecutor = async (action, { cwd, onOutput }) => {
    const command = formatCommand(action.file, action.args);
    calls.push({ command, cwd });
    const response = responses[command];
    if (response instanceof Error) throw response;
    if (!response) return { ok: true, exitCode: 0 };
    if (response.output) onOutput(response.output);
    return { ok: response.ok, exitCode: response.exitCode, error: response.error };
  };
  return { exec, calls };
}

export type TestContext = {
  ctx: ProvisionContext;
  calls: FakeCall[];
  terminal: string[];
  transcript: Transcript;
  logger: ProvisionLogger;
  logFile: string;
  eventsFile: string;
};

export function createTestContext(
  dir: string,
  opts: { responses?: Record<string, FakeResponse | Error>; dryRun?: boolean; cwd?: string } = {}
): TestContext {
  const logFile = path.join(dir, 'log', 'user-data.log');
  const eventsFile = path.join(dir, 'log', 'user-data.events.jsonl');
  const terminal: string[] = [];
  const transcript = createTranscript(logFile, { out: { write: (chunk: string) => terminal.push(chunk) } });
  const logger = createProvisionLogger({ filePath: eventsFile, now: () => 1700000000000 });
  const { exec, calls } = createFakeExecutor(opts.responses);

  return {
    ctx: { cwd: opts.cwd ?? dir, dryRun: opts.dryRun ?? false, exec, transcript, logger },
    calls,
    terminal,
    transcript,
    logger,
    logFile,
    eventsFile
  };
}

export async function readEvents(eventsFile: string): Promise<Array<Record<string, unknown>>> {
  const text = await fs.readFile(eventsFile, 'utf8');
  return text
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => {
      const parsed: unknown = JSON.parse(line);
      assertRecord(parsed);
      return parsed;
    });
}

function assertRecord(value: unknown): asserts value is Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error(`Expected a JSON object, got ${JSON.stringify(value)}`);
  }
}
