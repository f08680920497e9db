#!/usr/bin/env node

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import { loadProvisionConfig } from './lib/config.js';
import { print, symbols } from './utils.js';
import { parseProvisionArgs } from './provision/cli-runtime.js';
import { execaExecutor } from './provision/executor.js';
import { createProvisionLogger } from './provision/logger.js';
import { buildProvisionPlan, cloneTargetDir } from './provision/plan.js';
import { exitCodeFor, runProvision } from './provision/runner.js';
import { createTranscript } from './provision/transcript.js';
import { resolveAccountIds, verifyProvisioning } from './provision/verify.js';
import type { ProvisionConfig } from './schemas/provision-config.zod.js';

async function verify(config: ProvisionConfig): Promise<number> {
  const repoDir = cloneTargetDir(config);
  const expected = await resolveAccountIds(config.owner.user, config.owner.group);
  const result = await verifyProvisioning({ repoDir, expected });

  if (!result.exists) {
    print(`${symbols.error} ${repoDir} does not exist`, 'red');
    return 1;
  }
  if (!result.isWorkingCopy) {
    print(`${symbols.error} ${repoDir} is not a git working copy`, 'red');
  }
  for (const m of result.mismatched) {
    print(`${symbols.error} ${m.path} is owned by ${m.uid}:${m.gid}`, 'red');
  }
  if (result.ok) {
    print(
      `${symbols.success} ${repoDir}: ${result.checked} entries owned by ${config.owner.user}:${config.owner.group}`,
      'green'
    );
    return 0;
  }
  return 1;
}

async function main(argv = process.argv): Promise<number> {
  const flags = parseProvisionArgs(argv);
  const config = loadProvisionConfig(flags.configPath, { logFile: flags.logFile });

  if (flags.command === 'verify') {
    return verify(config);
  }

  const transcript = createTranscript(config.logFile);
  const logger = createProvisionLogger({ filePath: config.eventsFile });
  const plan = buildProvisionPlan(config);

  const result = await runProvision(plan, {
    cwd: process.cwd(),
    dryRun: flags.dryRun,
    exec: execaExecutor,
    transcript,
    logger
  });
  return exitCodeFor(result);
}

// `bin` installs a symlink, so compare real paths.
if (process.argv[1] && fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e instanceof Error ? e.stack || e.message : String(e));
      process.exitCode = 1;
    }
  );
}

export { main };
