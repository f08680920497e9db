/**
 * End-to-end test of the CLI entry point in dry-run mode
 */

import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import path from 'path';
import { main } from '../../scripts/provision.js';
import { cleanupTempDir, createTempDir, readEvents } from './helpers.js';

describe('vm-provision', () => {
  let tempDir: string;
  let configFile: string;

  beforeEach(async () => {
    tempDir = await createTempDir('vm-provision-cli-');
    configFile = path.join(tempDir, 'provision.config.yml');
    await fs.writeFile(
      configFile,
      [
        `logFile: ${path.join(tempDir, 'user-data.log')}`,
        `eventsFile: ${path.join(tempDir, 'user-data.events.jsonl')}`,
        'repository:',
        '  url: https://example.com/org/tool.git',
        '  homeDir: /home/builder',
        'owner:',
        '  user: builder',
        '  group: staff',
        ''
      ].join('\n'),
      'utf8'
    );
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  test('dry run exits 0 and logs the whole procedure', async () => {
    const code = await main(['node', 'vm-provision', '--dry-run', '--config', configFile]);

    assert.strictEqual(code, 0);
    const log = await fs.readFile(path.join(tempDir, 'user-data.log'), 'utf8');
    assert.deepStrictEqual(log.split('\n'), [
      'Starting user data script...',
      '[dry-run] dnf install git -y',
      '[dry-run] dnf install python3 -y',
      '[dry-run] python3 -m ensurepip --upgrade',
      '[dry-run] python3 -m pip install --upgrade pip',
      'Installing yfinance...',
      '[dry-run] python3 -m pip install yfinance --ignore-installed requests',
      'Cloning repository...',
      '[dry-run] cd /home/builder',
      '[dry-run] git clone https://example.com/org/tool.git',
      '[dry-run] chown -R builder:staff /home/builder/tool',
      'User data script completed successfully',
      ''
    ]);

    const events = await readEvents(path.join(tempDir, 'user-data.events.jsonl'));
    assert.strictEqual(events[0].msg, 'provision.start');
    assert.strictEqual(events[0].dryRun, true);
  });

  test('--log-file redirects the transcript', async () => {
    const logFile = path.join(tempDir, 'other', 'run.log');
    const code = await main(['node', 'vm-provision', '--dry-run', '--config', configFile, '--log-file', logFile]);

    assert.strictEqual(code, 0);
    const log = await fs.readFile(logFile, 'utf8');
    assert.ok(log.endsWith('User data script completed successfully\n'));
  });

  test('an invalid config rejects before anything runs', async () => {
    await fs.writeFile(configFile, 'packageManager: ""\n', 'utf8');

    await assert.rejects(main(['node', 'vm-provision', '--config', configFile]), {
      message: `Invalid provision config ${configFile}: packageManager: String must contain at least 1 character(s)`
    });
  });
});
