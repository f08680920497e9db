import fs from 'node:fs/promises';
import path from 'node:path';
import { execCmd, type ExecResult } from '../lib/process.js';

export type AccountIds = { uid: number; gid: number };

export type OwnershipMismatch = {
  path: string;
  uid: number;
  gid: number;
};

export interface VerifyResult {
  ok: boolean;
  repoDir: string;
  exists: boolean;
  isWorkingCopy: boolean;
  expected: AccountIds;
  checked: number;
  mismatched: OwnershipMismatch[];
}

export type IdLookup = (file: string, args: string[]) => Promise<ExecResult>;

function parseId(raw: string, what: string): number {
  const value = Number.parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value)) {
    throw new Error(`Unexpected ${what}: ${JSON.stringify(raw)}`);
  }
  return value;
}

/**
 * Resolve the numeric uid of `user` and gid of `group` on this machine.
 */
export async function resolveAccountIds(
  user: string,
  group: string,
  run: IdLookup = (file, args) => execCmd(file, args)
): Promise<AccountIds> {
  const uidRes = await run('id', ['-u', user]);
  if (!uidRes.ok) {
    throw new Error(`Unknown user ${user}: ${uidRes.stderr || `id exited with code ${uidRes.exitCode}`}`);
  }

  // getent prints `name:password:gid:members`
  const groupRes = await run('getent', ['group', group]);
  if (!groupRes.ok) {
    throw new Error(`Unknown group ${group}`);
  }
  const gidField = groupRes.stdout.split('\n')[0]?.split(':')[2] ?? '';

  return {
    uid: parseId(uidRes.stdout, `uid for ${user}`),
    gid: parseId(gidField, `gid for ${group}`)
  };
}

async function walkOwnership(
  entry: string,
  expected: AccountIds,
  acc: { checked: number; mismatched: OwnershipMismatch[] }
): Promise<void> {
  const st = await fs.lstat(entry);
  acc.checked += 1;
  if (st.uid !== expected.uid || st.gid !== expected.gid) {
    acc.mismatched.push({ path: entry, uid: st.uid, gid: st.gid });
  }
  if (!st.isDirectory()) return;

  const children = await fs.readdir(entry);
  children.sort();
  for (const child of children) {
    await walkOwnership(path.join(entry, child), expected, acc);
  }
}

/**
 * Check a finished run: the clone exists, is a git working copy, and every entry in it
 * (symlinks themselves, not their targets) belongs to the expected account.
 */
export async function verifyProvisioning(params: { repoDir: string; expected: AccountIds }): Promise<VerifyResult> {
  const { repoDir, expected } = params;
  const result: VerifyResult = {
    ok: false,
    repoDir,
    exists: false,
    isWorkingCopy: false,
    expected,
    checked: 0,
    mismatched: []
  };

  try {
    result.exists = (await fs.stat(repoDir)).isDirectory();
  } catch {
    return result;
  }
  if (!result.exists) return result;

  try {
    await fs.stat(path.join(repoDir, '.git'));
    result.isWorkingCopy = true;
  } catch {
    result.isWorkingCopy = false;
  }

  await walkOwnership(repoDir, expected, result);
  result.ok = result.isWorkingCopy && result.mismatched.length === 0;
  return result;
}
