import path from 'node:path';
import type { ProvisionConfig } from '../schemas/provision-config.zod.js';
import type { ProvisionPlan } from './types.js';

export const START_MESSAGE = 'Starting user data script...';
export const COMPLETION_MESSAGE = 'User data script completed successfully';

/**
 * Directory name `git clone <url>` picks when no destination is given:
 * the last path segment, without a trailing slash or `.git`.
 */
export function cloneDirName(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '').replace(/\.git$/, '').replace(/\/+$/, '');
  const segment = trimmed.split(/[/:]/).pop() ?? '';
  if (!segment) {
    throw new Error(`Cannot derive a directory name from repository URL: ${url}`);
  }
  return segment;
}

export function cloneTargetDir(config: ProvisionConfig): string {
  return path.posix.join(config.repository.homeDir, cloneDirName(config.repository.url));
}

export function buildProvisionPlan(config: ProvisionConfig): ProvisionPlan {
  const pm = config.packageManager;
  const py = config.runtime.command;
  const { library, repository, owner } = config;

  const ignoreInstalled = library.ignoreInstalled.length > 0
    ? ['--ignore-installed', ...library.ignoreInstalled]
    : [];

  return {
    startMessage: START_MESSAGE,
    completionMessage: COMPLETION_MESSAGE,
    steps: [
      {
        id: 'install-vcs',
        title: `Install ${config.packages.vcs}`,
        actions: [{ kind: 'exec', file: pm, args: ['install', config.packages.vcs, '-y'] }]
      },
      {
        id: 'install-runtime',
        title: `Install ${config.packages.runtime}`,
        actions: [{ kind: 'exec', file: pm, args: ['install', config.packages.runtime, '-y'] }]
      },
      {
        id: 'upgrade-installer',
        title: 'Bootstrap and upgrade pip',
        actions: [
          { kind: 'exec', file: py, args: ['-m', 'ensurepip', '--upgrade'], tolerateFailure: true },
          { kind: 'exec', file: py, args: ['-m', 'pip', 'install', '--upgrade', 'pip'] }
        ]
      },
      {
        id: 'install-library',
        title: `Install ${library.name}`,
        actions: [
          { kind: 'echo', message: `Installing ${library.name}...` },
          { kind: 'exec', file: py, args: ['-m', 'pip', 'install', library.name, ...ignoreInstalled] }
        ]
      },
      {
        id: 'enter-home',
        title: `Enter ${repository.homeDir}`,
        actions: [
          { kind: 'echo', message: 'Cloning repository...' },
          { kind: 'chdir', path: repository.homeDir }
        ]
      },
      {
        id: 'clone-repo',
        title: `Clone ${repository.url}`,
        actions: [{ kind: 'exec', file: 'git', args: ['clone', repository.url] }]
      },
      {
        id: 'chown-repo',
        title: `Hand ${cloneDirName(repository.url)} to ${owner.user}`,
        actions: [
          { kind: 'exec', file: 'chown', args: ['-R', `${owner.user}:${owner.group}`, cloneTargetDir(config)] }
        ]
      }
    ]
  };
}
