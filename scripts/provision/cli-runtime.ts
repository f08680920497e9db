import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

export type ProvisionCommand = 'run' | 'verify';

export type ProvisionCliFlags = {
  command: ProvisionCommand;
  configPath?: string;
  logFile?: string;
  dryRun: boolean;
};

export function parseProvisionArgs(argv: string[]): ProvisionCliFlags {
  const parsed = yargs(hideBin(argv))
    .scriptName('vm-provision')
    .command('$0', 'Provision this machine (default)')
    .command('run', 'Provision this machine')
    .command('verify', 'Check that the cloned repository exists and is owned by the target account')
    .option('config', { type: 'string', description: 'Path to a provision.config.yml overriding the defaults' })
    .option('log-file', { type: 'string', description: 'Write the run transcript here instead of the configured log file' })
    .option('dry-run', {
      type: 'boolean',
      default: false,
      description: 'Print the commands without running them'
    })
    .strict()
    .help()
    .fail((msg, err) => {
      throw err ?? new Error(msg);
    })
    .parseSync();

  const [first] = parsed._;
  return {
    command: first === 'verify' ? 'verify' : 'run',
    configPath: parsed.config,
    logFile: parsed['log-file'],
    dryRun: parsed['dry-run']
  };
}
