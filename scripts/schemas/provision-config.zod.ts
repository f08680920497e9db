/**
 * Zod schema for the optional `provision.config.yml`.
 *
 * Notes:
 * - Every field has a default, so an empty document (or no file at all) yields the stock
 *   Amazon Linux 2023 procedure.
 * - Unknown keys are stripped.
 */
import { z } from 'zod';

const nonEmpty = z.string().trim().min(1);

const PackagesSchema = z
  .object({
    // Version-control client, installed first.
    vcs: nonEmpty.default('git'),
    // Language runtime that ships the package installer.
    runtime: nonEmpty.default('python3')
  })
  .default({});

const RuntimeSchema = z
  .object({
    command: nonEmpty.default('python3')
  })
  .default({});

/**
 * The library installed through the runtime's package installer.
 *
 * `ignoreInstalled` lists packages reinstalled over whatever the OS image already ships.
 */
const LibrarySchema = z
  .object({
    name: nonEmpty.default('yfinance'),
    ignoreInstalled: z.array(nonEmpty).default(['requests'])
  })
  .default({});

const RepositorySchema = z
  .object({
    url: nonEmpty.default('https://github.com/craighillelson/sp500-cli.git'),
    homeDir: nonEmpty.default('/home/ec2-user')
  })
  .default({});

const OwnerSchema = z
  .object({
    user: nonEmpty.default('ec2-user'),
    group: nonEmpty.default('ec2-user')
  })
  .default({});

export const ProvisionConfigSchema = z.object({
  logFile: nonEmpty.default('/var/log/user-data.log'),
  eventsFile: nonEmpty.default('/var/log/user-data.events.jsonl'),
  packageManager: nonEmpty.default('dnf'),
  packages: PackagesSchema,
  runtime: RuntimeSchema,
  library: LibrarySchema,
  repository: RepositorySchema,
  owner: OwnerSchema
});

export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;
export type ProvisionConfigInput = z.input<typeof ProvisionConfigSchema>;
