#!/usr/bin/env node
import getLogger, { setLogLevel } from './lib/logging';
import { ConfigError, DirectoryError } from './lib/errors';
import { describeFailure } from './lib/util';
import { loadSettings, Settings } from './lib/settings';
import GiteaPlatform from './platforms/gitea-platform';
import LdapPlatform from './platforms/ldap-platform';
import { SyncTeamsTask } from './tasks/sync-teams';
import { countProblems, formatSyncReport } from './tasks/sync-report';

const logger = getLogger('cli');

export const USAGE = 'Usage: ldap-team-sync <path/to/config.json>';

/**
 * Runs one sync pass and resolves to the process exit code.
 */
export async function main(args: string[]): Promise<number> {
  if (args.length !== 1) {
    logger.error(USAGE);
    return 1;
  }

  let settings: Settings;
  try {
    settings = await loadSettings(args[0]);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
  setLogLevel(settings.logLevel);

  const ldap = new LdapPlatform(settings.ldap);
  const gitea = new GiteaPlatform(settings.gitea);
  try {
    await ldap.connect();
  } catch (err) {
    if (err instanceof DirectoryError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }

  try {
    const start = new Date().getTime();
    const report = await new SyncTeamsTask(settings.mapping, ldap, gitea, { dryRun: settings.dryRun }).run();
    for (const line of formatSyncReport(report)) {
      logger.info(line);
    }
    logger.info('Synced %d team(s) with %d problem(s) in %dms', report.teams.length, countProblems(report), new Date().getTime() - start);
    return 0;
  } finally {
    await ldap.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error('Sync failed: %s', describeFailure(err));
      process.exitCode = 1;
    });
}
