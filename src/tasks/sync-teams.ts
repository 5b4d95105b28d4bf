import { Logger } from "winston";
import getLogger, { LogFactory } from "../lib/logging";
import { ApiError, DirectoryError } from "../lib/errors";
import { describeError } from "../lib/util";
import { addUsernames, collectTargets, diffMembership, formatTeam, toUsernameSet } from "../model/membership";
import type { Mapping, TeamTarget, UsernameSet } from "../model/types";
import type { DirectoryReader, TeamHost } from "../platforms/types";
import type { GroupOutcome, SyncReport, TeamFailure, TeamOutcome } from "./types";

export interface SyncTeamsOptions {
  /** Compute and report changes without writing to the hosting service. */
  dryRun?: boolean;
}

function asApiError(err: unknown): ApiError {
  if (err instanceof ApiError) {
    return err;
  }
  throw err;
}

export class SyncTeamsTask {
  private readonly mapping: Mapping;
  private readonly directory: DirectoryReader;
  private readonly host: TeamHost;
  private readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(mapping: Mapping, directory: DirectoryReader, host: TeamHost, options: SyncTeamsOptions = {}, logFactory: LogFactory = getLogger) {
    this.mapping = mapping;
    this.directory = directory;
    this.host = host;
    this.dryRun = options.dryRun ?? false;
    this.logger = logFactory('sync-teams');
  }

  async run(): Promise<SyncReport> {
    const targets = collectTargets(this.mapping);
    const groups = await this.readGroups(targets);

    const teams: TeamOutcome[] = [];
    for (const target of targets) {
      teams.push(await this.syncTeam(target, groups));
    }

    return {
      dryRun: this.dryRun,
      groups: [...groups.values()],
      teams,
    };
  }

  private async readGroups(targets: TeamTarget[]): Promise<Map<string, GroupOutcome>> {
    const outcomes = new Map<string, GroupOutcome>();
    for (const group of targets.flatMap(t => t.groups)) {
      const key = group.toLowerCase();
      if (outcomes.has(key)) {
        continue;
      }

      try {
        const members = await this.directory.getGroupMembers(group);
        outcomes.set(key, { group, ok: true, members });
      } catch (err) {
        const error = err instanceof DirectoryError
          ? err
          : new DirectoryError(`Reading group '${group}' failed: ${describeError(err)}`, { group, cause: err });
        this.logger.error('%s', error.message);
        outcomes.set(key, { group, ok: false, error });
      }
    }
    return outcomes;
  }

  private async syncTeam(target: TeamTarget, groups: Map<string, GroupOutcome>): Promise<TeamOutcome> {
    const name = formatTeam(target.team);
    const outcome: TeamOutcome = { team: target.team, groups: target.groups, added: [], removed: [], kept: [], failures: [] };

    const desired: UsernameSet = new Map();
    const failedGroups: string[] = [];
    for (const group of target.groups) {
      const result = groups.get(group.toLowerCase());
      if (result && result.ok) {
        addUsernames(desired, result.members);
      } else {
        failedGroups.push(group);
      }
    }

    let current: UsernameSet;
    try {
      current = toUsernameSet(await this.host.getTeamMembers(target.team));
    } catch (err) {
      const error = asApiError(err);
      this.logger.error('Reading members of %s failed: %s', name, error.message);
      outcome.failures.push({ action: 'list', error });
      return outcome;
    }

    const changes = diffMembership(desired, current);
    let toRemove = changes.toRemove;
    if (failedGroups.length && toRemove.length) {
      this.logger.warn('Keeping %d member(s) of %s because group(s) %s could not be read', toRemove.length, name, failedGroups.join(', '));
      outcome.kept = toRemove;
      toRemove = [];
    }

    for (const username of changes.toAdd) {
      const failure = await this.apply('add', target, username);
      if (failure) {
        outcome.failures.push(failure);
      } else {
        outcome.added.push(username);
      }
    }
    for (const username of toRemove) {
      const failure = await this.apply('remove', target, username);
      if (failure) {
        outcome.failures.push(failure);
      } else {
        outcome.removed.push(username);
      }
    }

    if (!changes.toAdd.length && !toRemove.length) {
      this.logger.debug('%s is up to date (%d members)', name, changes.unchanged.length);
    }
    return outcome;
  }

  private async apply(action: 'add' | 'remove', target: TeamTarget, username: string): Promise<TeamFailure | undefined> {
    const name = formatTeam(target.team);
    if (this.dryRun) {
      this.logger.info(`[dry run] Would ${action} user '%s' ${action === 'add' ? 'to' : 'from'} %s`, username, name);
      return undefined;
    }

    try {
      if (action === 'add') {
        await this.host.addTeamMember(target.team, username);
        this.logger.info(`User '%s' added to %s`, username, name);
      } else {
        await this.host.removeTeamMember(target.team, username);
        this.logger.info(`User '%s' removed from %s`, username, name);
      }
      return undefined;
    } catch (err) {
      const error = asApiError(err);
      this.logger.warn(`Could not ${action} user '%s' ${action === 'add' ? 'to' : 'from'} %s: %s`, username, name, error.message);
      return { action, username, error };
    }
  }
}
