import winston from 'winston';
import { ApiError, DirectoryError } from '../lib/errors';
import { formatTeam, teamKey } from '../model/membership';
import type { LogFactory } from '../lib/logging';
import type { TeamRef } from '../model/types';
import type { DirectoryReader, TeamHost } from '../platforms/types';

export const silentLogger = winston.createLogger({ silent: true });
export const silentLogFactory: LogFactory = () => silentLogger;

export function team(text: string): TeamRef {
  const [organization, name] = text.split('/');
  return { organization, team: name };
}

export class FakeDirectory implements DirectoryReader {
  readonly lookups: string[] = [];
  readonly failing = new Set<string>();

  constructor(private readonly groups: Record<string, string[]>) {
  }

  async getGroupMembers(group: string): Promise<string[]> {
    this.lookups.push(group);
    if (this.failing.has(group)) {
      throw new DirectoryError(`Searching for group '${group}' failed: connection reset`, { group });
    }
    const members = this.groups[group];
    if (!members) {
      throw new DirectoryError(`Group '${group}' not found under ou=groups`, { group });
    }
    return [...members];
  }
}

/**
 * Keeps team membership in memory and records every call made to it.
 */
export class FakeTeamHost implements TeamHost {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();
  private readonly teams = new Map<string, { ref: TeamRef, members: Set<string> }>();

  constructor(teams: Record<string, string[]>) {
    for (const [name, members] of Object.entries(teams)) {
      this.teams.set(teamKey(team(name)), { ref: team(name), members: new Set(members) });
    }
  }

  get writes() {
    return this.calls.filter(c => !c.startsWith('list '));
  }

  members(name: string) {
    return [...this.find(team(name)).members].sort();
  }

  async getTeamMembers(ref: TeamRef): Promise<string[]> {
    this.record(`list ${formatTeam(ref)}`);
    return [...this.find(ref).members];
  }

  async addTeamMember(ref: TeamRef, username: string): Promise<void> {
    this.record(`add ${formatTeam(ref)} ${username}`);
    this.find(ref).members.add(username);
  }

  async removeTeamMember(ref: TeamRef, username: string): Promise<void> {
    this.record(`remove ${formatTeam(ref)} ${username}`);
    this.find(ref).members.delete(username);
  }

  private record(call: string) {
    this.calls.push(call);
    if (this.failing.has(call)) {
      throw new ApiError(`${call} returned 403`, { status: 403 });
    }
  }

  private find(ref: TeamRef) {
    const entry = this.teams.get(teamKey(ref));
    if (!entry) {
      throw new ApiError(`Team '${formatTeam(ref)}' not found`, { status: 404 });
    }
    return entry;
  }
}
