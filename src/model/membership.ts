import { buildInsensitiveCompare } from "../lib/util";
import type { Mapping, MembershipChanges, TeamRef, TeamTarget, UsernameSet } from "./types";

const byName = buildInsensitiveCompare<string>();

export function formatTeam(ref: TeamRef) {
  return `${ref.organization}/${ref.team}`;
}

export function teamKey(ref: TeamRef) {
  return formatTeam(ref).toLowerCase();
}

/**
 * Splits an `org/team` string. Returns undefined unless there are exactly two non-empty parts.
 */
export function parseTeamRef(text: string): TeamRef | undefined {
  const parts = text.split('/').map(p => p.trim());
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return undefined;
  }
  return { organization: parts[0], team: parts[1] };
}

/**
 * Every team named in the mapping, once, in order of first appearance, with all the
 * directory groups that feed it.
 */
export function collectTargets(mapping: Mapping): TeamTarget[] {
  const targets = new Map<string, TeamTarget>();
  for (const rule of mapping) {
    for (const team of rule.teams) {
      const key = teamKey(team);
      let target = targets.get(key);
      if (!target) {
        target = { team, groups: [] };
        targets.set(key, target);
      }
      if (!target.groups.some(g => g.toLowerCase() === rule.group.toLowerCase())) {
        target.groups.push(rule.group);
      }
    }
  }
  return [...targets.values()];
}

export function toUsernameSet(names: Iterable<string>): UsernameSet {
  const set: UsernameSet = new Map();
  addUsernames(set, names);
  return set;
}

export function addUsernames(set: UsernameSet, names: Iterable<string>) {
  for (const name of names) {
    const key = name.toLowerCase();
    if (!set.has(key)) {
      set.set(key, name);
    }
  }
}

export function diffMembership(desired: UsernameSet, current: UsernameSet): MembershipChanges {
  const toAdd: string[] = [];
  const toRemove: string[] = [];
  const unchanged: string[] = [];

  for (const [key, name] of desired) {
    (current.has(key) ? unchanged : toAdd).push(name);
  }
  for (const [key, name] of current) {
    if (!desired.has(key)) {
      toRemove.push(name);
    }
  }

  return {
    toAdd: toAdd.sort(byName),
    toRemove: toRemove.sort(byName),
    unchanged: unchanged.sort(byName),
  };
}
