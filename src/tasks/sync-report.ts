import { formatTeam } from "../model/membership";
import type { SyncReport, TeamFailure, TeamOutcome } from "./types";

export type TeamStatus = 'ok' | 'partial' | 'failed';

export function teamStatus(outcome: TeamOutcome): TeamStatus {
  if (!outcome.failures.length) {
    return 'ok';
  }
  return outcome.failures.some(f => f.action === 'list') ? 'failed' : 'partial';
}

function failureToText(failure: TeamFailure) {
  const subject = failure.username ? `${failure.action} ${failure.username}` : failure.action;
  return `  ! ${subject}: ${failure.error.message}`;
}

function teamToText(outcome: TeamOutcome) {
  const changes = [
    ...outcome.added.map(u => `+${u}`),
    ...outcome.removed.map(u => `-${u}`),
  ];
  const summary = changes.length ? changes.join(' ') : 'no changes';
  const lines = [`${formatTeam(outcome.team)}: ${summary}`];
  if (outcome.kept.length) {
    lines.push(`  kept ${outcome.kept.join(', ')} (group could not be read)`);
  }
  lines.push(...outcome.failures.map(failureToText));
  return lines;
}

/**
 * Renders a run's outcome, one line per team plus one per problem.
 */
export function formatSyncReport(report: SyncReport) {
  const lines: string[] = [];
  if (report.dryRun) {
    lines.push('Dry run, no changes were made');
  }
  for (const group of report.groups) {
    if (!group.ok) {
      lines.push(`Group ${group.group}: ${group.error.message}`);
    }
  }
  for (const team of report.teams) {
    lines.push(...teamToText(team));
  }
  return lines;
}

export function countProblems(report: SyncReport) {
  return report.groups.filter(g => !g.ok).length
    + report.teams.reduce((sum, t) => sum + t.failures.length, 0);
}
