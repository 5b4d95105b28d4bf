import { ApiError, DirectoryError } from "../lib/errors";
import { TeamRef } from "../model/types";

export type GroupOutcome =
  | { group: string; ok: true; members: string[] }
  | { group: string; ok: false; error: DirectoryError };

export interface TeamFailure {
  action: 'list' | 'add' | 'remove';
  username?: string;
  error: ApiError;
}

export interface TeamOutcome {
  team: TeamRef;
  groups: string[];
  added: string[];
  removed: string[];
  /** Members that would have been removed, held back because a mapped group could not be read. */
  kept: string[];
  failures: TeamFailure[];
}

export interface SyncReport {
  dryRun: boolean;
  groups: GroupOutcome[];
  teams: TeamOutcome[];
}
