export interface TeamRef {
  organization: string;
  team: string;
}

export interface MappingRule {
  group: string;
  teams: TeamRef[];
}

/** Directory group → hosting-service teams, in configuration order. */
export type Mapping = readonly Readonly<MappingRule>[];

export interface TeamTarget {
  team: TeamRef;
  groups: string[];
}

/** Lower-cased username → username as spelled by the system it came from. */
export type UsernameSet = Map<string, string>;

export interface MembershipChanges {
  toAdd: string[];
  toRemove: string[];
  unchanged: string[];
}
