import { TeamRef } from "../model/types";

export interface DirectoryReader {
  getGroupMembers(group: string): Promise<string[]>;
}

export interface TeamHost {
  getTeamMembers(team: TeamRef): Promise<string[]>;
  addTeamMember(team: TeamRef, username: string): Promise<void>;
  removeTeamMember(team: TeamRef, username: string): Promise<void>;
}
