import Axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import { Logger } from 'winston';
import { BasePlatform } from './base-platform';
import getLogger from '../lib/logging';
import { ApiError } from '../lib/errors';
import { asLookup } from '../lib/util';
import { formatTeam, teamKey } from '../model/membership';
import type { TeamRef } from '../model/types';
import type { TeamHost } from './types';

export interface GiteaSettings {
  host: string;
  token: string;
}

export interface GiteaUser {
  id: number;
  login: string;
  full_name?: string;
  email?: string;
}

export interface GiteaTeam {
  id: number;
  name: string;
  permission?: string;
}

const PAGE_SIZE = 50;

function toApiError(err: unknown): unknown {
  if (!Axios.isAxiosError(err)) {
    return err;
  }
  const method = (err.config?.method ?? 'get').toUpperCase();
  const url = err.config?.url ?? '';
  const status = err.response?.status;
  const message = status
    ? `'${method} ${url}' returned ${status}`
    : `'${method} ${url}' failed: ${err.message}`;
  return new ApiError(message, { method, url, status, cause: err });
}

export default class GiteaPlatform extends BasePlatform implements TeamHost {
  static readonly NAME = 'Gitea';

  private readonly web: AxiosInstance;
  // org/team (lower case) -> team id, filled one organization at a time
  private readonly teamIds: Record<string, number> = {};
  private readonly listedOrgs = new Set<string>();

  /**
   * @param axiosConfig merged into the client's defaults (tests pass an `adapter` here)
   */
  constructor(settings: GiteaSettings, logger?: Logger, axiosConfig: CreateAxiosDefaults = {}) {
    super(GiteaPlatform.NAME, logger ?? getLogger(GiteaPlatform.NAME));
    this.web = Axios.create({
      ...axiosConfig,
      baseURL: `${settings.host}/api/v1`,
      headers: {
        common: {
          Authorization: `token ${settings.token}`
        }
      },
    });
    this.web.interceptors.response.use(undefined, (err: unknown) => Promise.reject(toApiError(err)));
  }

  async getTeamMembers(team: TeamRef): Promise<string[]> {
    const id = await this.requireTeamId(team);
    const members = await this.timed(`list ${formatTeam(team)}`, () => this.getChunkedList<GiteaUser>(`/teams/${id}/members`));
    if (members.some(m => typeof m?.login !== 'string')) {
      throw new ApiError(`'GET /teams/${id}/members' returned a member without a login`, { method: 'GET', url: `/teams/${id}/members` });
    }
    return members.map(m => m.login);
  }

  async addTeamMember(team: TeamRef, username: string): Promise<void> {
    const id = await this.requireTeamId(team);
    await this.web.put(`/teams/${id}/members/${encodeURIComponent(username)}`);
  }

  async removeTeamMember(team: TeamRef, username: string): Promise<void> {
    const id = await this.requireTeamId(team);
    await this.web.delete(`/teams/${id}/members/${encodeURIComponent(username)}`);
  }

  async findTeamId(team: TeamRef): Promise<number | undefined> {
    const org = team.organization.toLowerCase();
    if (!this.listedOrgs.has(org)) {
      // remember every team of the org, not just the one asked for
      const teams = await this.getChunkedList<GiteaTeam>(`/orgs/${encodeURIComponent(team.organization)}/teams`);
      const byKey = asLookup(teams, t => teamKey({ organization: org, team: t.name }));
      for (const [key, apiTeam] of Object.entries(byKey)) {
        this.teamIds[key] = apiTeam.id;
      }
      this.listedOrgs.add(org);
      this.logger.debug('Found %d teams in %s', teams.length, team.organization);
    }
    return this.teamIds[teamKey(team)];
  }

  private async requireTeamId(team: TeamRef): Promise<number> {
    const id = await this.findTeamId(team);
    if (id === undefined) {
      throw new ApiError(`Team '${formatTeam(team)}' not found`, { status: 404 });
    }
    return id;
  }

  /**
   * Reads every page of a list endpoint. Gitea may cap `limit` below what was asked for,
   * so paging stops at `X-Total-Count` or at the first empty page, never at a short one.
   */
  async getChunkedList<T>(url: string): Promise<T[]> {
    const list: T[] = [];
    for (let page = 1; ; page++) {
      const response = await this.web.get<unknown>(url, { params: { page, limit: PAGE_SIZE } });
      if (!Array.isArray(response.data)) {
        throw new ApiError(`'GET ${url}' returned an unexpected response`, { method: 'GET', url, status: response.status });
      }
      const chunk: T[] = response.data;
      list.push(...chunk);

      const total = parseInt(String(response.headers['x-total-count'] ?? ''), 10);
      if (!chunk.length || list.length >= total) {
        return list;
      }
    }
  }
}
