import { describe, it, expect, beforeEach } from 'vitest';
import { AxiosAdapter, AxiosError, AxiosResponse } from 'axios';
import GiteaPlatform, { GiteaTeam, GiteaUser } from '../platforms/gitea-platform';
import { ApiError } from '../lib/errors';
import { silentLogger, team } from './helpers';

/**
 * Just enough of the Gitea API, served through an axios adapter.
 */
class FakeGitea {
  readonly requests: string[] = [];
  readonly authorization: string[] = [];
  readonly forbidden = new Set<string>();
  readonly orgs: Record<string, GiteaTeam[]> = {};
  readonly members: Record<number, GiteaUser[]> = {};
  readonly overrides: Record<string, { status: number, data?: unknown, total?: number }> = {};
  maxLimit = 50;
  sendTotal = true;

  readonly adapter: AxiosAdapter = async (config) => {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    const page = Number(config.params?.page ?? 1);
    const limit = Math.min(Number(config.params?.limit ?? 50), this.maxLimit);
    this.requests.push(config.params ? `${method} ${url} page=${page}` : `${method} ${url}`);
    this.authorization.push(String(config.headers.get('Authorization')));

    const { status, data, total } = this.overrides[`${method} ${url}`] ?? this.handle(method, url, page, limit);
    const headers = total !== undefined && this.sendTotal ? { 'x-total-count': String(total) } : {};
    const response: AxiosResponse = { data, status, statusText: String(status), headers, config };
    if (status >= 200 && status < 300) {
      return response;
    }
    throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, {}, response);
  };

  private handle(method: string, url: string, page: number, limit: number): { status: number, data?: unknown, total?: number } {
    if (this.forbidden.has(`${method} ${url}`)) {
      return { status: 403, data: { message: 'forbidden' } };
    }

    let match = /^\/orgs\/([^/]+)\/teams$/.exec(url);
    if (method === 'GET' && match) {
      const teams = this.orgs[decodeURIComponent(match[1]).toLowerCase()];
      return teams ? { status: 200, data: teams.slice((page - 1) * limit, page * limit), total: teams.length } : { status: 404 };
    }

    match = /^\/teams\/(\d+)\/members$/.exec(url);
    if (method === 'GET' && match) {
      const members = this.members[Number(match[1])] ?? [];
      return { status: 200, data: members.slice((page - 1) * limit, page * limit), total: members.length };
    }

    match = /^\/teams\/(\d+)\/members\/([^/]+)$/.exec(url);
    if (match && (method === 'PUT' || method === 'DELETE')) {
      const id = Number(match[1]);
      const login = decodeURIComponent(match[2]);
      const members = (this.members[id] ?? []).filter(m => m.login !== login);
      this.members[id] = method === 'PUT' ? [...members, { id: 1000 + members.length, login }] : members;
      return { status: 204 };
    }

    return { status: 404 };
  }
}

function users(...logins: string[]): GiteaUser[] {
  return logins.map((login, i) => ({ id: i + 1, login }));
}

describe('GiteaPlatform', () => {
  let server: FakeGitea;
  let gitea: GiteaPlatform;

  beforeEach(() => {
    server = new FakeGitea();
    server.orgs['admin'] = [{ id: 5, name: 'Owners' }, { id: 6, name: 'Devs' }];
    server.members[5] = users('bob', 'carol');
    server.members[6] = [];
    gitea = new GiteaPlatform({ host: 'https://git.example.test', token: 'test-token' }, silentLogger, { adapter: server.adapter });
  });

  it('lists team members by org and team name', async () => {
    expect(await gitea.getTeamMembers(team('admin/Owners'))).toEqual(['bob', 'carol']);
    expect(server.requests).toEqual(['GET /orgs/admin/teams page=1', 'GET /teams/5/members page=1']);
  });

  it('sends the token', async () => {
    await gitea.getTeamMembers(team('admin/Owners'));
    expect(server.authorization).toEqual(['token test-token', 'token test-token']);
  });

  it('lists an organization once and matches names without regard to case', async () => {
    await gitea.getTeamMembers(team('Admin/owners'));
    await gitea.getTeamMembers(team('admin/DEVS'));
    expect(server.requests).toEqual([
      'GET /orgs/Admin/teams page=1',
      'GET /teams/5/members page=1',
      'GET /teams/6/members page=1',
    ]);
  });

  it('stops paging once the total count has been read', async () => {
    server.members[5] = Array.from({ length: 60 }, (_, i) => ({ id: i + 1, login: `user${i + 1}` }));

    const members = await gitea.getTeamMembers(team('admin/Owners'));

    expect(members).toHaveLength(60);
    expect(members[59]).toBe('user60');
    expect(server.requests).toEqual([
      'GET /orgs/admin/teams page=1',
      'GET /teams/5/members page=1',
      'GET /teams/5/members page=2',
    ]);
  });

  it('reads every page when the server caps the page size', async () => {
    server.maxLimit = 30;
    server.members[5] = Array.from({ length: 45 }, (_, i) => ({ id: i + 1, login: `user${i + 1}` }));

    const members = await gitea.getTeamMembers(team('admin/Owners'));

    expect(members).toHaveLength(45);
    expect(members[44]).toBe('user45');
    expect(server.requests.slice(1)).toEqual(['GET /teams/5/members page=1', 'GET /teams/5/members page=2']);
  });

  it('pages until an empty page without a total count', async () => {
    server.maxLimit = 30;
    server.sendTotal = false;
    server.members[5] = Array.from({ length: 45 }, (_, i) => ({ id: i + 1, login: `user${i + 1}` }));

    const members = await gitea.getTeamMembers(team('admin/Owners'));

    expect(members).toHaveLength(45);
    expect(server.requests.slice(1)).toEqual([
      'GET /orgs/admin/teams page=2',
      'GET /teams/5/members page=1',
      'GET /teams/5/members page=2',
      'GET /teams/5/members page=3',
    ]);
  });

  it('rejects a list response that is not an array', async () => {
    server.overrides['GET /teams/5/members'] = { status: 200, data: { message: 'not a list' } };

    await expect(gitea.getTeamMembers(team('admin/Owners'))).rejects.toMatchObject({
      message: "'GET /teams/5/members' returned an unexpected response",
      status: 200,
    });
  });

  it('rejects a member without a login', async () => {
    server.overrides['GET /teams/5/members'] = { status: 200, data: [{ id: 1, login: 'bob' }, { id: 2, full_name: 'No Login' }], total: 2 };

    const err = await gitea.getTeamMembers(team('admin/Owners')).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ message: "'GET /teams/5/members' returned a member without a login" });
  });

  it('adds and removes members', async () => {
    await gitea.addTeamMember(team('admin/Owners'), 'alice');
    await gitea.removeTeamMember(team('admin/Owners'), 'carol');

    expect(server.requests.slice(1)).toEqual(['PUT /teams/5/members/alice', 'DELETE /teams/5/members/carol']);
    expect(await gitea.getTeamMembers(team('admin/Owners'))).toEqual(['bob', 'alice']);
  });

  it('finds team ids', async () => {
    expect(await gitea.findTeamId(team('admin/Devs'))).toBe(6);
    expect(await gitea.findTeamId(team('admin/Nobody'))).toBeUndefined();
  });

  it('turns error responses into ApiError', async () => {
    server.forbidden.add('PUT /teams/5/members/alice');

    const err = await gitea.addTeamMember(team('admin/Owners'), 'alice').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      message: "'PUT /teams/5/members/alice' returned 403",
      method: 'PUT',
      url: '/teams/5/members/alice',
      status: 403,
    });
  });

  it('fails for an unknown team', async () => {
    await expect(gitea.getTeamMembers(team('admin/Missing'))).rejects.toMatchObject({
      message: "Team 'admin/Missing' not found",
      status: 404,
    });
  });

  it('fails for an unknown organization', async () => {
    await expect(gitea.getTeamMembers(team('nope/Owners'))).rejects.toThrow("'GET /orgs/nope/teams' returned 404");
  });
});
