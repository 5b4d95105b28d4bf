import { Client, EqualityFilter } from 'ldapts';
import { Logger } from 'winston';
import { BasePlatform } from './base-platform';
import getLogger from '../lib/logging';
import { DirectoryError } from '../lib/errors';
import { describeError, equalsInsensitive } from '../lib/util';
import type { DirectoryReader } from './types';

export interface LdapSettings {
  url: string;
  bindDn: string;
  bindPassword: string;
  searchBase: string;
  /** Selects group entries, e.g. `(objectClass=posixGroup)`. */
  searchFilter: string;
  groupAttribute: string;
  memberAttribute: string;
}

type AttributeValue = Buffer | Buffer[] | string[] | string;

function attributeValues(value: AttributeValue | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const list: (Buffer | string)[] = Array.isArray(value) ? value : [value];
  return list.map(v => typeof v === 'string' ? v : v.toString('utf-8'));
}

/**
 * Member attributes like `member` hold DNs; the username is the value of the first RDN.
 * `memberUid` style values are used as they are.
 */
export function usernameFromMember(value: string) {
  const rdn = /^\s*[\w.-]+\s*=\s*((?:\\.|[^,+\\])+)/.exec(value);
  if (!rdn || !value.includes(',')) {
    return value.trim();
  }
  return rdn[1].replace(/\\(.)/g, '$1').trim();
}

export function buildGroupFilter(searchFilter: string, groupAttribute: string, group: string) {
  const base = searchFilter.startsWith('(') ? searchFilter : `(${searchFilter})`;
  return `(&${base}${new EqualityFilter({ attribute: groupAttribute, value: group }).toString()})`;
}

export default class LdapPlatform extends BasePlatform implements DirectoryReader {
  static readonly NAME = 'LDAP';

  private readonly settings: LdapSettings;
  private client?: Client;

  constructor(settings: LdapSettings, logger?: Logger) {
    super(LdapPlatform.NAME, logger ?? getLogger(LdapPlatform.NAME));
    this.settings = settings;
  }

  async connect(): Promise<void> {
    const client = new Client({ url: this.settings.url });
    try {
      await client.bind(this.settings.bindDn, this.settings.bindPassword);
    } catch (err) {
      throw new DirectoryError(`Binding to ${this.settings.url} as '${this.settings.bindDn}' failed: ${describeError(err)}`, { cause: err });
    }
    this.client = client;
    this.logger.debug('Bound to %s', this.settings.url);
  }

  async getGroupMembers(group: string): Promise<string[]> {
    const client = this.client;
    if (!client) {
      throw new DirectoryError(`Not connected to ${this.settings.url}`, { group });
    }

    const { searchBase, groupAttribute, memberAttribute } = this.settings;
    const filter = buildGroupFilter(this.settings.searchFilter, groupAttribute, group);
    const entries = await this.timed(`search ${group}`, async () => {
      try {
        return (await client.search(searchBase, {
          scope: 'sub',
          filter,
          attributes: [groupAttribute, memberAttribute],
        })).searchEntries;
      } catch (err) {
        throw new DirectoryError(`Searching for group '${group}' failed: ${describeError(err)}`, { group, cause: err });
      }
    });

    if (!entries.length) {
      throw new DirectoryError(`Group '${group}' not found under ${searchBase}`, { group });
    }

    const members = new Set<string>();
    for (const entry of entries) {
      // servers may return the attribute name in a different case than requested
      const key = Object.keys(entry).find(k => equalsInsensitive(k, memberAttribute));
      for (const value of attributeValues(key === undefined ? undefined : entry[key])) {
        const username = usernameFromMember(value);
        if (username) {
          members.add(username);
        }
      }
    }
    this.logger.debug('Group %s has %d members', group, members.size);
    return [...members];
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = undefined;
    try {
      await client.unbind();
    } catch (err) {
      this.logger.warn('Unbinding from %s failed: %s', this.settings.url, describeError(err));
    }
  }
}
