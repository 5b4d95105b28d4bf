import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';
import { describeError } from './util';
import { parseTeamRef } from '../model/membership';
import type { Mapping, TeamRef } from '../model/types';
import type { GiteaSettings } from '../platforms/gitea-platform';
import type { LdapSettings } from '../platforms/ldap-platform';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const teamRefSchema = z.string().transform((value, ctx): TeamRef => {
  const ref = parseTeamRef(value);
  if (!ref) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid Gitea team '${value}', expected "org/team"` });
    return z.NEVER;
  }
  return ref;
});

const settingsFileSchema = z.object({
  GITEA_HOST: z.string().url(),
  GITEA_TOKEN: z.string().min(1),
  LDAP_HOST: z.string().min(1),
  LDAP_USER: z.string(),
  LDAP_PASS: z.string(),
  LDAP_SEARCH_BASE: z.string().min(1),
  LDAP_SEARCH_FILTER: z.string().min(1).default('(objectClass=posixGroup)'),
  LDAP_GROUP_ATTRIBUTE: z.string().min(1).default('cn'),
  LDAP_MEMBER_ATTRIBUTE: z.string().min(1).default('memberUid'),
  MAPPING: z.record(z.string().min(1), z.array(teamRefSchema)),
  DRY_RUN: z.boolean().default(false),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface Settings {
  readonly gitea: Readonly<GiteaSettings>;
  readonly ldap: Readonly<LdapSettings>;
  readonly mapping: Mapping;
  readonly dryRun: boolean;
  readonly logLevel: typeof LOG_LEVELS[number];
}

/**
 * Validates a parsed configuration file. Throws ConfigError listing every problem found.
 */
export function parseSettings(json: unknown): Settings {
  const result = settingsFileSchema.safeParse(json);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Configuration is invalid: ${problems.join('; ')}`);
  }

  const file = result.data;
  return Object.freeze({
    gitea: Object.freeze({
      host: file.GITEA_HOST.replace(/\/+$/, ''),
      token: file.GITEA_TOKEN,
    }),
    ldap: Object.freeze({
      url: file.LDAP_HOST,
      bindDn: file.LDAP_USER,
      bindPassword: file.LDAP_PASS,
      searchBase: file.LDAP_SEARCH_BASE,
      searchFilter: file.LDAP_SEARCH_FILTER,
      groupAttribute: file.LDAP_GROUP_ATTRIBUTE,
      memberAttribute: file.LDAP_MEMBER_ATTRIBUTE,
    }),
    mapping: Object.freeze(Object.entries(file.MAPPING).map(([group, teams]) => Object.freeze({ group, teams }))),
    dryRun: file.DRY_RUN,
    logLevel: file.LOG_LEVEL,
  });
}

export async function loadSettings(path: string): Promise<Settings> {
  let contents: string;
  try {
    contents = await fs.readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file at '${path}': ${describeError(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (err) {
    throw new ConfigError(`Configuration file '${path}' is malformed: ${describeError(err)}`, { cause: err });
  }
  return parseSettings(json);
}
