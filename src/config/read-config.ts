import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'ini';
import { z } from 'zod';
import type { ConnectionConfig, ConnectionPair } from '../engine/types';
import { ConfigurationError } from '../engine/errors';

export const SOURCE_SECTION = 'source_postgres';
export const DESTINATION_SECTION = 'destination_postgres';
export const DEFAULT_CONFIG_PATH = 'config.ini';

const REQUIRED_KEYS = ['dbname', 'user', 'password', 'host'] as const;

const text = z.string();

const ConnectionSchema = z.object({
  dbname: text.pipe(z.string().min(1)),
  user: text.pipe(z.string().min(1)),
  password: text,
  host: text.pipe(z.string().min(1)),
  port: z.coerce.number().int().min(1).max(65535).optional(),
});

type Section = Record<string, unknown>;

const SECTION_LINE = /^\[([^\]]*)\]\s*$/;
const COMMENT_LINE = /^\s*[;#]/;
const KEY_LINE = /^([^=]+)=(.*)$/;

const isSection = (value: unknown): value is Section =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const readFile = (configPath: string): string => {
  try {
    return fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError('unreadable', `Cannot read ${configPath}`, { cause: err });
  }
};

const assertSection = (parsed: Section, name: string, fileName: string): void => {
  const section = parsed[name];
  if (!isSection(section)) {
    throw new ConfigurationError('missing-section', `${name} section not found in ${fileName}`, { section: name });
  }
};

const toConnectionConfig = (section: Section, name: string, fileName: string): ConnectionConfig => {
  for (const key of REQUIRED_KEYS) {
    if (!(key in section)) {
      throw new ConfigurationError('missing-key', `No option '${key}' in section '${name}' of ${fileName}`, {
        section: name,
        key,
      });
    }
  }

  const result = ConnectionSchema.safeParse(section);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.map(String).join('.');
    throw new ConfigurationError('invalid-value', `Invalid '${key}' in section '${name}' of ${fileName}: ${issue.message}`, {
      section: name,
      key,
    });
  }

  return Object.freeze({ ...result.data });
};

/**
 * Key/value pairs of one section, read straight from the lines.
 * ini would cut values at an inline `#` or `;` and strip quotes; passwords need the text as written.
 * Keys are lowercased, values only trimmed.
 */
const readRawSection = (content: string, name: string): Section => {
  const values: Section = {};
  let current: string | undefined;

  for (const line of content.split(/\r?\n/)) {
    if (line.trim() === '' || COMMENT_LINE.test(line)) continue;

    const section = SECTION_LINE.exec(line);
    if (section) {
      current = section[1];
      continue;
    }

    const pair = KEY_LINE.exec(line);
    if (pair && current === name) {
      values[pair[1].trim().toLowerCase()] = pair[2].trim();
    }
  }

  return values;
};

/**
 * Parse connection settings for both sides of the transfer from INI text.
 * Both sections are checked before any key is looked up.
 */
export const parseConfig = (content: string, fileName = DEFAULT_CONFIG_PATH): ConnectionPair => {
  const parsed: Section = parse(content);

  assertSection(parsed, SOURCE_SECTION, fileName);
  assertSection(parsed, DESTINATION_SECTION, fileName);

  return Object.freeze({
    source: toConnectionConfig(readRawSection(content, SOURCE_SECTION), SOURCE_SECTION, fileName),
    destination: toConnectionConfig(readRawSection(content, DESTINATION_SECTION), DESTINATION_SECTION, fileName),
  });
};

export const readConfig = (configPath: string = DEFAULT_CONFIG_PATH): ConnectionPair => {
  return parseConfig(readFile(configPath), path.basename(configPath));
};
