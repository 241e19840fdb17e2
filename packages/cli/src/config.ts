/**
 * CLI configuration
 *
 * Resolution order, later wins:
 *   murmur.config.json → MURMUR_* environment → command flags
 *
 * The merged result is validated by GroupChatConfigSchema, which also
 * fills in every default.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { GroupChatConfigSchema } from '@murmur/types';
import type { GroupChatConfig } from '@murmur/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const CONFIG_FILE_NAME = 'murmur.config.json';

export const CONFIG_TEMPLATE = {
  agentName: 'Anna',
  host: '127.0.0.1',
  port: 54321,
  discoveryRange: 5,
  connectTimeoutMs: 500,
  maxMessageLength: 5000,
  queueSize: 100,
  logBroadcasts: true,
  logReceives: true,
} satisfies z.input<typeof GroupChatConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Flag values as citty hands them over */
export interface CliFlags {
  name?: string;
  host?: string;
  port?: string;
  range?: string;
}

export interface ConfigSources {
  file?: unknown;
  env?: Record<string, string | undefined>;
  flags?: CliFlags;
}

const FileConfigSchema = GroupChatConfigSchema.partial();

const PortSchema = z.coerce.number().int().min(1).max(65535);
const RangeSchema = z.coerce.number().int().min(1).max(100);

// ═══════════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Merge the three sources and validate the result.
 */
export function resolveConfig(sources: ConfigSources): GroupChatConfig {
  const fromFile = parseFileConfig(sources.file);
  const env = sources.env ?? {};
  const flags = sources.flags ?? {};

  const merged: Record<string, unknown> = {
    ...fromFile,
    ...definedOnly({
      agentName: env.MURMUR_AGENT,
      host: env.MURMUR_HOST,
      port: parseNumber(PortSchema, env.MURMUR_PORT, 'MURMUR_PORT'),
    }),
    ...definedOnly({
      agentName: flags.name,
      host: flags.host,
      port: parseNumber(PortSchema, flags.port, '--port'),
      discoveryRange: parseNumber(RangeSchema, flags.range, '--range'),
    }),
  };

  const result = GroupChatConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read murmur.config.json from `dir`. Resolves undefined when there is none.
 */
export async function readConfigFile(dir: string): Promise<unknown> {
  const path = join(dir, CONFIG_FILE_NAME);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ConfigError(`Invalid JSON in ${path}`);
  }
}

export async function loadConfig(
  dir: string,
  flags: CliFlags,
  env: Record<string, string | undefined> = process.env,
): Promise<GroupChatConfig> {
  const file = await readConfigFile(dir);
  return resolveConfig({ file, env, flags });
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function parseFileConfig(file: unknown): z.infer<typeof FileConfigSchema> {
  if (file === undefined) return {};
  const result = FileConfigSchema.safeParse(file);
  if (!result.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function parseNumber(schema: z.ZodNumber, raw: string | undefined, label: string): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${label}: ${raw}`);
  }
  return result.data;
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
