import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ComputeClientError, describeCause } from '../errors.js';
import type { FileConfig } from '../types.js';

const fileConfigSchema = z
  .object({
    version: z.literal(1),
    authUrl: z.string().url().optional(),
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    tenantName: z.string().min(1).optional(),
    regionName: z.string().min(1).optional(),
    // YAML reads an unquoted 2.10 as the number 2.1
    computeApiVersion: z
      .string({
        invalid_type_error:
          'computeApiVersion must be a quoted string, e.g. "2.10"',
      })
      .optional(),
    endpointType: z.string().min(1).optional(),
    serviceType: z.string().min(1).optional(),
    serviceName: z.string().min(1).optional(),
    bypassUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export async function loadConfig(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf8');
  } catch (error) {
    throw new ComputeClientError(
      'CONFIG_ERROR',
      `Cannot read config file: ${configPath}`,
      { cause: describeCause(error) },
    );
  }

  let parsedYaml: unknown;
  try {
    parsedYaml = parseYaml(raw);
  } catch (error) {
    throw new ComputeClientError(
      'CONFIG_ERROR',
      `Invalid YAML in config: ${configPath}`,
      { cause: describeCause(error) },
    );
  }

  const parsed = fileConfigSchema.safeParse(parsedYaml);
  if (!parsed.success) {
    throw new ComputeClientError('CONFIG_ERROR', 'Config validation failed', {
      configPath,
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}
