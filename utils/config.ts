import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z, ZodError } from 'zod';
import { stripComments } from '../services/SnapshotStore';

export const DEFAULT_SECTION = 'plant';

export const plantConfigSchema = z.object({
  scenario: z.enum(['thermal-relief', 'basic']).default('thermal-relief'),
  snapshotFile: z.string().min(1).default('sensors.tmp'),
  seedFile: z.string().min(1).default('initial-state.json'),
  plcLogFile: z.string().min(1).default('plc.log'),
  fieldLogFile: z.string().min(1).default('field.log'),
  gatewayHost: z.string().min(1).default('127.0.0.1'),
  gatewayPort: z.number().int().min(1).max(65535).default(5020),
  unitId: z.number().int().min(0).max(247).default(1),
  statusCycleMs: z.number().int().positive().default(1000),
  plcLoopMultiplier: z.number().int().positive().default(2),
  fieldCycleMs: z.number().int().positive().default(1000),
  hmiPollIntervalMs: z.number().int().positive().default(1000),
  requestTimeoutMs: z.number().int().positive().default(3000),
  aggressiveness: z.number().positive().max(10).default(0.6),
  memoryView: z.boolean().default(false)
}).strict();

export type PlantConfig = z.infer<typeof plantConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

const formatIssues = (error: ZodError): string[] =>
  error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

/** Validates one section; missing keys take their defaults. */
export const parseConfig = (raw: unknown, section: string = DEFAULT_SECTION): PlantConfig => {
  if (typeof raw !== 'object' || raw === null || !(section in raw)) {
    throw new ConfigError(`Configuration section '${section}' not found`);
  }
  const body: unknown = Object.entries(raw).find(([key]) => key === section)?.[1];
  const result = plantConfigSchema.safeParse(body ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in section '${section}'`, formatIssues(result.error));
  }
  return result.data;
};

/**
 * Reads a JSON config file that may contain `#` comments. Relative file
 * paths inside the section are resolved against the config file's directory.
 */
export const loadConfig = (filePath: string, section: string = DEFAULT_SECTION): PlantConfig => {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (e) {
    throw new ConfigError(`Cannot read configuration ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stripComments(text));
  } catch (e) {
    throw new ConfigError(`Configuration ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const config = parseConfig(raw, section);
  const baseDir = path.dirname(path.resolve(filePath));
  const resolve = (p: string) => path.resolve(baseDir, p);
  return {
    ...config,
    snapshotFile: resolve(config.snapshotFile),
    seedFile: resolve(config.seedFile),
    plcLogFile: resolve(config.plcLogFile),
    fieldLogFile: resolve(config.fieldLogFile)
  };
};
