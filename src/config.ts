import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

/**
 * Zod schemas for configuration validation
 */
const GatewayConfigSchema = z.object({
  /** Time budget for each repository primitive in milliseconds (default: 30000) */
  timeoutMs: z.number().int().min(100).max(600000).optional(),
});

const SpawnConfigSchema = z.object({
  /** Ref new worktrees branch from when none is given (default: HEAD) */
  defaultBaseRef: z.string().min(1).optional(),
  /** What spawn does when an agent already has a worktree from a different base ref */
  baseRefMismatch: z.enum(['reuse', 'reject']).optional(),
});

const NukeConfigSchema = z.object({
  /** Delete the agent branch after removing its worktree (default: false) */
  deleteBranch: z.boolean().optional(),
});

const ReconcileConfigSchema = z.object({
  /** Handling of worktrees found under the worktree root without a registry record */
  orphanPolicy: z.enum(['adopt', 'remove', 'report']).optional(),
  /** Age after which an in-progress record is considered stuck (default: 300000) */
  staleAfterMs: z.number().int().min(0).optional(),
  /** Interval of the background reconcile loop; 0 disables it (default: 0) */
  intervalMs: z.number().int().min(0).optional(),
});

const CommitConfigSchema = z.object({
  authorName: z.string().min(1).optional(),
  authorEmail: z.string().min(1).optional(),
});

const ConfigSchema = z.object({
  /** Directory holding agent worktrees, relative to the repository root */
  worktreeRoot: z.string().min(1).optional(),
  /** Prefix of agent branch names */
  branchPrefix: z.string().optional(),
  /** Registry file, relative to the repository root */
  registryPath: z.string().min(1).optional(),
  gateway: GatewayConfigSchema.optional(),
  spawn: SpawnConfigSchema.optional(),
  nuke: NukeConfigSchema.optional(),
  reconcile: ReconcileConfigSchema.optional(),
  commit: CommitConfigSchema.optional(),
});

export type WardenConfig = z.infer<typeof ConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type SpawnConfig = z.infer<typeof SpawnConfigSchema>;
export type NukeConfig = z.infer<typeof NukeConfigSchema>;
export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;
export type CommitConfig = z.infer<typeof CommitConfigSchema>;
export type OrphanPolicy = NonNullable<ReconcileConfig['orphanPolicy']>;
export type BaseRefMismatchPolicy = NonNullable<SpawnConfig['baseRefMismatch']>;

export const DEFAULT_GATEWAY: Required<GatewayConfig> = {
  timeoutMs: 30000,
};

export const DEFAULT_SPAWN: Required<SpawnConfig> = {
  defaultBaseRef: 'HEAD',
  baseRefMismatch: 'reuse',
};

export const DEFAULT_NUKE: Required<NukeConfig> = {
  deleteBranch: false,
};

/**
 * `report` leaves foreign worktrees orphaned until an operator picks adopt or remove.
 */
export const DEFAULT_RECONCILE: Required<ReconcileConfig> = {
  orphanPolicy: 'report',
  staleAfterMs: 5 * 60 * 1000,
  intervalMs: 0,
};

export const DEFAULT_COMMIT: Required<CommitConfig> = {
  authorName: 'Warden Agent',
  authorEmail: 'agent@warden.local',
};

export const DEFAULT_WORKTREE_ROOT = path.join('.git', 'agent-worktrees');
export const DEFAULT_BRANCH_PREFIX = 'agent/';
export const DEFAULT_REGISTRY_PATH = path.join('.git', 'warden', 'registry.json');

/**
 * Configuration with every default applied and paths made absolute.
 */
export interface ResolvedConfig {
  repoRoot: string;
  worktreeRoot: string;
  branchPrefix: string;
  registryPath: string;
  gateway: Required<GatewayConfig>;
  spawn: Required<SpawnConfig>;
  nuke: Required<NukeConfig>;
  reconcile: Required<ReconcileConfig>;
  commit: Required<CommitConfig>;
}

export const CONFIG_FILENAMES = ['.warden.json', 'warden.config.json'];

/**
 * Format a Zod validation issue into a user-friendly message
 */
function formatValidationError(issue: z.core.$ZodIssue, rawConfig: unknown): string {
  const pathArray = issue.path.map((p) => String(p));
  const fieldPath = pathArray.join('.');
  const rawValue = getValueAtPath(rawConfig, pathArray);
  const rawValueStr = rawValue === undefined ? 'undefined' : JSON.stringify(rawValue);

  switch (issue.code) {
    case 'invalid_type': {
      const suggestion = getSuggestionForType(String(issue.expected), rawValue);
      return `  - ${fieldPath}: Expected ${issue.expected}, got ${typeof rawValue} ${rawValueStr}${suggestion}`;
    }
    case 'too_small':
      return `  - ${fieldPath}: Value ${rawValueStr} is below minimum ${String(issue.minimum)}`;
    case 'too_big':
      return `  - ${fieldPath}: Value ${rawValueStr} exceeds maximum ${String(issue.maximum)}`;
    case 'invalid_value': {
      const options = issue.values.map((o) => `'${String(o)}'`).join(', ');
      return `  - ${fieldPath}: Invalid value ${rawValueStr}. Valid options: ${options}`;
    }
    default:
      return `  - ${fieldPath}: ${issue.message}`;
  }
}

function getValueAtPath(obj: unknown, pathSegments: string[]): unknown {
  let current: unknown = obj;
  for (const segment of pathSegments) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Get suggestions for common type mistakes
 */
function getSuggestionForType(expected: string, rawValue: unknown): string {
  if (expected === 'number' && typeof rawValue === 'string') {
    const num = Number(rawValue);
    if (!isNaN(num)) {
      return `\n    Suggestion: Remove quotes to use numeric value: ${num}`;
    }
  }

  if (expected === 'boolean' && typeof rawValue === 'string') {
    const lower = rawValue.toLowerCase();
    if (lower === 'true' || lower === 'false') {
      return `\n    Suggestion: Remove quotes to use boolean value: ${lower}`;
    }
  }

  return '';
}

function printValidationWarnings(filename: string, issues: z.core.$ZodIssue[], rawConfig: unknown): void {
  console.warn(`[warden] Warning: Invalid config in ${filename}`);
  for (const issue of issues) {
    console.warn(formatValidationError(issue, rawConfig));
  }
  console.warn('  Using default values for invalid fields.');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Delete the value an issue points at. Returns whether anything was removed.
 */
function dropIssueValue(config: Record<string, unknown>, issuePath: PropertyKey[]): boolean {
  if (issuePath.length === 0) {
    return false;
  }

  let parent: unknown = config;
  for (const segment of issuePath.slice(0, -1)) {
    if (!isRecord(parent)) return false;
    parent = parent[String(segment)];
  }

  const key = String(issuePath[issuePath.length - 1]);
  if (!isRecord(parent) || !(key in parent)) {
    return false;
  }
  delete parent[key];
  return true;
}

/**
 * Extract valid configuration values from a raw config object.
 * Valid fields are kept while invalid ones fall back to defaults.
 */
function extractValidConfig(rawConfig: unknown): WardenConfig {
  if (!isRecord(rawConfig)) {
    return {};
  }

  const candidate: Record<string, unknown> = structuredClone(rawConfig);
  for (;;) {
    const result = ConfigSchema.safeParse(candidate);
    if (result.success) {
      return result.data;
    }
    let dropped = false;
    for (const issue of result.error.issues) {
      dropped = dropIssueValue(candidate, issue.path) || dropped;
    }
    if (!dropped) {
      return {};
    }
  }
}

/**
 * Parse raw configuration content, warning about and dropping invalid fields.
 */
export function parseConfig(rawConfig: unknown, filename: string): WardenConfig {
  const result = ConfigSchema.safeParse(rawConfig);
  if (result.success) {
    return result.data;
  }

  printValidationWarnings(filename, result.error.issues, rawConfig);
  return extractValidConfig(rawConfig);
}

/**
 * Apply defaults and resolve paths against the repository root.
 */
export function resolveConfig(repoRoot: string, config: WardenConfig = {}): ResolvedConfig {
  const root = path.resolve(repoRoot);
  return {
    repoRoot: root,
    worktreeRoot: path.resolve(root, config.worktreeRoot ?? DEFAULT_WORKTREE_ROOT),
    branchPrefix: config.branchPrefix ?? DEFAULT_BRANCH_PREFIX,
    registryPath: path.resolve(root, config.registryPath ?? DEFAULT_REGISTRY_PATH),
    gateway: { ...DEFAULT_GATEWAY, ...config.gateway },
    spawn: { ...DEFAULT_SPAWN, ...config.spawn },
    nuke: { ...DEFAULT_NUKE, ...config.nuke },
    reconcile: { ...DEFAULT_RECONCILE, ...config.reconcile },
    commit: { ...DEFAULT_COMMIT, ...config.commit },
  };
}

/**
 * Load configuration from the repository root.
 * The first config file found wins; a missing file means all defaults.
 */
export async function loadConfig(repoRoot: string): Promise<ResolvedConfig> {
  for (const filename of CONFIG_FILENAMES) {
    const configPath = path.join(repoRoot, filename);
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch {
      continue;
    }

    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[warden] Warning: Failed to parse ${filename}: ${message}`);
      console.warn('  Using default configuration.');
      return resolveConfig(repoRoot);
    }

    return resolveConfig(repoRoot, parseConfig(rawConfig, filename));
  }

  return resolveConfig(repoRoot);
}
