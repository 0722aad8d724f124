import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'toml';
import { z } from 'zod';

export interface SurfaceConfig {
  width_ratio: number;
  max_width: number;
  height_ratio: number;
  max_height: number;
  margin: number;
  close_keys: string[];
}

export interface AssistConfig {
  base_url: string;
  timeout: number;
  spinner_enabled: boolean;
  auto_detect_language: boolean;
  language: string;
  surface: SurfaceConfig;
  keys: Record<string, string>;
}

export const DEFAULT_CONFIG: AssistConfig = {
  base_url: 'http://localhost:8000',
  timeout: 30_000,
  spinner_enabled: true,
  auto_detect_language: true,
  language: 'text',
  surface: {
    width_ratio: 0.7,
    max_width: 120,
    height_ratio: 0.5,
    max_height: 40,
    margin: 2,
    close_keys: ['q', '<Esc>'],
  },
  keys: {},
};

const ratio = z.number().gt(0).max(1);

const configFileSchema = z.object({
  base_url: z.string().url().optional(),
  timeout: z.number().int().positive().optional(),
  spinner_enabled: z.boolean().optional(),
  auto_detect_language: z.boolean().optional(),
  language: z.string().min(1).optional(),
  surface: z
    .object({
      width_ratio: ratio.optional(),
      max_width: z.number().int().positive().optional(),
      height_ratio: ratio.optional(),
      max_height: z.number().int().positive().optional(),
      margin: z.number().int().min(0).optional(),
      close_keys: z.array(z.string().min(1)).min(1).optional(),
    })
    .optional(),
  keys: z.record(z.string()).optional(),
});

export type ConfigOverrides = z.infer<typeof configFileSchema>;

/** Fill every option the overrides leave out with its default. */
export function resolveConfig(overrides: ConfigOverrides = {}): AssistConfig {
  const surface = overrides.surface ?? {};
  return {
    base_url: (overrides.base_url ?? DEFAULT_CONFIG.base_url).replace(/\/+$/, ''),
    timeout: overrides.timeout ?? DEFAULT_CONFIG.timeout,
    spinner_enabled: overrides.spinner_enabled ?? DEFAULT_CONFIG.spinner_enabled,
    auto_detect_language: overrides.auto_detect_language ?? DEFAULT_CONFIG.auto_detect_language,
    language: overrides.language ?? DEFAULT_CONFIG.language,
    surface: {
      width_ratio: surface.width_ratio ?? DEFAULT_CONFIG.surface.width_ratio,
      max_width: surface.max_width ?? DEFAULT_CONFIG.surface.max_width,
      height_ratio: surface.height_ratio ?? DEFAULT_CONFIG.surface.height_ratio,
      max_height: surface.max_height ?? DEFAULT_CONFIG.surface.max_height,
      margin: surface.margin ?? DEFAULT_CONFIG.surface.margin,
      close_keys: surface.close_keys ?? [...DEFAULT_CONFIG.surface.close_keys],
    },
    keys: { ...DEFAULT_CONFIG.keys, ...overrides.keys },
  };
}

export function loadConfig(configPath: string): AssistConfig | null {
  const absPath = resolve(configPath);
  if (!existsSync(absPath)) {
    return null;
  }

  let raw: string;
  try {
    raw = readFileSync(absPath, 'utf-8');
  } catch (err) {
    console.error(`[snippet-assist] Failed to read config: ${absPath}`);
    console.error(err instanceof Error ? err.message : err);
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    console.error(`[snippet-assist] Invalid TOML in config: ${absPath}`);
    console.error(err instanceof Error ? err.message : err);
    return null;
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    console.error(`[snippet-assist] Invalid config: ${absPath}`);
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return null;
  }

  return resolveConfig(result.data);
}
