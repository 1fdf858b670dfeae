import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { SIMPLE_ACTION_TYPES } from '../tui/action.js';
import { parseKeySequence } from '../tui/key-utils.js';

const APP_DIR_NAME = 'gemini-cli-manager';
const CONFIG_FILENAME = '.gcm.json';

function homeDir(): string {
  return process.env.HOME ?? process.env.USERPROFILE ?? os.homedir();
}

export function expandHome(p: string): string {
  if (p === '~') return homeDir();
  if (p.startsWith('~/')) return path.join(homeDir(), p.slice(2));
  return p;
}

export function defaultDataDir(): string {
  const xdg = process.env.XDG_DATA_HOME;
  if (xdg) return path.join(xdg, APP_DIR_NAME);
  return path.join(homeDir(), '.local', 'share', APP_DIR_NAME);
}

const KeymapSchema = z
  .record(z.string(), z.enum(SIMPLE_ACTION_TYPES))
  .default({})
  .superRefine((keymap, ctx) => {
    for (const sequence of Object.keys(keymap)) {
      if (!parseKeySequence(sequence)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid key sequence: ${sequence}`, path: [sequence] });
      }
    }
  });

export const ConfigSchema = z.object({
  dataDir: z.string().default(defaultDataDir).transform(expandHome),
  workspaceDir: z
    .string()
    .default(() => path.join(homeDir(), '.gemini-workspace'))
    .transform(expandHome),
  tickRate: z.number().positive().default(4),
  frameRate: z.number().positive().default(30),
  errorDisplayMs: z.number().int().nonnegative().default(5000),
  noticeDisplayMs: z.number().int().nonnegative().default(3000),
  geminiCommand: z.string().min(1).default('gemini'),
  keymap: KeymapSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(homeDir(), '.config', APP_DIR_NAME, 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    return defaultConfig();
  }

  try {
    const content = fs.readFileSync(pathToLoad, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
}
