import { z } from 'zod';

const ChordListSchema = z.array(z.string());

export const DEFAULT_NAVIGATION_KEYS = {
  up: ['Up', 'k'],
  down: ['Down', 'j'],
  left: ['Left', 'h'],
  right: ['Right', 'l'],
  back: ['Esc', 'b'],
  quit: ['q', 'Ctrl+c'],
} as const satisfies Record<string, readonly string[]>;

export const DEFAULT_ACTION_KEYS = {
  edit: ['e'],
  delete: ['d'],
  create: ['n'],
  import: ['i'],
  launch: ['l'],
  select: ['Enter', 'Space'],
  search: ['/'],
} as const satisfies Record<string, readonly string[]>;

export const DEFAULT_THEME = 'mocha';

function copyTable(table: Record<string, readonly string[]>): Record<string, string[]> {
  return Object.fromEntries(Object.entries(table).map(([name, chords]) => [name, [...chords]]));
}

export const KeybindingConfigSchema = z.object({
  navigation: z.record(z.string(), ChordListSchema).default(() => copyTable(DEFAULT_NAVIGATION_KEYS)),
  actions: z.record(z.string(), ChordListSchema).default(() => copyTable(DEFAULT_ACTION_KEYS)),
});
export type KeybindingConfig = z.infer<typeof KeybindingConfigSchema>;

export const UserSettingsSchema = z.object({
  theme: z.string().default(DEFAULT_THEME),
  keybindings: KeybindingConfigSchema.default({}),
});
export type UserSettings = z.infer<typeof UserSettingsSchema>;

export function defaultKeybindings(): KeybindingConfig {
  return KeybindingConfigSchema.parse({});
}

export function defaultSettings(): UserSettings {
  return UserSettingsSchema.parse({});
}

/** Every logical action name in either table, navigation first. */
export function keybindingNames(config: KeybindingConfig): string[] {
  return [...Object.keys(config.navigation), ...Object.keys(config.actions)];
}

/** Chords bound to a logical action; an unknown name is unbound, not an error. */
export function chordsFor(config: KeybindingConfig, name: string): string[] {
  if (Object.hasOwn(config.navigation, name)) return config.navigation[name] ?? [];
  if (Object.hasOwn(config.actions, name)) return config.actions[name] ?? [];
  return [];
}
