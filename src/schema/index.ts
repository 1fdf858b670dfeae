import path from 'node:path';
import { z } from 'zod';

export const McpServerConfigSchema = z.object({
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  cwd: z.string().optional(),
  env: z.record(z.string(), z.string()).optional(),
  timeout: z.number().int().nonnegative().optional(),
  trust: z.boolean().optional(),
});
export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;

/** A bare file name with no directory part; `.` and `..` are refused. */
export function isPlainFileName(value: string): boolean {
  if (value === '' || value === '.' || value === '..') return false;
  return !value.includes('\\') && path.basename(value) === value;
}

export const ContextFileNameSchema = z.string().refine(isPlainFileName, { message: 'must be a plain file name' });

export const ExtensionMetadataSchema = z.object({
  importedAt: z.string(),
  sourcePath: z.string().optional(),
  tags: z.array(z.string()).default([]),
});
export type ExtensionMetadata = z.infer<typeof ExtensionMetadataSchema>;

export const ExtensionSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
  mcpServers: z.record(z.string(), McpServerConfigSchema).default({}),
  contextFileName: ContextFileNameSchema.optional(),
  contextContent: z.string().optional(),
  metadata: ExtensionMetadataSchema,
});
export type Extension = z.infer<typeof ExtensionSchema>;

export const LaunchConfigSchema = z.object({
  cleanLaunch: z.boolean().default(false),
  cleanupOnExit: z.boolean().default(true),
  preserveExtensions: z.array(z.string()).default([]),
});
export type LaunchConfig = z.infer<typeof LaunchConfigSchema>;

export const ProfileMetadataSchema = z.object({
  createdAt: z.string(),
  updatedAt: z.string(),
  tags: z.array(z.string()).default([]),
  isDefault: z.boolean().default(false),
  icon: z.string().optional(),
});
export type ProfileMetadata = z.infer<typeof ProfileMetadataSchema>;

export const ProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
  extensionIds: z.array(z.string()).default([]),
  environmentVariables: z.record(z.string(), z.string()).default({}),
  workingDirectory: z.string().optional(),
  // Older profile files predate launch options.
  launchConfig: LaunchConfigSchema.default({}),
  metadata: ProfileMetadataSchema,
});
export type Profile = z.infer<typeof ProfileSchema>;

export function defaultLaunchConfig(): LaunchConfig {
  return LaunchConfigSchema.parse({});
}

export function profileDisplayName(profile: Profile): string {
  return profile.metadata.icon ? `${profile.metadata.icon} ${profile.name}` : profile.name;
}

export function profileSummary(profile: Profile): string {
  const extCount = profile.extensionIds.length;
  const envCount = Object.keys(profile.environmentVariables).length;
  return `${extCount} extension${extCount === 1 ? '' : 's'}, ${envCount} env var${envCount === 1 ? '' : 's'}`;
}

/**
 * Derive a record id from a display name: lowercase ASCII alphanumerics joined by single dashes.
 * Accented letters lose their marks (`Café` → `cafe`); spaces, dashes, underscores and dots
 * become separators; anything else is dropped.
 */
export function slugifyName(name: string): string {
  return Array.from(name.normalize('NFKD').replace(/\p{M}/gu, '').toLowerCase())
    .map((ch) => {
      if (/[a-z0-9]/.test(ch)) return ch;
      if (ch === ' ' || ch === '-' || ch === '_' || ch === '.') return '-';
      return '';
    })
    .join('')
    .split('-')
    .filter(Boolean)
    .join('-');
}

export function parseTagList(input: string): string[] {
  return input
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
}
