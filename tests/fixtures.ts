import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Extension, Profile } from '../src/schema/index.js';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `gcm-${prefix}-`));
}

export function makeExtension(id: string, overrides: Partial<Extension> = {}): Extension {
  return {
    id,
    name: id,
    version: '1.0.0',
    mcpServers: {},
    metadata: { importedAt: FIXED_NOW.toISOString(), tags: [] },
    ...overrides,
  };
}

export function makeProfile(id: string, overrides: Partial<Profile> = {}): Profile {
  return {
    id,
    name: id,
    extensionIds: [],
    environmentVariables: {},
    launchConfig: { cleanLaunch: false, cleanupOnExit: true, preserveExtensions: [] },
    metadata: {
      createdAt: FIXED_NOW.toISOString(),
      updatedAt: FIXED_NOW.toISOString(),
      tags: [],
      isDefault: false,
    },
    ...overrides,
  };
}
