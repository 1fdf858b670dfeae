import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { InvalidRecordError, RecordNotFoundError, errorMessage } from '../cli/errors.js';
import { logger } from '../logging/logger.js';
import { ExtensionSchema, ProfileSchema, type Extension, type Profile } from '../schema/index.js';

type RecordKind = 'extension' | 'profile';

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function isValidRecordId(id: string): boolean {
  return SAFE_ID.test(id) && !id.includes('..');
}

function assertValidId(kind: RecordKind, id: string): void {
  if (!isValidRecordId(id)) {
    throw new Error(`Invalid ${kind} id: ${JSON.stringify(id)}`);
  }
}

/**
 * JSON-file store: one pretty-printed file per record under `<dataDir>/extensions` and
 * `<dataDir>/profiles`.
 */
export class Storage {
  readonly extensionsDir: string;
  readonly profilesDir: string;

  constructor(readonly dataDir: string) {
    this.extensionsDir = path.join(dataDir, 'extensions');
    this.profilesDir = path.join(dataDir, 'profiles');
  }

  init(): void {
    fs.mkdirSync(this.extensionsDir, { recursive: true });
    fs.mkdirSync(this.profilesDir, { recursive: true });
  }

  saveExtension(extension: Extension): void {
    this.writeRecord('extension', this.extensionsDir, extension.id, ExtensionSchema.parse(extension));
  }

  loadExtension(id: string): Extension {
    return this.readRecord('extension', this.extensionsDir, id, ExtensionSchema);
  }

  listExtensions(): Extension[] {
    return this.listRecords('extension', this.extensionsDir, ExtensionSchema);
  }

  deleteExtension(id: string): void {
    this.deleteRecord('extension', this.extensionsDir, id);
  }

  saveProfile(profile: Profile): void {
    this.writeRecord('profile', this.profilesDir, profile.id, ProfileSchema.parse(profile));
  }

  loadProfile(id: string): Profile {
    return this.readRecord('profile', this.profilesDir, id, ProfileSchema);
  }

  listProfiles(): Profile[] {
    return this.listRecords('profile', this.profilesDir, ProfileSchema);
  }

  deleteProfile(id: string): void {
    this.deleteRecord('profile', this.profilesDir, id);
  }

  findProfilesReferencingExtension(extensionId: string): Profile[] {
    return this.listProfiles().filter((p) => p.extensionIds.includes(extensionId));
  }

  getDefaultProfile(): Profile | null {
    return this.listProfiles().find((p) => p.metadata.isDefault) ?? null;
  }

  /** Marks `id` as the only default profile and returns it. */
  setDefaultProfile(id: string, now: Date = new Date()): Profile {
    const target = this.loadProfile(id);
    for (const profile of this.listProfiles()) {
      if (profile.id !== id && profile.metadata.isDefault) {
        this.saveProfile({
          ...profile,
          metadata: { ...profile.metadata, isDefault: false, updatedAt: now.toISOString() },
        });
      }
    }
    const updated: Profile = {
      ...target,
      metadata: { ...target.metadata, isDefault: true, updatedAt: now.toISOString() },
    };
    this.saveProfile(updated);
    return updated;
  }

  private filePath(dir: string, id: string): string {
    return path.join(dir, `${id}.json`);
  }

  private writeRecord(kind: RecordKind, dir: string, id: string, record: unknown): void {
    assertValidId(kind, id);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(this.filePath(dir, id), JSON.stringify(record, null, 2) + '\n', 'utf-8');
  }

  private readRecord<T>(kind: RecordKind, dir: string, id: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    assertValidId(kind, id);
    const filePath = this.filePath(dir, id);
    if (!fs.existsSync(filePath)) throw new RecordNotFoundError(kind, id);
    return parseRecordFile(filePath, schema);
  }

  private listRecords<T>(kind: RecordKind, dir: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    if (!fs.existsSync(dir)) return [];
    const files = fs
      .readdirSync(dir)
      .filter((name) => name.endsWith('.json'))
      .map((name) => path.join(dir, name))
      .sort();

    const records: T[] = [];
    for (const filePath of files) {
      try {
        records.push(parseRecordFile(filePath, schema));
      } catch (error) {
        logger.warn(`skipping unreadable ${kind} file`, { path: filePath, error: errorMessage(error) });
      }
    }
    return records;
  }

  private deleteRecord(kind: RecordKind, dir: string, id: string): void {
    assertValidId(kind, id);
    fs.rmSync(this.filePath(dir, id), { force: true });
  }
}

export function parseRecordFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) throw new InvalidRecordError('invalid JSON', filePath);
    throw error;
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidRecordError(`${where}${issue?.message ?? 'invalid record'}`, filePath);
  }
  return parsed.data;
}
