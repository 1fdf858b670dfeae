import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { FileNotFoundError, InvalidRecordError } from '../cli/errors.js';
import { expandHome } from '../config/loader.js';
import { DEFAULT_CONTEXT_FILE, EXTENSION_MANIFEST } from '../launcher/launcher.js';
import { ContextFileNameSchema, McpServerConfigSchema, slugifyName, type Extension } from '../schema/index.js';
import { parseRecordFile, type Storage } from './storage.js';

const ManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().default('1.0.0'),
  description: z.string().optional(),
  mcpServers: z.record(z.string(), McpServerConfigSchema).default({}),
  contextFileName: ContextFileNameSchema.optional(),
});

function readContext(dir: string, fileName: string): string | undefined {
  const contextPath = path.join(dir, fileName);
  return fs.existsSync(contextPath) ? fs.readFileSync(contextPath, 'utf-8') : undefined;
}

/**
 * Build an extension from a directory holding `gemini-extension.json`, a manifest file itself,
 * or a bare `.md` context file.
 */
export function readExtensionSource(sourcePath: string, now: Date = new Date()): Extension {
  const resolved = path.resolve(expandHome(sourcePath.trim()));
  if (!fs.existsSync(resolved)) throw new FileNotFoundError(resolved);

  const metadata = { importedAt: now.toISOString(), sourcePath: resolved, tags: [] };
  const stat = fs.statSync(resolved);

  let extension: Omit<Extension, 'id'>;
  if (stat.isDirectory() || resolved.endsWith('.json')) {
    const manifestPath = stat.isDirectory() ? path.join(resolved, EXTENSION_MANIFEST) : resolved;
    if (!fs.existsSync(manifestPath)) throw new InvalidRecordError(`missing ${EXTENSION_MANIFEST}`, resolved);
    const manifest = parseRecordFile(manifestPath, ManifestSchema);
    const contextFileName = manifest.contextFileName ?? DEFAULT_CONTEXT_FILE;
    const contextContent = readContext(path.dirname(manifestPath), contextFileName);
    extension = {
      ...manifest,
      ...(contextContent !== undefined ? { contextFileName, contextContent } : {}),
      metadata,
    };
  } else if (resolved.endsWith('.md')) {
    const fileName = path.basename(resolved);
    extension = {
      name: path.basename(resolved, '.md'),
      version: '1.0.0',
      mcpServers: {},
      contextFileName: fileName,
      contextContent: fs.readFileSync(resolved, 'utf-8'),
      metadata,
    };
  } else {
    throw new InvalidRecordError('expected a directory, a .json manifest or a .md file', resolved);
  }

  const id = slugifyName(extension.name);
  if (!id) throw new InvalidRecordError(`cannot derive an id from name ${JSON.stringify(extension.name)}`, resolved);
  return { id, ...extension };
}

/** Read the source and store it; an id already in storage is refused. */
export function importExtension(storage: Storage, sourcePath: string, now: Date = new Date()): Extension {
  const extension = readExtensionSource(sourcePath, now);
  if (storage.listExtensions().some((e) => e.id === extension.id)) {
    throw new Error(`Extension already exists: ${extension.id}`);
  }
  storage.saveExtension(extension);
  return extension;
}
