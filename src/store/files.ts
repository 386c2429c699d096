import fs from 'node:fs';
import path from 'node:path';

import { createComponentLogger } from '../util/logger';

export type FileMetadata = {
  id: string;
  name: string;
  path: string;
  size: number;
  mimeType: string;
  uploadedAt: string;
};

const dataDir = path.resolve('.data');
const storePath = path.join(dataDir, 'files.json');

const filesById = new Map<string, FileMetadata>();

const log = createComponentLogger('files');

let loaded = false;

export const uploadsDir = path.join(dataDir, 'files');

const ensureDataDir = (): void => {
  fs.mkdirSync(dataDir, { recursive: true });
};

const isFileMetadata = (value: unknown): value is FileMetadata =>
  typeof value === 'object' &&
  value !== null &&
  'id' in value &&
  typeof value.id === 'string' &&
  'path' in value &&
  typeof value.path === 'string';

const loadStoreFromDisk = (): void => {
  if (loaded) {
    return;
  }
  loaded = true;

  if (!fs.existsSync(storePath)) {
    return;
  }

  try {
    const raw = fs.readFileSync(storePath, 'utf-8');
    if (!raw.trim()) {
      return;
    }

    const parsed: unknown = JSON.parse(raw);
    const entriesArray: unknown[] = Array.isArray(parsed)
      ? parsed
      : typeof parsed === 'object' && parsed !== null
        ? Object.values(parsed)
        : [];

    entriesArray.forEach((entry) => {
      if (isFileMetadata(entry)) {
        filesById.set(entry.id, entry);
      }
    });
  } catch (error) {
    log.error({ err: error, storePath }, 'Failed to load file store from disk.');
  }
};

const persistStore = (): void => {
  ensureDataDir();
  const payload = JSON.stringify(Array.from(filesById.values()), null, 2);
  fs.writeFileSync(storePath, payload);
};

export const saveFile = (meta: FileMetadata): void => {
  loadStoreFromDisk();
  filesById.set(meta.id, meta);
  try {
    persistStore();
  } catch (error) {
    log.error({ err: error, storePath }, 'Failed to persist file store.');
  }
};

export const getFileById = (id: string): FileMetadata | undefined => {
  loadStoreFromDisk();
  return filesById.get(id);
};
