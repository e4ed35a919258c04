import fs from 'node:fs';
import { metadataPath } from '../utils/paths.js';
import { MetadataStore } from './metadata.js';

export { MetadataStore } from './metadata.js';
export type { ListOptions } from './metadata.js';

/** Ensure the logs directory exists and load its metadata document. */
export function openMetadataStore(logsDir: string): MetadataStore {
  fs.mkdirSync(logsDir, { recursive: true });
  return MetadataStore.load(metadataPath(logsDir));
}
