import fs from 'node:fs';
import path from 'node:path';
import { MetadataLoadError, MetadataPersistError, SessionNotFoundError } from '../errors.js';
import { METHODOLOGIES } from '../session/types.js';
import type { Methodology, SessionMetadata } from '../session/types.js';
import { debug } from '../utils/logger.js';
import {
  MetadataDocumentSchema,
  fromSessionRecord,
  toSessionRecord,
} from './schema.js';
import type { MetadataDocument } from './schema.js';

export interface ListOptions {
  methodology?: Methodology;
  limit?: number;
}

function byId(a: SessionMetadata, b: SessionMetadata): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function writeJsonAtomic(filePath: string, value: unknown): void {
  const tmpPath = filePath + '.tmp';
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(tmpPath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
  fs.renameSync(tmpPath, filePath);
}

export function parseMetadataDocument(raw: string, filePath: string): Map<string, SessionMetadata> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new MetadataLoadError(
      `Failed to parse metadata file: ${filePath}: ${(err as Error).message}`,
      filePath,
      { cause: err },
    );
  }

  const result = MetadataDocumentSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid document';
    throw new MetadataLoadError(
      `Invalid metadata file: ${filePath} (${where})`,
      filePath,
      { cause: result.error },
    );
  }

  const sessions = new Map<string, SessionMetadata>();
  for (const [id, record] of Object.entries(result.data.sessions)) {
    // insert() and save() key by record id, so the two must agree
    if (record.id !== id) {
      throw new MetadataLoadError(
        `Invalid metadata file: ${filePath} (sessions.${id}: record id "${record.id}" does not match its key)`,
        filePath,
      );
    }
    sessions.set(id, fromSessionRecord(record));
  }
  return sessions;
}

/**
 * All session metadata, keyed by session id, backed by one JSON file.
 *
 * Every mutation is followed by a full rewrite via {@link save}; there are
 * no partial writes. Concurrent writers from several processes would lose
 * updates: making load-mutate-save atomic (file lock or version check)
 * belongs here if that ever becomes a requirement.
 */
export class MetadataStore {
  private constructor(
    readonly filePath: string,
    private readonly entries: Map<string, SessionMetadata>,
  ) {}

  static empty(filePath: string): MetadataStore {
    return new MetadataStore(filePath, new Map());
  }

  /** Load the document, or start empty when the file does not exist. */
  static load(filePath: string): MetadataStore {
    if (!fs.existsSync(filePath)) {
      debug(`No metadata at ${filePath}, starting empty`);
      return MetadataStore.empty(filePath);
    }

    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new MetadataLoadError(
        `Failed to read metadata file: ${filePath}`,
        filePath,
        { cause: err },
      );
    }

    const entries = parseMetadataDocument(raw, filePath);
    debug(`Loaded ${entries.size} session(s) from ${filePath}`);
    return new MetadataStore(filePath, entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get(id: string): SessionMetadata | undefined {
    return this.entries.get(id);
  }

  require(id: string): SessionMetadata {
    const session = this.entries.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  /** Insert or replace by id. */
  insert(session: SessionMetadata): void {
    this.entries.set(session.id, session);
  }

  /** Every session, ascending by id (creation order). */
  sessions(): SessionMetadata[] {
    return Array.from(this.entries.values()).sort(byId);
  }

  /**
   * Sessions grouped by methodology, built on every call. Groups follow
   * {@link METHODOLOGIES} order and only variants with sessions appear;
   * sessions inside a group are ascending by id.
   */
  byMethodology(): Map<Methodology, SessionMetadata[]> {
    const sorted = this.sessions();
    const groups = new Map<Methodology, SessionMetadata[]>();
    for (const methodology of METHODOLOGIES) {
      const members = sorted.filter((s) => s.methodology === methodology);
      if (members.length > 0) groups.set(methodology, members);
    }
    return groups;
  }

  /** Newest first, optionally filtered, then truncated to `limit`. */
  list(opts: ListOptions = {}): SessionMetadata[] {
    let sessions = Array.from(this.entries.values());
    if (opts.methodology) {
      sessions = sessions.filter((s) => s.methodology === opts.methodology);
    }
    sessions.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime() || byId(b, a));
    return opts.limit !== undefined ? sessions.slice(0, opts.limit) : sessions;
  }

  toDocument(): MetadataDocument {
    const sessions: MetadataDocument['sessions'] = {};
    for (const session of this.sessions()) {
      sessions[session.id] = toSessionRecord(session);
    }
    return { sessions };
  }

  /**
   * Rewrite the whole document through a temp file and rename.
   * On failure the in-memory sessions are untouched, so the call can be
   * retried.
   */
  save(): void {
    try {
      writeJsonAtomic(this.filePath, this.toDocument());
    } catch (err) {
      throw new MetadataPersistError(this.filePath, { cause: err });
    }
    debug(`Saved ${this.entries.size} session(s) to ${this.filePath}`);
  }
}
