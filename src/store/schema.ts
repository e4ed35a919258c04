import { z } from 'zod';
import type { SessionMetadata } from '../session/types.js';

/**
 * On-disk shape of the metadata document.
 * Field names are snake_case; timestamps are ISO-8601 strings and the
 * duration is a signed integer number of milliseconds.
 */
export const SessionRecordSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  project: z.string(),
  methodology: z.enum(['ContextDriven', 'CommandBased', 'Unknown']),
  working_directory: z.string(),
  command: z.string(),
  log_file: z.string(),
  duration_ms: z.number().int().nullable().default(null),
  end_time: z.string().datetime({ offset: true }).nullable().default(null),
  features_worked_on: z.array(z.string()).default([]),
  creative_energy: z.union([z.literal(1), z.literal(2), z.literal(3)]).nullable().default(null),
});

export const MetadataDocumentSchema = z.object({
  sessions: z.record(z.string(), SessionRecordSchema),
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;
export type MetadataDocument = z.infer<typeof MetadataDocumentSchema>;

export function toSessionRecord(session: SessionMetadata): SessionRecord {
  return {
    id: session.id,
    timestamp: session.timestamp.toISOString(),
    project: session.project,
    methodology: session.methodology,
    working_directory: session.workingDirectory,
    command: session.command,
    log_file: session.logFile,
    duration_ms: session.durationMs ?? null,
    end_time: session.endTime?.toISOString() ?? null,
    features_worked_on: [...session.featuresWorkedOn],
    creative_energy: session.creativeEnergy ?? null,
  };
}

export function fromSessionRecord(record: SessionRecord): SessionMetadata {
  return {
    id: record.id,
    timestamp: new Date(record.timestamp),
    project: record.project,
    methodology: record.methodology,
    workingDirectory: record.working_directory,
    command: record.command,
    logFile: record.log_file,
    durationMs: record.duration_ms ?? undefined,
    endTime: record.end_time ? new Date(record.end_time) : undefined,
    featuresWorkedOn: [...record.features_worked_on],
    creativeEnergy: record.creative_energy ?? undefined,
  };
}
