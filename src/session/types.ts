export type Methodology = 'ContextDriven' | 'CommandBased' | 'Unknown';

/** Fixed iteration order for grouped views and reports. */
export const METHODOLOGIES: readonly Methodology[] = [
  'ContextDriven',
  'CommandBased',
  'Unknown',
];

export type EnergyRating = 1 | 2 | 3;

export interface SessionMetadata {
  /** UTC start time as `YYYY-MM-DD_HH-mm-ss`; sorts in creation order. */
  id: string;
  timestamp: Date;
  project: string;
  methodology: Methodology;
  workingDirectory: string;
  command: string;
  logFile: string;
  /** Signed elapsed time in milliseconds, set when the session ends. */
  durationMs?: number;
  endTime?: Date;
  featuresWorkedOn: string[];
  creativeEnergy?: EnergyRating;
}

export interface SessionEnd {
  endTime: Date;
  durationMs: number;
  creativeEnergy?: EnergyRating;
}
