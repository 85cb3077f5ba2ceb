import type { Protocol } from '../config/schema';

/**
 * Base interface for all run events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Which of the CLI modes a run executes */
export type RunMode = 'list-configs' | 'list-projects' | 'preview' | 'rewrite';

/**
 * Emitted once configuration is loaded and the pattern is built.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    mode: RunMode;
    configPath: string;
    targets: string[];
    /** Resolved target protocol, absent in listing modes */
    protocol?: Protocol;
  };
}

/** Emitted after a candidate file has been handled */
export interface FileProcessed extends BaseEvent {
  type: 'FileProcessed';
  payload: {
    file: string;
    matches: number;
    replaced: number;
    written: boolean;
  };
}

/** Emitted for each matched project without a substitution entry */
export interface ProjectUnmapped extends BaseEvent {
  type: 'ProjectUnmapped';
  payload: {
    file: string;
    project: string;
  };
}

/** Emitted when a file could not be read or written */
export interface FileFailed extends BaseEvent {
  type: 'FileFailed';
  payload: {
    file: string;
    message: string;
  };
}

/** Emitted when every target has been processed */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    files: number;
    failed: number;
    unmapped: number;
  };
}

export type RunEvent = RunStarted | FileProcessed | ProjectUnmapped | FileFailed | RunFinished;

/** The type-specific part of an event, without the common metadata */
export type RunEventBody = {
  [K in RunEvent['type']]: Pick<Extract<RunEvent, { type: K }>, 'type' | 'payload'>;
}[RunEvent['type']];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Stamps an event body with the schema version, the current time and the run id.
 */
export function createEvent(runId: string, body: RunEventBody): RunEvent {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
    ...body,
  };
}
