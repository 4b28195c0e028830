/**
 * Conversions between wire values and domain types.
 *
 * Parameters carry poses and joint vectors as six-number lists; results carry
 * them as objects with named fields and snake_case keys. Every decoder throws
 * `MalformedResponseError` naming the first offending field.
 */

import { MalformedResponseError } from './errors.js';
import {
  AIModel,
  type AprilTag,
  type EpisodeMetadata,
  JOINT_KEYS,
  type Joints,
  Mode,
  POSE_KEYS,
  type Point,
  type Pose,
  type Status,
  type TaskTraining,
  type TrainingEpisode,
} from './types.js';

type WireRecord = Record<string, unknown>;

// ============================================================================
// Field readers
// ============================================================================

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'nothing';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function fieldPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function fail(expected: string, path: string, value: unknown): never {
  throw new MalformedResponseError(
    `Expected ${expected} at ${path || 'result'}, got ${describe(value)}`,
    path || undefined
  );
}

function isRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): WireRecord {
  if (!isRecord(value)) {
    fail('an object', path, value);
  }
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    fail('an array', path, value);
  }
  return value;
}

function readNumber(record: WireRecord, key: string, path: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    fail('a number', fieldPath(path, key), value);
  }
  return value;
}

function readInteger(record: WireRecord, key: string, path: string): number {
  const value = readNumber(record, key, path);
  if (!Number.isInteger(value)) {
    fail('an integer', fieldPath(path, key), value);
  }
  return value;
}

function readString(record: WireRecord, key: string, path: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    fail('a string', fieldPath(path, key), value);
  }
  return value;
}

function readOptionalString(record: WireRecord, key: string, path: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    fail('a string or null', fieldPath(path, key), value);
  }
  return value;
}

function readEnum<T extends string>(
  record: WireRecord,
  key: string,
  allowed: Record<string, T>,
  path: string
): T {
  const value = readString(record, key, path);
  const match = Object.values(allowed).find((candidate) => candidate === value);
  if (match === undefined) {
    throw new MalformedResponseError(
      `Expected one of ${Object.values(allowed).join(', ')} at ${fieldPath(path, key)}, got ${JSON.stringify(value)}`,
      fieldPath(path, key)
    );
  }
  return match;
}

// ============================================================================
// Parameters (domain -> wire)
// ============================================================================

export function poseToWire(value: Pose): number[] {
  return POSE_KEYS.map((key) => value[key]);
}

export function jointsToWire(value: Joints): number[] {
  return JOINT_KEYS.map((key) => value[key]);
}

// ============================================================================
// Results (wire -> domain)
// ============================================================================

export function poseFromWire(value: unknown, path: string = ''): Pose {
  const record = expectRecord(value, path);
  return {
    x: readNumber(record, 'x', path),
    y: readNumber(record, 'y', path),
    z: readNumber(record, 'z', path),
    roll: readNumber(record, 'roll', path),
    pitch: readNumber(record, 'pitch', path),
    yaw: readNumber(record, 'yaw', path),
  };
}

export function jointsFromWire(value: unknown, path: string = ''): Joints {
  const record = expectRecord(value, path);
  return {
    j1: readNumber(record, 'j1', path),
    j2: readNumber(record, 'j2', path),
    j3: readNumber(record, 'j3', path),
    j4: readNumber(record, 'j4', path),
    j5: readNumber(record, 'j5', path),
    j6: readNumber(record, 'j6', path),
  };
}

export function pointFromWire(value: unknown, path: string = ''): Point {
  const record = expectRecord(value, path);
  return {
    x: readNumber(record, 'x', path),
    y: readNumber(record, 'y', path),
  };
}

export function aprilTagFromWire(value: unknown, path: string = ''): AprilTag {
  const record = expectRecord(value, path);
  return {
    id: readInteger(record, 'id', path),
    center: pointFromWire(record.center, fieldPath(path, 'center')),
    corners: listFromWire(record.corners, pointFromWire, fieldPath(path, 'corners')),
    offset: poseFromWire(record.offset, fieldPath(path, 'offset')),
  };
}

export function statusFromWire(value: unknown, path: string = ''): Status {
  const record = expectRecord(value, path);
  const status: Status = {
    mode: readEnum(record, 'mode', Mode, path),
    status: readString(record, 'status', path),
  };
  const errorMessage = readOptionalString(record, 'error_message', path);
  return errorMessage === undefined ? status : { ...status, errorMessage };
}

export function trainingEpisodeFromWire(value: unknown, path: string = ''): TrainingEpisode {
  const record = expectRecord(value, path);
  return {
    id: readString(record, 'id', path),
    taskName: readString(record, 'task_name', path),
    durationSeconds: readNumber(record, 'duration_seconds', path),
    createdAt: readString(record, 'created_at', path),
  };
}

export function taskTrainingFromWire(value: unknown, path: string = ''): TaskTraining {
  const record = expectRecord(value, path);
  return {
    id: readString(record, 'id', path),
    taskName: readString(record, 'task_name', path),
    trainingName: readString(record, 'training_name', path),
    model: readEnum(record, 'model', AIModel, path),
    trainingEpisodeCount: readInteger(record, 'training_episode_count', path),
    status: readString(record, 'status', path),
    createdAt: readString(record, 'created_at', path),
  };
}

/**
 * Decodes a list whose items are decoded with `decode`. Item paths are
 * `path[i]`.
 */
export function listFromWire<T>(
  value: unknown,
  decode: (item: unknown, path: string) => T,
  path: string = ''
): T[] {
  return expectArray(value, path).map((item, index) => decode(item, `${path}[${index}]`));
}

export function booleanFromWire(value: unknown, path: string = ''): boolean {
  if (typeof value !== 'boolean') {
    fail('a boolean', path, value);
  }
  return value;
}

export function recordListFromWire(value: unknown, path: string = ''): EpisodeMetadata[] {
  return listFromWire(value, (item, itemPath) => ({ ...expectRecord(item, itemPath) }), path);
}
