/**
 * Domain value types exchanged with the arm.
 *
 * All of these are plain immutable records; see `marshal.ts` for their wire
 * shapes.
 */

/**
 * Operating mode of the arm.
 */
export const Mode = {
  DRAG: 'drag',
  TELEOPERATION: 'teleoperation',
  AUTONOMOUS: 'autonomous',
} as const;

export type Mode = (typeof Mode)[keyof typeof Mode];

/**
 * Policy architectures the server can train.
 */
export const AIModel = {
  PI0: 'PI0',
  PI0_FAST: 'PI0_FAST',
  ACT: 'ACT',
  DIFFUSION: 'DIFFUSION',
  TDMPC: 'TDMPC',
  VQBET: 'VQBET',
} as const;

export type AIModel = (typeof AIModel)[keyof typeof AIModel];

/**
 * Tool pose: position in mm, orientation in degrees.
 */
export interface Pose {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly roll: number;
  readonly pitch: number;
  readonly yaw: number;
}

/**
 * Joint angles in degrees, base to wrist.
 */
export interface Joints {
  readonly j1: number;
  readonly j2: number;
  readonly j3: number;
  readonly j4: number;
  readonly j5: number;
  readonly j6: number;
}

/**
 * Image-space point in pixels.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface AprilTag {
  readonly id: number;
  readonly center: Point;
  readonly corners: readonly Point[];
  /** Pose of the tag relative to the tool */
  readonly offset: Pose;
}

export interface Status {
  readonly mode: Mode;
  readonly status: string;
  readonly errorMessage?: string;
}

export interface TrainingEpisode {
  readonly id: string;
  readonly taskName: string;
  readonly durationSeconds: number;
  readonly createdAt: string;
}

export interface TaskTraining {
  readonly id: string;
  readonly taskName: string;
  readonly trainingName: string;
  readonly model: AIModel;
  readonly trainingEpisodeCount: number;
  readonly status: string;
  readonly createdAt: string;
}

/**
 * Episode metadata as listed by the server. Its fields are not fixed, so it
 * is passed through as-is.
 */
export type EpisodeMetadata = Readonly<Record<string, unknown>>;

export const POSE_KEYS = ['x', 'y', 'z', 'roll', 'pitch', 'yaw'] as const;
export const JOINT_KEYS = ['j1', 'j2', 'j3', 'j4', 'j5', 'j6'] as const;

export function pose(x: number, y: number, z: number, roll: number, pitch: number, yaw: number): Pose {
  return { x, y, z, roll, pitch, yaw };
}

export function joints(j1: number, j2: number, j3: number, j4: number, j5: number, j6: number): Joints {
  return { j1, j2, j3, j4, j5, j6 };
}
