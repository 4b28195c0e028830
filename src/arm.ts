/**
 * ArmClient - typed method catalogue for the robot arm
 *
 * Each method maps onto one JSON-RPC method with stable wire names and
 * parameter keys. Optional parameters the caller leaves out are sent as
 * `null`; the server expects every key to be present.
 */

import { type CallOptions, RpcClient } from './client.js';
import type { RpcParams } from './codec.js';
import { type ArmlinkConfig, endpointUrl, getConfig } from './config.js';
import type { Logger } from './logger.js';
import type { TransportFactory } from './transports/base.js';
import {
  aprilTagFromWire,
  booleanFromWire,
  jointsFromWire,
  jointsToWire,
  listFromWire,
  poseFromWire,
  poseToWire,
  recordListFromWire,
  statusFromWire,
  taskTrainingFromWire,
  trainingEpisodeFromWire,
} from './marshal.js';
import {
  AIModel,
  type AprilTag,
  type EpisodeMetadata,
  type Joints,
  type Mode,
  type Pose,
  type Status,
  type TaskTraining,
  type TrainingEpisode,
} from './types.js';

/**
 * Client for the arm's WebSocket API.
 *
 * @example
 * ```ts
 * const arm = new ArmClient(new RpcClient({ url: 'ws://localhost:8000/ws' }));
 * await arm.setSpeed(50);
 * const current = await arm.getToolPose();
 * await arm.setToolPose({ ...current, z: current.z + 10 });
 * ```
 */
export class ArmClient {
  constructor(readonly rpc: RpcClient) {}

  /**
   * Builds a client for the configured endpoint; see `configure()`.
   */
  static fromConfig(
    config: ArmlinkConfig = getConfig(),
    options: { logger?: Logger; transportFactory?: TransportFactory } = {}
  ): ArmClient {
    return new ArmClient(
      new RpcClient({
        url: endpointUrl(config),
        timeoutMs: config.timeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
        logger: options.logger,
        transportFactory: options.transportFactory,
      })
    );
  }

  connect(): Promise<void> {
    return this.rpc.connect();
  }

  disconnect(): Promise<void> {
    return this.rpc.disconnect();
  }

  async #call(method: string, params: RpcParams = {}, options?: CallOptions): Promise<unknown> {
    return this.rpc.invoke(method, params, options);
  }

  async #command(method: string, params: RpcParams = {}, options?: CallOptions): Promise<void> {
    await this.rpc.invoke(method, params, options);
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  setMode(mode: Mode, options?: CallOptions): Promise<void> {
    return this.#command('set_mode', { mode }, options);
  }

  /**
   * @param percent - Sensitivity percentage (0-100)
   */
  setCollisionSensitivity(percent: number, options?: CallOptions): Promise<void> {
    return this.#command('set_collision_sensitivity', { percent }, options);
  }

  /**
   * @param percent - Speed percentage (0-100)
   */
  setSpeed(percent: number, options?: CallOptions): Promise<void> {
    return this.#command('set_speed', { percent }, options);
  }

  // ==========================================================================
  // State
  // ==========================================================================

  async getStatus(options?: CallOptions): Promise<Status> {
    return statusFromWire(await this.#call('get_status', {}, options));
  }

  async getJointAngles(options?: CallOptions): Promise<Joints> {
    return jointsFromWire(await this.#call('get_joint_angles', {}, options));
  }

  async getToolPose(options?: CallOptions): Promise<Pose> {
    return poseFromWire(await this.#call('get_tool_pose', {}, options));
  }

  // ==========================================================================
  // Motion
  // ==========================================================================

  /**
   * @param isOffset - Treat `angles` as an offset from the current angles
   */
  setJointAngles(angles: Joints, isOffset: boolean = false, options?: CallOptions): Promise<void> {
    return this.#command('set_joint_angles', { angles: jointsToWire(angles), is_offset: isOffset }, options);
  }

  /**
   * @param isOffset - Treat `pose` as an offset from the current tool pose
   */
  setToolPose(pose: Pose, isOffset: boolean = false, options?: CallOptions): Promise<void> {
    return this.#command('set_tool_pose', { pose: poseToWire(pose), is_offset: isOffset }, options);
  }

  /**
   * @param radius - Arc radius in mm
   */
  moveArc(radius: number, pose: Pose, isOffset: boolean = false, options?: CallOptions): Promise<void> {
    return this.#command('move_arc', { radius, pose: poseToWire(pose), is_offset: isOffset }, options);
  }

  /**
   * Streams a joint target at `frequency` Hz, optionally driving the gripper.
   * Stroke and force are percentages (0-100).
   */
  streamJointAngles(
    frequency: number,
    angles: Joints,
    toolStroke?: number,
    toolForce?: number,
    options?: CallOptions
  ): Promise<void> {
    return this.#command(
      'stream_joint_angles',
      {
        frequency,
        joint_angles: jointsToWire(angles),
        tool_stroke: toolStroke ?? null,
        tool_force: toolForce ?? null,
      },
      options
    );
  }

  /**
   * One teleoperation step: a pose offset (mm / degrees) applied to the
   * tool, and optionally a new stroke percentage.
   */
  teleop(poseOffset: readonly number[], toolStroke?: number | null, options?: CallOptions): Promise<void> {
    return this.#command('teleop', { pose_offset: [...poseOffset], tool_stroke: toolStroke ?? null }, options);
  }

  // ==========================================================================
  // Gripper
  // ==========================================================================

  openTool(options?: CallOptions): Promise<void> {
    return this.#command('open_tool', {}, options);
  }

  closeTool(options?: CallOptions): Promise<void> {
    return this.#command('close_tool', {}, options);
  }

  /**
   * @param stroke - Stroke percentage (0-100)
   * @param force - Force percentage (0-100)
   */
  setToolStroke(stroke: number, force: number = 0, options?: CallOptions): Promise<void> {
    return this.#command('set_tool_stroke', { stroke, force }, options);
  }

  // ==========================================================================
  // Vision
  // ==========================================================================

  async detectAprilTags(options?: CallOptions): Promise<AprilTag[]> {
    return listFromWire(await this.#call('detect_april_tags', {}, options), aprilTagFromWire);
  }

  /**
   * Aligns the tool with tag `id`. Without `poseOffset` the tool centres on
   * the tag.
   */
  alignWithAprilTag(id: number, poseOffset?: Pose, options?: CallOptions): Promise<void> {
    return this.#command(
      'align_with_apriltag',
      { id, pose_offset: poseOffset ? poseToWire(poseOffset) : null },
      options
    );
  }

  async detectPoses(objectName: string, options?: CallOptions): Promise<Pose[]> {
    return listFromWire(await this.#call('detect_poses', { object_name: objectName }, options), poseFromWire);
  }

  /**
   * Asks the server a yes/no question about the current camera view.
   */
  async verifyScene(question: string, options?: CallOptions): Promise<boolean> {
    return booleanFromWire(await this.#call('verify_scene', { question }, options));
  }

  // ==========================================================================
  // Episodes, training and inference
  // ==========================================================================

  async recordEpisode(taskName: string, durationSeconds: number, options?: CallOptions): Promise<TrainingEpisode> {
    return trainingEpisodeFromWire(
      await this.#call('record_episode', { task_name: taskName, duration_seconds: durationSeconds }, options)
    );
  }

  replayEpisode(taskName: string, id: string, options?: CallOptions): Promise<void> {
    return this.#command('replay_episode', { task_name: taskName, id }, options);
  }

  deleteEpisode(taskName: string, id: string, options?: CallOptions): Promise<void> {
    return this.#command('delete_episode', { task_name: taskName, id }, options);
  }

  async listEpisodes(taskName: string, options?: CallOptions): Promise<EpisodeMetadata[]> {
    return recordListFromWire(await this.#call('list_episodes', { task_name: taskName }, options));
  }

  train(taskName: string, trainingName: string, model: AIModel = AIModel.PI0, options?: CallOptions): Promise<void> {
    return this.#command('train', { task_name: taskName, training_name: trainingName, model }, options);
  }

  /**
   * Lists trainings, all of them or only those of `taskName`.
   */
  async listTrainings(taskName?: string, options?: CallOptions): Promise<TaskTraining[]> {
    return listFromWire(
      await this.#call('list_trainings', { task_name: taskName ?? null }, options),
      taskTrainingFromWire
    );
  }

  /**
   * Runs a trained policy. An empty `trainingName` selects the latest
   * training of the task.
   */
  runTask(taskName: string, trainingName: string = '', options?: CallOptions): Promise<void> {
    return this.#command('run_task', { task_name: taskName, training_name: trainingName }, options);
  }
}
