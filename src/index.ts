// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

// Re-export standardized error types and codes
export {
  ErrorCode,
  ErrorCodeName,
  ArmlinkError,
  ConnectionError,
  DisconnectedError,
  RpcError,
  TimeoutError,
  CancelledError,
  MalformedResponseError,
  DuplicateRequestError,
  isErrorCode,
  wrapError,
} from "./errors.js";
export type { ErrorCodeType } from "./errors.js";

// Wire codec
export {
  JSONRPC_VERSION,
  createRequest,
  encodeRequest,
  decodeRequest,
  encodeResponse,
  decodeResponse,
  isErrorEnvelope,
} from "./codec.js";
export type {
  RpcParams,
  RequestEnvelope,
  ResponseEnvelope,
  SuccessEnvelope,
  ErrorEnvelope,
  RpcErrorObject,
} from "./codec.js";

// Call tracking, connection and client
export { PendingCallRegistry } from "./registry.js";
export type { PendingCall, PendingCallRegistryOptions } from "./registry.js";
export { ConnectionManager } from "./connection.js";
export type {
  ConnectionState,
  ConnectionStateCallback,
  DisconnectCallback,
  ConnectionManagerOptions,
} from "./connection.js";
export { RpcClient } from "./client.js";
export type { CallOptions, RpcClientOptions } from "./client.js";

// Transports
export { BaseTransport } from "./transports/base.js";
export type { RpcTransport, TransportFactory } from "./transports/base.js";
export { WebSocketTransport, connectWebSocket, webSocketTransportFactory } from "./websocket.js";
export type { WebSocketConnectOptions } from "./websocket.js";

// Arm API
export { ArmClient } from "./arm.js";
export { Mode, AIModel, POSE_KEYS, JOINT_KEYS, pose, joints } from "./types.js";
export type {
  Pose,
  Joints,
  Point,
  AprilTag,
  Status,
  TrainingEpisode,
  TaskTraining,
  EpisodeMetadata,
} from "./types.js";
export {
  poseToWire,
  jointsToWire,
  poseFromWire,
  jointsFromWire,
  pointFromWire,
  aprilTagFromWire,
  statusFromWire,
  trainingEpisodeFromWire,
  taskTrainingFromWire,
  listFromWire,
  booleanFromWire,
  recordListFromWire,
} from "./marshal.js";

// Configuration and logging
export {
  DEFAULT_CONFIG,
  ConfigError,
  configure,
  getConfig,
  resetConfig,
  resolveConfig,
  configFromEnv,
  loadConfigFile,
  parseConfigFile,
  endpointUrl,
} from "./config.js";
export type { ArmlinkConfig, ProfileFile, ResolveConfigOptions, Environment } from "./config.js";
export { createConsoleLogger, consoleLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Keyboard teleoperation
export {
  TeleopInput,
  computeTeleopFrame,
  initialTeleopState,
  runKeyboardTeleop,
  attachTerminalKeys,
} from "./teleop.js";
export type { TeleopState, TeleopFrame, KeyboardTeleopOptions, KeyStream } from "./teleop.js";
