/**
 * `armlink` command line
 *
 * Usage:
 *   armlink status
 *   armlink --host 192.168.1.40 set-speed 50
 *   armlink --profile lab --config armlink.yaml set-pose 300 0 200 180 0 90
 *   armlink set-joints --offset -- 0 -5 0 0 0 0
 */

import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';

import { ArmClient } from '../arm.js';
import { type ArmlinkConfig, type Environment, resolveConfig } from '../config.js';
import { type Logger, consoleLogger } from '../logger.js';
import { type KeyStream, TELEOP_HELP, TeleopInput, attachTerminalKeys, runKeyboardTeleop } from '../teleop.js';
import { AIModel, JOINT_KEYS, Mode, POSE_KEYS, type Joints, type Pose } from '../types.js';
import { startShell } from './shell.js';

export interface ProgramOptions {
  /** Builds the client for a resolved config; tests pass one over a fake transport */
  createArm?: (config: ArmlinkConfig) => ArmClient;
  out?: (text: string) => void;
  err?: (text: string) => void;
  /** Defaults to whether the terminal supports colour */
  color?: boolean;
  env?: Environment;
  version?: string;
  stdin?: KeyStream;
  logger?: Logger;
}

interface GlobalOptions {
  host?: string;
  port?: number;
  path?: string;
  profile?: string;
  config?: string;
  timeout?: number;
}

// ============================================================================
// Argument parsers
// ============================================================================

function parseNumberArg(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

function parseIntegerArg(value: string): number {
  const parsed = parseNumberArg(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

function parseChoice<T extends string>(allowed: Record<string, T>, value: string): T {
  const match = Object.values(allowed).find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidArgumentError(`Expected one of ${Object.values(allowed).join(', ')}`);
  }
  return match;
}

function parseVector(values: readonly string[], what: string): number[] {
  if (values.length !== 6) {
    throw new InvalidArgumentError(`Expected 6 values for ${what}, got ${values.length}`);
  }
  return values.map(parseNumberArg);
}

function toPose(values: readonly string[]): Pose {
  const [x, y, z, roll, pitch, yaw] = parseVector(values, POSE_KEYS.join(' '));
  return { x, y, z, roll, pitch, yaw };
}

function toJoints(values: readonly string[]): Joints {
  const [j1, j2, j3, j4, j5, j6] = parseVector(values, JOINT_KEYS.join(' '));
  return { j1, j2, j3, j4, j5, j6 };
}

// ============================================================================
// Program
// ============================================================================

/**
 * Builds the `armlink` program. Each command connects, performs one call,
 * prints the result and disconnects.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const createArm = options.createArm ?? ((config: ArmlinkConfig) => ArmClient.fromConfig(config));
  const out = options.out ?? ((text: string) => process.stdout.write(text));
  const err = options.err ?? ((text: string) => process.stderr.write(text));
  const c = pc.createColors(options.color ?? pc.isColorSupported);
  const logger = options.logger ?? consoleLogger;

  const program = new Command();

  program
    .name('armlink')
    .description('Control a robot arm over its WebSocket JSON-RPC API')
    .version(options.version ?? '0.0.0')
    .option('--host <host>', 'Server host')
    .option('--port <port>', 'Server port', parseIntegerArg)
    .option('--path <path>', 'WebSocket endpoint path')
    .option('--profile <name>', 'Profile from the config file')
    .option('-c, --config <file>', 'YAML config file with profiles')
    .option('--timeout <ms>', 'Per-call timeout in milliseconds (0 for none)', parseIntegerArg)
    .configureOutput({ writeOut: out, writeErr: err });

  const printJson = (value: unknown): void => {
    out(`${JSON.stringify(value, null, 2)}\n`);
  };
  const done = (message: string): void => {
    out(`${c.green(message)}\n`);
  };

  /**
   * Resolves the config, runs `action` against a connected arm and reports
   * any failure as `Error: <message>` with exit code 1.
   */
  const run = async (action: (arm: ArmClient) => Promise<void>): Promise<void> => {
    let arm: ArmClient | undefined;
    try {
      const opts = program.opts<GlobalOptions>();
      const config = resolveConfig({
        file: opts.config,
        profile: opts.profile,
        env: options.env,
        overrides: { host: opts.host, port: opts.port, path: opts.path, timeoutMs: opts.timeout },
      });
      arm = createArm(config);
      await action(arm);
    } catch (error) {
      err(`${c.red(`Error: ${error instanceof Error ? error.message : String(error)}`)}\n`);
      process.exitCode = 1;
    } finally {
      await arm?.disconnect();
    }
  };

  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  program
    .command('status')
    .description('Show mode and status')
    .action(() => run(async (arm) => printJson(await arm.getStatus())));

  program
    .command('joints')
    .description('Show joint angles in degrees')
    .action(() => run(async (arm) => printJson(await arm.getJointAngles())));

  program
    .command('pose')
    .description('Show the tool pose')
    .action(() => run(async (arm) => printJson(await arm.getToolPose())));

  // --------------------------------------------------------------------------
  // Configuration
  // --------------------------------------------------------------------------

  program
    .command('set-mode')
    .description('Set the operating mode')
    .argument('<mode>', Object.values(Mode).join(' | '), (value: string) => parseChoice(Mode, value))
    .action((mode: Mode) =>
      run(async (arm) => {
        await arm.setMode(mode);
        done(`Mode set to ${mode}`);
      })
    );

  program
    .command('set-speed')
    .description('Set the motion speed')
    .argument('<percent>', 'Speed percentage (0-100)', parseNumberArg)
    .action((percent: number) =>
      run(async (arm) => {
        await arm.setSpeed(percent);
        done(`Speed set to ${percent}%`);
      })
    );

  program
    .command('set-collision-sensitivity')
    .description('Set the collision detection sensitivity')
    .argument('<percent>', 'Sensitivity percentage (0-100)', parseNumberArg)
    .action((percent: number) =>
      run(async (arm) => {
        await arm.setCollisionSensitivity(percent);
        done(`Collision sensitivity set to ${percent}%`);
      })
    );

  // --------------------------------------------------------------------------
  // Motion
  // --------------------------------------------------------------------------

  program
    .command('set-joints')
    .description('Move to joint angles (use -- before negative values)')
    .argument('<angles...>', JOINT_KEYS.join(' '))
    .option('--offset', 'Move relative to the current angles', false)
    .action((angles: string[], cmdOpts: { offset: boolean }) =>
      run(async (arm) => {
        await arm.setJointAngles(toJoints(angles), cmdOpts.offset);
        done(cmdOpts.offset ? 'Joint angles offset' : 'Joint angles set');
      })
    );

  program
    .command('set-pose')
    .description('Move the tool to a pose (use -- before negative values)')
    .argument('<values...>', POSE_KEYS.join(' '))
    .option('--offset', 'Move relative to the current pose', false)
    .action((values: string[], cmdOpts: { offset: boolean }) =>
      run(async (arm) => {
        await arm.setToolPose(toPose(values), cmdOpts.offset);
        done(cmdOpts.offset ? 'Tool pose offset' : 'Tool pose set');
      })
    );

  // --------------------------------------------------------------------------
  // Gripper
  // --------------------------------------------------------------------------

  program
    .command('open-tool')
    .description('Open the gripper')
    .action(() =>
      run(async (arm) => {
        await arm.openTool();
        done('Tool opened');
      })
    );

  program
    .command('close-tool')
    .description('Close the gripper')
    .action(() =>
      run(async (arm) => {
        await arm.closeTool();
        done('Tool closed');
      })
    );

  program
    .command('set-tool-stroke')
    .description('Set the gripper stroke')
    .argument('<stroke>', 'Stroke percentage (0-100)', parseNumberArg)
    .option('--force <percent>', 'Force percentage (0-100)', parseNumberArg, 0)
    .action((stroke: number, cmdOpts: { force: number }) =>
      run(async (arm) => {
        await arm.setToolStroke(stroke, cmdOpts.force);
        done(`Tool stroke set to ${stroke} with force ${cmdOpts.force}`);
      })
    );

  // --------------------------------------------------------------------------
  // Vision
  // --------------------------------------------------------------------------

  program
    .command('tags')
    .description('Detect AprilTags')
    .action(() => run(async (arm) => printJson(await arm.detectAprilTags())));

  program
    .command('align')
    .description('Align the tool with an AprilTag')
    .argument('<id>', 'Tag id', parseIntegerArg)
    .argument('[offset...]', `Optional pose offset: ${POSE_KEYS.join(' ')}`)
    .action((id: number, offset: string[]) =>
      run(async (arm) => {
        await arm.alignWithAprilTag(id, offset.length > 0 ? toPose(offset) : undefined);
        done(`Aligned with AprilTag ${id}`);
      })
    );

  program
    .command('detect-poses')
    .description('Detect poses of an object')
    .argument('<object>', 'Object name')
    .action((objectName: string) => run(async (arm) => printJson(await arm.detectPoses(objectName))));

  program
    .command('verify')
    .description('Ask a yes/no question about the scene')
    .argument('<question>', 'Question')
    .action((question: string) => run(async (arm) => printJson(await arm.verifyScene(question))));

  // --------------------------------------------------------------------------
  // Episodes, training and inference
  // --------------------------------------------------------------------------

  program
    .command('record')
    .description('Record a training episode')
    .argument('<task>', 'Task name')
    .argument('<seconds>', 'Duration in seconds', parseNumberArg)
    .action((task: string, seconds: number) => run(async (arm) => printJson(await arm.recordEpisode(task, seconds))));

  program
    .command('replay')
    .description('Replay a recorded episode')
    .argument('<task>', 'Task name')
    .argument('<id>', 'Episode id')
    .action((task: string, id: string) =>
      run(async (arm) => {
        await arm.replayEpisode(task, id);
        done(`Replaying episode ${id} of task '${task}'`);
      })
    );

  program
    .command('delete-episode')
    .description('Delete a recorded episode')
    .argument('<task>', 'Task name')
    .argument('<id>', 'Episode id')
    .action((task: string, id: string) =>
      run(async (arm) => {
        await arm.deleteEpisode(task, id);
        done(`Deleted episode ${id} of task '${task}'`);
      })
    );

  program
    .command('episodes')
    .description('List recorded episodes of a task')
    .argument('<task>', 'Task name')
    .action((task: string) => run(async (arm) => printJson(await arm.listEpisodes(task))));

  program
    .command('train')
    .description('Train a policy on the episodes of a task')
    .argument('<task>', 'Task name')
    .argument('<training>', 'Name for the training')
    .option(
      '--model <model>',
      Object.values(AIModel).join(' | '),
      (value: string) => parseChoice(AIModel, value),
      AIModel.PI0
    )
    .action((task: string, training: string, cmdOpts: { model: AIModel }) =>
      run(async (arm) => {
        await arm.train(task, training, cmdOpts.model);
        done(`Training '${training}' (${cmdOpts.model}) started on task '${task}'`);
      })
    );

  program
    .command('trainings')
    .description('List trainings')
    .argument('[task]', 'Only trainings of this task')
    .action((task: string | undefined) => run(async (arm) => printJson(await arm.listTrainings(task))));

  program
    .command('run')
    .description('Run a trained policy')
    .argument('<task>', 'Task name')
    .argument('[training]', 'Training name; the latest when omitted', '')
    .action((task: string, training: string) =>
      run(async (arm) => {
        await arm.runTask(task, training);
        done(training ? `Running task '${task}' with training '${training}'` : `Running task '${task}'`);
      })
    );

  // --------------------------------------------------------------------------
  // Interactive
  // --------------------------------------------------------------------------

  program
    .command('teleop')
    .description('Drive the arm from the keyboard')
    .action(() =>
      run(async (arm) => {
        const stdin = options.stdin ?? process.stdin;
        await arm.connect();

        const controller = new AbortController();
        const input = new TeleopInput();
        const detach = attachTerminalKeys(stdin, input, () => controller.abort());
        err(`${c.dim(TELEOP_HELP)}\n`);
        try {
          await runKeyboardTeleop(arm, { input, signal: controller.signal, logger });
        } finally {
          detach();
          stdin.pause();
        }
        err(`${c.dim('Keyboard control stopped')}\n`);
      })
    );

  program
    .command('shell')
    .description('Start an interactive shell with `arm` and `client` defined')
    .action(() => run((arm) => startShell(arm, { write: err })));

  return program;
}
