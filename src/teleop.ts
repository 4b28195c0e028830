/**
 * Keyboard teleoperation
 *
 * A fixed-rate loop turns the set of held keys into `teleop` steps. Key state
 * lives in a `TeleopInput`, fed from a terminal by `attachTerminalKeys()` or
 * directly by tests.
 */

import * as readline from 'readline';
import type { ArmClient } from './arm.js';
import { type Logger, consoleLogger } from './logger.js';

/** mm per frame */
export const TRANSLATION_STEP = 1.0;
/** degrees per frame */
export const ROTATION_STEP = 0.5;
export const STROKE_DEBOUNCE_MS = 1000;
export const DEFAULT_HOLD_MS = 500;
export const DEFAULT_INTERVAL_MS = 10;

export const SPACE = 'space';

type AxisMove = readonly [axis: number, direction: 1 | -1];

/** Translation keys: x, y, z */
export const TRANSLATION_KEYS: Readonly<Record<string, AxisMove>> = {
  w: [1, -1],
  s: [1, 1],
  a: [0, -1],
  d: [0, 1],
  e: [2, -1],
  q: [2, 1],
};

/** Rotation keys: roll, pitch, yaw */
export const ROTATION_KEYS: Readonly<Record<string, AxisMove>> = {
  j: [1, -1],
  l: [1, 1],
  i: [0, 1],
  k: [0, -1],
  u: [2, -1],
  o: [2, 1],
};

/** Stroke change in percent per debounce window */
export const STROKE_KEYS: Readonly<Record<string, number>> = {
  v: 10,
  b: -10,
};

/**
 * Keys currently held.
 *
 * Terminals report key presses (repeated while a key is held) but not
 * releases, so a key counts as held until `holdMs` after its last press.
 * The default spans the delay before a terminal starts auto-repeating.
 */
export class TeleopInput {
  readonly holdMs: number;
  #lastPress = new Map<string, number>();

  constructor(options: { holdMs?: number } = {}) {
    this.holdMs = options.holdMs ?? DEFAULT_HOLD_MS;
  }

  press(key: string, now: number): void {
    this.#lastPress.set(key, now);
  }

  release(key: string): void {
    this.#lastPress.delete(key);
  }

  isPressed(key: string, now: number): boolean {
    const at = this.#lastPress.get(key);
    return at !== undefined && now - at <= this.holdMs;
  }
}

export interface TeleopState {
  /** Stroke the operator has dialled in, 0-100 */
  readonly toolStroke: number;
  /** Stroke last accepted by the arm */
  readonly sentToolStroke: number;
  readonly lastStrokeChangeAt: number;
}

export interface TeleopFrame {
  /** x, y, z in mm, roll, pitch, yaw in degrees */
  readonly poseDelta: number[];
  /** New stroke to send, or null when unchanged */
  readonly toolStroke: number | null;
  readonly state: TeleopState;
}

export function initialTeleopState(): TeleopState {
  return { toolStroke: 0, sentToolStroke: 0, lastStrokeChangeAt: Number.NEGATIVE_INFINITY };
}

/**
 * Computes one frame from the held keys.
 *
 * At most one stroke change (`v`, `b`, then space) is applied per debounce
 * window.
 */
export function computeTeleopFrame(input: TeleopInput, state: TeleopState, now: number): TeleopFrame {
  const poseDelta = [0, 0, 0, 0, 0, 0];

  for (const [key, [axis, direction]] of Object.entries(TRANSLATION_KEYS)) {
    if (input.isPressed(key, now)) {
      poseDelta[axis] += direction * TRANSLATION_STEP;
    }
  }
  for (const [key, [axis, direction]] of Object.entries(ROTATION_KEYS)) {
    if (input.isPressed(key, now)) {
      poseDelta[axis + 3] += direction * ROTATION_STEP;
    }
  }

  let toolStroke = state.toolStroke;
  let lastStrokeChangeAt = state.lastStrokeChangeAt;
  const debounced = () => now - lastStrokeChangeAt > STROKE_DEBOUNCE_MS;

  for (const [key, step] of Object.entries(STROKE_KEYS)) {
    if (input.isPressed(key, now) && debounced()) {
      toolStroke += step;
      lastStrokeChangeAt = now;
    }
  }
  if (input.isPressed(SPACE, now) && debounced()) {
    toolStroke = toolStroke === 0 ? 100 : 0;
    lastStrokeChangeAt = now;
  }
  toolStroke = Math.max(0, Math.min(toolStroke, 100));

  return {
    poseDelta,
    toolStroke: toolStroke === state.sentToolStroke ? null : toolStroke,
    state: { toolStroke, sentToolStroke: state.sentToolStroke, lastStrokeChangeAt },
  };
}

export interface KeyboardTeleopOptions {
  input: TeleopInput;
  /** Stops the loop when aborted */
  signal: AbortSignal;
  intervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Sends a `teleop` step every `intervalMs` while any motion key is held or
 * the stroke changed. A failed step is logged and the loop carries on.
 */
export async function runKeyboardTeleop(
  arm: Pick<ArmClient, 'teleop'>,
  options: KeyboardTeleopOptions
): Promise<void> {
  const { input, signal } = options;
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? consoleLogger;

  let state = initialTeleopState();
  while (!signal.aborted) {
    const frame = computeTeleopFrame(input, state, now());
    state = frame.state;

    if (frame.poseDelta.some((value) => value !== 0) || frame.toolStroke !== null) {
      try {
        await arm.teleop(frame.poseDelta, frame.toolStroke);
        state = { ...state, sentToolStroke: state.toolStroke };
      } catch (err) {
        logger.error(`Teleop step failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    await delay(intervalMs, signal);
  }
}

/**
 * Readable side of a terminal; `process.stdin` in practice.
 */
export type KeyStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/**
 * Feeds key presses from `stream` into `input`. Escape or Ctrl-C calls
 * `onExit`.
 *
 * @returns A function that detaches the listener and restores the terminal
 */
export function attachTerminalKeys(
  stream: KeyStream,
  input: TeleopInput,
  onExit: () => void,
  now: () => number = Date.now
): () => void {
  readline.emitKeypressEvents(stream);
  const raw = stream.isTTY === true && stream.setRawMode !== undefined;
  if (raw) stream.setRawMode?.(true);

  const onKeypress = (_text: string | undefined, key: readline.Key | undefined) => {
    const name = key?.name;
    if (!name) return;
    if (name === 'escape' || (key?.ctrl === true && name === 'c')) {
      onExit();
      return;
    }
    input.press(name.toLowerCase(), now());
  };
  stream.on('keypress', onKeypress);

  return () => {
    stream.removeListener('keypress', onKeypress);
    if (raw) stream.setRawMode?.(false);
  };
}

export const TELEOP_HELP = `Keyboard control (Esc to stop)
A key keeps acting for half a second after it is let go.

Translation (mm/frame):
  w/s : up / down
  a/d : left / right
  q/e : forward / backward

Rotation (deg/frame):
  j/l : rotate left / rotate right
  i/k : tilt up / tilt down
  u/o : turn clockwise / turn counterclockwise

Tool stroke:
  v/b   : open / close
  space : toggle open / closed
`;
