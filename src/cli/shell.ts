import * as repl from 'repl';
import type { Readable, Writable } from 'stream';

import type { ArmClient } from '../arm.js';
import * as armlink from '../index.js';

const BANNER = `armlink shell
=============
Available variables:
- arm     ArmClient
- client  RpcClient behind it
- armlink the library exports

Example usage:
> await arm.getJointAngles()
> await client.invoke('get_status')
`;

export interface ShellOptions {
  input?: Readable;
  output?: Writable;
  /** Where the banner goes */
  write?: (text: string) => void;
}

/**
 * Starts a REPL with the arm in scope. Top-level `await` works at the
 * prompt. Resolves when the session ends.
 */
export function startShell(arm: ArmClient, options: ShellOptions = {}): Promise<void> {
  (options.write ?? ((text: string) => process.stdout.write(text)))(BANNER);

  const server = repl.start({
    prompt: 'armlink> ',
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
  });
  server.context.arm = arm;
  server.context.client = arm.rpc;
  server.context.armlink = armlink;

  return new Promise((resolve) => {
    server.on('exit', () => resolve());
  });
}
