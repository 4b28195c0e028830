#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   armlink --help
 *   armlink status
 *   ARMLINK_HOST=192.168.1.40 armlink teleop
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import pc from 'picocolors';

import { createProgram } from './program.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Reads the version from package.json, two levels up from both src/cli and
 * dist/cli.
 */
function readVersion(): string {
  const packageJsonPath = path.resolve(__dirname, '../../package.json');
  if (!fs.existsSync(packageJsonPath)) {
    return '0.0.0';
  }
  const pkg: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

createProgram({ version: readVersion() })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(pc.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
