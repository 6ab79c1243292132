/**
 * Stack Lock
 *
 * Deploy and cleanup must never run against the same stack at the same
 * time: a cleanup could delete the security group a launch is about to use.
 * Each acquires an exclusive lock file keyed on the stack name.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { StackLockedError, errorMessage } from './errors.js';

export interface StackLock {
  stackName: string;
  lockPath: string;
  release(): void;
}

export function getLockDir(baseDir: string = os.tmpdir()): string {
  return path.join(baseDir, 'aistack-locks');
}

export function getLockPath(stackName: string, baseDir?: string): string {
  return path.join(getLockDir(baseDir), `${stackName}.lock`);
}

function readLockHolder(lockPath: string): string {
  try {
    return fs.readFileSync(lockPath, 'utf8').trim() || 'another process';
  } catch (e) {
    // Released between open and read
    return `another process (${errorMessage(e)})`;
  }
}

/**
 * Take the lock for a stack.
 *
 * @param operation - Recorded in the lock file so a blocked caller can see who holds it
 * @throws StackLockedError when the lock file already exists
 */
export function acquireStackLock(stackName: string, operation: string, baseDir?: string): StackLock {
  const lockPath = getLockPath(stackName, baseDir);
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  let fd: number;
  try {
    fd = fs.openSync(lockPath, 'wx');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'EEXIST') {
      throw new StackLockedError(stackName, readLockHolder(lockPath));
    }
    throw e;
  }

  fs.writeSync(fd, `${operation} (pid ${process.pid}, ${new Date().toISOString()})\n`);
  fs.closeSync(fd);

  let released = false;
  return {
    stackName,
    lockPath,
    release(): void {
      if (released) return;
      released = true;
      fs.rmSync(lockPath, { force: true });
    },
  };
}

/**
 * Run fn while holding the stack lock; the lock is released however fn ends
 */
export async function withStackLock<T>(
  stackName: string,
  operation: string,
  fn: () => Promise<T>,
  baseDir?: string
): Promise<T> {
  const lock = acquireStackLock(stackName, operation, baseDir);
  try {
    return await fn();
  } finally {
    lock.release();
  }
}
