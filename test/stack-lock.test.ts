/**
 * Tests for the per-stack lock file
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { acquireStackLock, getLockPath, withStackLock } from '../src/utils/stack-lock';
import { StackLockedError } from '../src/utils/errors';

let baseDir: string;

beforeEach(() => {
  baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aistack-lock-test-'));
});

afterEach(() => {
  fs.rmSync(baseDir, { recursive: true, force: true });
});

describe('acquireStackLock', () => {
  test('writes the lock file and removes it on release', () => {
    const lock = acquireStackLock('demo', 'deploy', baseDir);

    expect(lock.lockPath).toBe(path.join(baseDir, 'aistack-locks', 'demo.lock'));
    expect(fs.readFileSync(lock.lockPath, 'utf8')).toMatch(/^deploy \(pid \d+, /);

    lock.release();
    expect(fs.existsSync(lock.lockPath)).toBe(false);
  });

  test('refuses a second holder for the same stack', () => {
    const lock = acquireStackLock('demo', 'deploy', baseDir);

    expect(() => acquireStackLock('demo', 'cleanup', baseDir)).toThrow(StackLockedError);
    expect(() => acquireStackLock('other', 'cleanup', baseDir).release()).not.toThrow();

    lock.release();
    expect(() => acquireStackLock('demo', 'cleanup', baseDir).release()).not.toThrow();
  });
});

describe('withStackLock', () => {
  test('releases the lock when the operation throws', async () => {
    await expect(
      withStackLock(
        'demo',
        'deploy',
        async () => {
          throw new Error('launch failed');
        },
        baseDir
      )
    ).rejects.toThrow('launch failed');

    expect(fs.existsSync(getLockPath('demo', baseDir))).toBe(false);
  });

  test('returns the operation result', async () => {
    expect(await withStackLock('demo', 'deploy', async () => 42, baseDir)).toBe(42);
  });
});
