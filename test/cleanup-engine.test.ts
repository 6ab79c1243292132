/**
 * Tests for the resource cleanup engine
 */
import { CleanupEngine, mergeDiscovered, selectResourceTypes } from '../src/cleanup/cleanup-engine';
import { MissingParameterError } from '../src/utils/errors';
import { FakeStackResourceProvider, resource } from './helpers/fakes';

let provider: FakeStackResourceProvider;

beforeEach(() => {
  provider = new FakeStackResourceProvider();
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

function populateFullStack(): void {
  provider.byTag.instance = [resource('instance', 'i-1')];
  provider.byTag['security-group'] = [resource('security-group', 'sg-1', { name: 'test-1-sg' })];
  provider.byTag['efs-filesystem'] = [resource('efs-filesystem', 'fs-1')];
  provider.mountTargets['fs-1'] = [resource('efs-mount-target', 'fsmt-1', { parentId: 'fs-1' })];
  provider.byName['iam-role'] = [resource('iam-role', 'test-1-role')];
  provider.byName['instance-profile'] = [
    resource('instance-profile', 'test-1-instance-profile', { name: 'test-1-instance-profile' }),
  ];
  provider.profileRoles['test-1-instance-profile'] = ['test-1-role'];
  provider.byName['log-group'] = [resource('log-group', '/aws/aistack/test-1')];
  provider.byTag['key-pair'] = [resource('key-pair', 'key-0abc', { name: 'test-1-key' })];
  provider.byName['key-pair'] = [resource('key-pair', 'key-0abc', { name: 'test-1-key' })];
}

describe('selectResourceTypes', () => {
  test('returns every type in deletion order by default', () => {
    expect(selectResourceTypes()).toHaveLength(15);
    expect(selectResourceTypes()[0]).toBe('instance');
  });

  test('filters by category', () => {
    expect(selectResourceTypes(['storage'])).toEqual(['volume', 'efs-mount-target', 'efs-filesystem']);
    expect(selectResourceTypes(['compute'])).toEqual(['instance', 'spot-request', 'key-pair']);
  });
});

describe('mergeDiscovered', () => {
  test('keeps the first occurrence of each ID', () => {
    const merged = mergeDiscovered(
      [resource('volume', 'vol-1', { name: 'tagged' })],
      [resource('volume', 'vol-1', { name: 'named' }), resource('volume', 'vol-2')]
    );
    expect(merged.map((r) => `${r.resourceId}:${r.name ?? ''}`)).toEqual(['vol-1:tagged', 'vol-2:']);
  });
});

describe('CleanupEngine.cleanup', () => {
  test('deletes in dependency order', async () => {
    populateFullStack();

    const report = await new CleanupEngine(provider).cleanup('test-1', { force: true });

    expect(provider.events).toEqual([
      'delete:instance:i-1',
      'waitTerminated:i-1',
      'delete:security-group:sg-1',
      'delete:efs-mount-target:fsmt-1',
      'waitMountTargets:fs-1',
      'delete:efs-filesystem:fs-1',
      'removeRole:test-1-instance-profile:test-1-role',
      'delete:iam-role:test-1-role',
      'delete:instance-profile:test-1-instance-profile',
      'delete:log-group:/aws/aistack/test-1',
      'delete:key-pair:key-0abc',
    ]);
    expect(report.totals).toEqual({ deleted: 8, skipped: 0, failed: 0 });
    expect(report.counts['key-pair']).toEqual({ deleted: 1, skipped: 0, failed: 0 });
    expect(report.cancelled).toBe(false);
  });

  test('continues past a failed deletion and reports it', async () => {
    provider.byTag['security-group'] = [
      resource('security-group', 'sg-1'),
      resource('security-group', 'sg-2'),
      resource('security-group', 'sg-3'),
    ];
    provider.deleteFailures.set('sg-2', 'DependencyViolation');

    const report = await new CleanupEngine(provider).cleanup('test-1', { force: true });

    expect(report.totals).toEqual({ deleted: 2, skipped: 0, failed: 1 });
    expect(report.counts['security-group']).toEqual({ deleted: 2, skipped: 0, failed: 1 });
    expect(report.failures).toEqual([
      { resourceType: 'security-group', resourceId: 'sg-2', error: 'delete failed: DependencyViolation' },
    ]);
    expect(provider.deleted.map((r) => r.resourceId)).toEqual(['sg-1', 'sg-3']);
  });

  test('deletes a resource found by tag and by name once', async () => {
    provider.byTag['security-group'] = [resource('security-group', 'sg-1')];
    provider.byName['security-group'] = [resource('security-group', 'sg-1'), resource('security-group', 'sg-2')];

    const report = await new CleanupEngine(provider).cleanup('test-1', { force: true });

    expect(provider.events).toEqual(['delete:security-group:sg-1', 'delete:security-group:sg-2']);
    expect(report.totals.deleted).toBe(2);
  });

  test('skips a security group that is still referenced', async () => {
    provider.byTag['security-group'] = [resource('security-group', 'sg-1')];
    provider.securityGroupsInUse.add('sg-1');

    const report = await new CleanupEngine(provider).cleanup('test-1', { force: true });

    expect(report.totals).toEqual({ deleted: 0, skipped: 1, failed: 0 });
    expect(provider.deleted).toEqual([]);
  });

  test('dry run deletes nothing', async () => {
    populateFullStack();

    const report = await new CleanupEngine(provider).cleanup('test-1', { dryRun: true });

    expect(provider.events).toEqual([]);
    expect(report.dryRun).toBe(true);
    expect(report.totals).toEqual({ deleted: 0, skipped: 8, failed: 0 });
    expect(report.counts['key-pair']).toEqual({ deleted: 0, skipped: 1, failed: 0 });
  });

  test('asks once and stops when declined', async () => {
    populateFullStack();
    const prompts: string[] = [];
    const engine = new CleanupEngine(provider, {
      confirm: async (message) => {
        prompts.push(message);
        return false;
      },
    });

    const report = await engine.cleanup('test-1');

    expect(prompts).toEqual(['This will delete 8 resource(s) of stack test-1.']);
    expect(report.cancelled).toBe(true);
    expect(provider.events).toEqual([]);
  });

  test('force skips the prompt', async () => {
    provider.byTag.volume = [resource('volume', 'vol-1')];
    const confirm = jest.fn(async () => false);

    const report = await new CleanupEngine(provider, { confirm }).cleanup('test-1', { force: true });

    expect(confirm).not.toHaveBeenCalled();
    expect(report.totals.deleted).toBe(1);
  });

  test('does not prompt when nothing is found', async () => {
    const confirm = jest.fn(async () => true);

    const report = await new CleanupEngine(provider, { confirm }).cleanup('test-1');

    expect(confirm).not.toHaveBeenCalled();
    expect(report.totals).toEqual({ deleted: 0, skipped: 0, failed: 0 });
  });

  test('limits deletion to the selected categories', async () => {
    populateFullStack();

    await new CleanupEngine(provider).cleanup('test-1', { force: true, resourceTypes: ['iam'] });

    expect(provider.events).toEqual([
      'removeRole:test-1-instance-profile:test-1-role',
      'delete:iam-role:test-1-role',
      'delete:instance-profile:test-1-instance-profile',
    ]);
  });

  test('records a discovery failure and carries on', async () => {
    provider.discoveryFailures.add('volume');
    provider.byName['log-group'] = [resource('log-group', '/aws/aistack/test-1')];

    const report = await new CleanupEngine(provider).cleanup('test-1', { force: true });

    expect(report.failures).toEqual([
      { resourceType: 'volume', resourceId: '(discovery)', error: 'discover volume failed: AccessDenied' },
    ]);
    expect(report.totals).toEqual({ deleted: 1, skipped: 0, failed: 1 });
  });

  test('requires a stack name', async () => {
    await expect(new CleanupEngine(provider).cleanup('  ')).rejects.toBeInstanceOf(MissingParameterError);
  });
});

describe('CleanupEngine.discover', () => {
  test('returns the same resources on repeated calls', async () => {
    populateFullStack();
    const engine = new CleanupEngine(provider);
    const types = selectResourceTypes();

    const first = await engine.discover('test-1', types);
    const second = await engine.discover('test-1', types);

    expect([...second.entries()]).toEqual([...first.entries()]);
    expect(first.get('efs-mount-target')?.map((r) => r.resourceId)).toEqual(['fsmt-1']);
  });
});
