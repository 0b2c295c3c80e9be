import { PackageInstaller } from '../../../src/package-manager/installer.js';
import { FakeExecutor } from '../../helpers/fake-executor.js';
import { testContext } from '../../helpers/context.js';

const user = { isElevated: false };
const root = { isElevated: true };

describe('PackageInstaller', () => {
  it('skips entirely when no package manager was found', async () => {
    const executor = new FakeExecutor();
    const results = await new PackageInstaller(testContext({ executor })).install('none', ['git'], user);
    expect(results).toEqual([{ name: 'packages', status: 'skipped', detail: 'no supported package manager found' }]);
    expect(executor.calls).toHaveLength(0);
  });

  it('skips when the list for the manager is empty', async () => {
    const results = await new PackageInstaller(testContext()).install('apt', [], user);
    expect(results).toEqual([{ name: 'packages', status: 'skipped', detail: 'no packages declared for apt' }]);
  });

  it('never installs a package whose check succeeds', async () => {
    const executor = new FakeExecutor().on('dpkg -s', { exitCode: 0 });
    const results = await new PackageInstaller(testContext({ executor })).install('apt', ['git', 'vim'], user);
    expect(executor.lines()).toEqual([
      'sudo apt-get update',
      'dpkg -s git',
      'dpkg -s vim',
    ]);
    expect(results.slice(1)).toEqual([
      { name: 'package:git', status: 'skipped', detail: 'already installed' },
      { name: 'package:vim', status: 'skipped', detail: 'already installed' },
    ]);
  });

  it('runs the index update once per invocation', async () => {
    const executor = new FakeExecutor().on('dpkg -s', { exitCode: 1 });
    await new PackageInstaller(testContext({ executor })).install('apt', ['a', 'b', 'c'], root);
    expect(executor.lines().filter((l) => l === 'apt-get update')).toHaveLength(1);
  });

  it('continues past a failed install and reports the rest', async () => {
    const executor = new FakeExecutor()
      .on('rpm -q', { exitCode: 1 })
      .on('sudo dnf install -y Y', { exitCode: 1, stderr: 'Error: No match for argument: Y' });
    const results = await new PackageInstaller(testContext({ executor })).install('dnf', ['X', 'Y', 'Z'], user);
    expect(results).toEqual([
      { name: 'dnf:update', status: 'success', detail: 'package index refreshed' },
      { name: 'package:X', status: 'success', detail: 'installed' },
      { name: 'package:Y', status: 'failed', detail: 'exit 1 [PACKAGE_NOT_FOUND]: Error: No match for argument: Y' },
      { name: 'package:Z', status: 'success', detail: 'installed' },
    ]);
  });

  it('records a failed index refresh and still installs', async () => {
    const executor = new FakeExecutor()
      .on('sudo apt-get update', { exitCode: 100, stderr: 'E: Failed to fetch http://deb.example/dists' })
      .on('dpkg -s', { exitCode: 1 });
    const results = await new PackageInstaller(testContext({ executor })).install('apt', ['curl'], user);
    expect(results[0]).toEqual({ name: 'apt:update', status: 'failed', detail: 'exit 100 [NETWORK_ERROR]: E: Failed to fetch http://deb.example/dists' });
    expect(results[1]).toEqual({ name: 'package:curl', status: 'success', detail: 'installed' });
    expect(executor.lines()).toContain('sudo apt-get install -y curl');
  });

  it('installs a brew package missing from the listing even though brew list exits 0', async () => {
    const executor = new FakeExecutor().on('brew list', { exitCode: 0, stdout: 'git\ncurl\n' });
    const results = await new PackageInstaller(testContext({ executor, platform: 'darwin' })).install('brew', ['htop', 'git'], user);
    expect(executor.lines()).toEqual(['brew update', 'brew list', 'brew install htop', 'brew list']);
    expect(results.slice(1)).toEqual([
      { name: 'package:htop', status: 'success', detail: 'installed' },
      { name: 'package:git', status: 'skipped', detail: 'already installed' },
    ]);
  });

  it('runs winget without an update step or elevation', async () => {
    const executor = new FakeExecutor().on('winget list', { exitCode: 1 });
    const results = await new PackageInstaller(testContext({ executor, platform: 'win32' })).install('winget', ['Git.Git'], user);
    expect(executor.lines()).toEqual([
      'winget list --id Git.Git -e',
      'winget install --id Git.Git -e --accept-source-agreements --accept-package-agreements',
    ]);
    expect(results).toEqual([{ name: 'package:Git.Git', status: 'success', detail: 'installed' }]);
  });
});
