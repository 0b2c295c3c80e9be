import { readFileSync, writeFileSync, realpathSync } from 'fs';
import { join } from 'path';
import { EnvironmentConfigurer, formatEnvLine, parseEnvKeys, shellProfilePath } from '../../../src/project/env-configurer.js';
import { makeTempDir, testContext } from '../../helpers/context.js';

describe('parseEnvKeys', () => {
  it('reads plain and exported assignments and ignores comments', () => {
    const keys = parseEnvKeys('A="1"\nexport B=2\n# C=3\n  D = 4\n');
    expect([...keys]).toEqual(['A', 'B', 'D']);
  });
});

describe('formatEnvLine', () => {
  it('quotes and escapes the value', () => {
    expect(formatEnvLine('GREETING', 'say "hi" \\ bye')).toBe('GREETING="say \\"hi\\" \\\\ bye"');
  });
});

describe('shellProfilePath', () => {
  it('selects .zshrc for zsh', () => {
    expect(shellProfilePath('/usr/bin/zsh', '/home/u')).toBe(join('/home/u', '.zshrc'));
  });

  it('defaults to .bashrc', () => {
    expect(shellProfilePath(undefined, '/home/u')).toBe(join('/home/u', '.bashrc'));
    expect(shellProfilePath('/bin/fish', '/home/u')).toBe(join('/home/u', '.bashrc'));
  });
});

describe('EnvironmentConfigurer', () => {
  const startDir = process.cwd();
  let project: string;
  let home: string;

  beforeEach(() => {
    project = realpathSync(makeTempDir('env'));
    home = makeTempDir('home');
    process.chdir(project);
  });

  afterEach(() => {
    process.chdir(startDir);
  });

  it('adds new keys without rewriting existing ones', () => {
    const configurer = new EnvironmentConfigurer(testContext({ homeDir: home }));
    configurer.configure({ projectScoped: { A: '1' }, shellScoped: [] });
    const results = configurer.configure({ projectScoped: { A: '2', B: '3' }, shellScoped: [] });

    expect(readFileSync(join(project, '.env'), 'utf-8')).toBe('A="1"\nB="3"\n');
    expect(results[0]).toEqual({ name: 'env-file:.env', status: 'success', detail: 'added B' });
  });

  it('starts appended keys on a new line when the file lacks a trailing newline', () => {
    writeFileSync(join(project, '.env'), 'EXISTING=yes');
    new EnvironmentConfigurer(testContext({ homeDir: home })).configure({ projectScoped: { NEW: 'x' }, shellScoped: [] });
    expect(readFileSync(join(project, '.env'), 'utf-8')).toBe('EXISTING=yes\nNEW="x"\n');
  });

  it('skips the env file when every key is present', () => {
    writeFileSync(join(project, 'custom.env'), 'A="1"\n');
    const results = new EnvironmentConfigurer(testContext({ homeDir: home })).configure({ projectScoped: { A: '9' }, shellScoped: [] }, 'custom.env');
    expect(results[0]).toEqual({ name: 'env-file:custom.env', status: 'skipped', detail: 'all keys already present' });
  });

  it('appends shell lines once, to .zshrc for zsh users', () => {
    const ctx = testContext({ homeDir: home, env: { SHELL: '/bin/zsh' } });
    const line = 'export PATH="$HOME/.local/bin:$PATH"';
    new EnvironmentConfigurer(ctx).configure({ projectScoped: {}, shellScoped: [line, line] });
    const second = new EnvironmentConfigurer(ctx).configure({ projectScoped: {}, shellScoped: [line] });

    expect(readFileSync(join(home, '.zshrc'), 'utf-8')).toBe(`${line}\n`);
    expect(second[1]).toEqual({ name: 'shell-profile', status: 'skipped', detail: `${join(home, '.zshrc')} already contains every line` });
  });

  it('keeps existing profile content and only adds missing lines', () => {
    writeFileSync(join(home, '.bashrc'), 'alias ll="ls -l"\nexport EDITOR=vim\n');
    const results = new EnvironmentConfigurer(testContext({ homeDir: home })).configure({
      projectScoped: {},
      shellScoped: ['export EDITOR=vim', 'export PAGER=less'],
    });

    expect(readFileSync(join(home, '.bashrc'), 'utf-8')).toBe('alias ll="ls -l"\nexport EDITOR=vim\nexport PAGER=less\n');
    expect(results[1]).toEqual({ name: 'shell-profile', status: 'success', detail: `appended 1 line(s) to ${join(home, '.bashrc')}` });
  });

  it('leaves the profile alone on Windows and reports manual setup', () => {
    const results = new EnvironmentConfigurer(testContext({ homeDir: home, platform: 'win32' })).configure({
      projectScoped: {},
      shellScoped: ['setx FOO bar'],
    });
    expect(results[1]).toEqual({ name: 'shell-profile', status: 'skipped', detail: 'manual setup required for 1 line(s) on Windows' });
  });

  it('reports empty inputs as skipped', () => {
    const results = new EnvironmentConfigurer(testContext({ homeDir: home })).configure({ projectScoped: {}, shellScoped: [] });
    expect(results.map((r) => r.status)).toEqual(['skipped', 'skipped']);
  });
});
