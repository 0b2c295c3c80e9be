import { join } from 'path';
import { CommanderError } from 'commander';
import { buildProgram, main } from '../../src/cli.js';
import { makeTempDir } from '../helpers/context.js';

describe('buildProgram', () => {
  it('parses the project name and --no-venv', () => {
    const program = buildProgram().parse(['node', 'provision', '--name', 'demo', '--no-venv', '--log-level', 'debug']);
    expect(program.opts()).toEqual({ name: 'demo', venv: false, logLevel: 'debug' });
  });

  it('defaults venv to enabled', () => {
    expect(buildProgram().parse(['node', 'provision']).opts()).toEqual({ venv: true });
  });

  it('rejects an unknown log level', () => {
    const program = buildProgram().configureOutput({ writeErr: () => undefined });
    expect(() => program.parse(['node', 'provision', '--log-level', 'loud'])).toThrow(CommanderError);
  });
});

describe('main', () => {
  it('returns 1 without side effects when the configuration is missing', async () => {
    const dir = makeTempDir('cli');
    const status = await main(['node', 'provision', '--config', join(dir, 'missing.yaml'), '--log-level', 'silent']);
    expect(status).toBe(1);
  });
});
