import { describeFailure, diagnose } from '../../../src/package-manager/diagnostics.js';

describe('diagnose', () => {
  it('recognises a missing apt package', () => {
    expect(diagnose('E: Unable to locate package nosuchpkg').code).toBe('PACKAGE_NOT_FOUND');
  });

  it('recognises a held dpkg lock', () => {
    expect(diagnose('E: Could not get lock /var/lib/dpkg/lock-frontend').code).toBe('RESOURCE_LOCKED');
  });

  it('recognises a sudo failure', () => {
    expect(diagnose('sudo: a password is required').code).toBe('PERMISSION_DENIED');
  });

  it('falls back to COMMAND_FAILED', () => {
    expect(diagnose('something odd happened')).toEqual({ code: 'COMMAND_FAILED', hint: 'Review the captured output above' });
  });
});

describe('describeFailure', () => {
  it('includes exit code, category and stderr', () => {
    const detail = describeFailure({ exitCode: 100, stdout: '', stderr: 'E: Unable to locate package foo\n', durationMs: 3 });
    expect(detail).toBe('exit 100 [PACKAGE_NOT_FOUND]: E: Unable to locate package foo');
  });

  it('uses stdout when stderr is empty', () => {
    expect(describeFailure({ exitCode: 1, stdout: 'boom', stderr: '', durationMs: 0 })).toBe('exit 1 [COMMAND_FAILED]: boom');
  });
});
