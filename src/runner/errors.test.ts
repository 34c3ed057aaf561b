import { describe, expect, it } from 'vitest';

import {
  BuildError,
  CleanupError,
  exitCodeOf,
  PackagerError,
  PackagingError,
} from './errors';

describe('packager errors', () => {
  it('carry phase, exit code and name', () => {
    const p = new PackagingError('no tree');
    const b = new BuildError('exit 1', 1);
    const c = new CleanupError('busy');
    expect([p.phase, p.exitCode, p.name]).toEqual(['packaging', 2, 'PackagingError']);
    expect([b.phase, b.exitCode, b.buildExitCode]).toEqual(['building', 3, 1]);
    expect([c.phase, c.exitCode]).toEqual(['cleanup', 4]);
    expect(c).toBeInstanceOf(PackagerError);
  });

  it('keeps the cause', () => {
    const root = new Error('EACCES');
    expect(new CleanupError('x', { cause: root }).cause).toBe(root);
  });

  it('exit code is the first failure', () => {
    expect(exitCodeOf([])).toBe(0);
    expect(exitCodeOf([new BuildError('b', 2), new CleanupError('c')])).toBe(3);
  });
});
