import { describe, expect, it, vi } from 'vitest';

import { attachSessionSignals } from './signals';

describe('attachSessionSignals', () => {
  it('handles one SIGINT, then leaves the next to the default action', () => {
    const before = process.listenerCount('SIGINT');
    const onSigint = vi.fn();
    const detach = attachSessionSignals(onSigint, () => undefined);
    expect(process.listenerCount('SIGINT')).toBe(before + 1);

    const [wrapped] = process.rawListeners('SIGINT').slice(before);
    wrapped.call(process, 'SIGINT');

    expect(onSigint).toHaveBeenCalledTimes(1);
    expect(process.listenerCount('SIGINT')).toBe(before);
    detach();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });

  it('detach removes the exit hook', () => {
    const before = process.listenerCount('exit');
    const detach = attachSessionSignals(() => undefined, () => undefined);
    expect(process.listenerCount('exit')).toBe(before + 1);
    detach();
    expect(process.listenerCount('exit')).toBe(before);
  });
});
