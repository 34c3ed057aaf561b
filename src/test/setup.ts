// Global test setup: plain output, no debug noise unless a suite opts in.
process.env.CTXPACK_BORING = '1';
delete process.env.CTXPACK_DEBUG;
