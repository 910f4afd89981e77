import { beforeEach, vi } from 'vitest';

// Keep live execution logs out of the test reporter.
beforeEach(() => {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});
