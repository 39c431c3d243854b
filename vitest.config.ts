import { Effect } from 'effect';
import { defineConfig } from 'vitest/config';
import { runnerTimeouts } from './packages/wirepeer-harness/src/lib/config';

const { testTimeout, hookTimeout } = Effect.runSync(runnerTimeouts);

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout,
    hookTimeout,
  },
});
