import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@pitchline/agents': fromRoot('./agents/src'),
      '@pitchline/cli': fromRoot('./apps/cli/lib'),
      '@pitchline/core': fromRoot('./packages/core/src'),
      '@pitchline/llm': fromRoot('./packages/llm/src'),
      '@pitchline/schemas': fromRoot('./packages/schemas/src'),
    },
  },
});
