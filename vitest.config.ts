import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000, // 10 second default for tests
    hookTimeout: 10000,
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        // Type-only files and barrels carry no runtime logic
        '**/types.ts',
        '**/index.ts',
        // Adapters that talk to hosted LLM APIs
        'src/services/refinement/providers/openai.provider.ts',
        'src/services/refinement/providers/anthropic.provider.ts',
      ],
    },
  },
});
