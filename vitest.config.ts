import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      thresholds: { lines: 70, functions: 70, branches: 60 },
    },
    projects: [
      {
        test: {
          name: 'parser',
          environment: 'node',
          globals: true,
          include: ['tests/parser/**/*.test.ts'],
        },
      },
      {
        test: {
          name: 'pdf',
          environment: 'node',
          globals: true,
          include: ['tests/pdf/**/*.test.ts'],
        },
      },
      {
        test: {
          name: 'pipeline',
          environment: 'node',
          globals: true,
          include: [
            'tests/pipeline/**/*.test.ts',
            'tests/ai/**/*.test.ts',
            'tests/cli/**/*.test.ts',
            'tests/*.test.ts',
          ],
        },
      },
      {
        test: {
          name: 'server',
          environment: 'node',
          globals: true,
          include: ['tests/server/**/*.test.ts', 'tests/shared/**/*.test.ts'],
        },
      },
      {
        test: {
          name: 'mcp',
          environment: 'node',
          globals: true,
          include: ['tests/mcp/**/*.test.ts'],
        },
      },
    ],
  },
});
