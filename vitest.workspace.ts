import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    extends: './vitest.config.ts',
    test: {
      name: 'core',
      root: './packages/core',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
  {
    extends: './vitest.config.ts',
    test: {
      name: 'fastify',
      root: './packages/fastify',
      include: ['tests/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
      environment: 'node',
    },
  },
]);
