import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'event-store',
          root: './event-store',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        test: {
          name: 'lifecycle-app',
          root: './lifecycle-app',
          include: ['src/**/*.unit.test.ts', 'tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
    ],
  },
});
