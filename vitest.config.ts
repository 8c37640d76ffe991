import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// The inbox app imports the library by its package name.
const libraryEntry = fileURLToPath(new URL('./src/index.ts', import.meta.url));

export default defineConfig({
  test: {
    projects: [
      {
        resolve: { alias: { 'bulk-select': libraryEntry } },
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        resolve: { alias: { 'bulk-select': libraryEntry } },
        test: {
          name: 'inbox-app',
          include: ['inbox-app/tests/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
    ],
  },
});
