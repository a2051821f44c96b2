import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['**/test/**/*Test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    env: {
      DOCSHELF_LOG_TO_FILE: 'false',
      DOCSHELF_LOG_LEVEL: 'error'
    }
  }
});
