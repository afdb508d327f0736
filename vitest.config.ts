import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['mcp-servers/**/tests/**/*.test.ts'],
    environment: 'node',
  },
});
