import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['{packages,services,agents,apps}/*/src/**/*.test.ts'],
    environment: 'node',
    env: { LOG_LEVEL: 'silent' },
  },
});
