import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      SUPABASE_URL:          'http://localhost:54321',
      SUPABASE_SERVICE_KEY:  'test-service-key',
      ANTHROPIC_API_KEY:     'test-anthropic-key',
      OPENAI_API_KEY:        'test-openai-key',
      TOKEN_ENCRYPTION_KEY:  'test-secret',
      QUEUE_DB_PATH:         ':memory:',
      TEMP_DIR:              '/tmp/series-autopilot-test',
      LOG_LEVEL:             'error',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/__tests__/**'],
    },
  },
});
