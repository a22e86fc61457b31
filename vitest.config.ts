import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    setupFiles: ['./test/setup/test-setup.ts'],

    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      GITHUB_APP_ID: '123456',
      GITHUB_PRIVATE_KEY_PATH: 'test/fixtures/sample_key.pem',
      GITHUB_API_URL: 'http://localhost:8080',
    },

    include: [
      'test/**/*.test.ts',
      'test/**/*.spec.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],

    testTimeout: 10000,
    hookTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'dist/**',
        'test/**',
        '**/*.test.ts',
        'src/types/**',
        'src/config/**'
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80
      }
    },

    watch: false,
  },
});
