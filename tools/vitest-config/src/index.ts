import type { UserConfig } from 'vitest/config';

type TestOptions = NonNullable<UserConfig['test']>;

const DEFAULT_SOURCES = ['packages/*/src/**/*.ts', 'tools/*/src/**/*.ts'];

export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const { test, ...rest } = options;
  const testOptions: TestOptions = {
    environment: 'node',
    globals: true,
    mockReset: true,
    clearMocks: true,
    pool: 'threads',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
      reportsDirectory: './coverage',
      include: DEFAULT_SOURCES,
      exclude: [
        '**/index.ts',
        '**/*.test.ts',
        '**/testing/**',
        'tools/vitest-config/**',
      ],
    },
    ...test,
  };

  return {
    ...rest,
    test: testOptions,
  };
};
