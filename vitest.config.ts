import { defineConfig as defineBaseConfig } from '@docmark/vitest-config';
import { defineConfig } from 'vitest/config';

const baseConfig = defineBaseConfig({
  test: {
    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'tools/*/src/**/*.{test,spec}.ts',
    ],
  },
});

export default defineConfig(baseConfig);
