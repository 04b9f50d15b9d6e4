import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

// jsdom for the panel tests; the pure utils run fine under it too.
export default defineConfig({
  plugins: [react()],
  test: {
    include: ['utils/**/*.test.ts', 'components/**/*.test.tsx'],
    environment: 'jsdom',
    globals: true,
  },
});
