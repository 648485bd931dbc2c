import { defineConfig } from 'vitest/config'

/** Feed dates are rendered in local time; pin it for the test workers. */
process.env['TZ'] = 'UTC'

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
})
