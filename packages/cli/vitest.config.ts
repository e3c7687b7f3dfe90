import { defineProject } from 'vitest/config'

export default defineProject({
  test: {
    name: 'cli',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
})
