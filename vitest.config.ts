import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    env: {
      PHRASE_KV_LOG_LEVEL: 'silent'
    }
  }
})
