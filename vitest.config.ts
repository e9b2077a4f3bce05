import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      GEMINI_API_KEY: '',
      GOOGLE_VISION_API_KEY: '',
      TELEGRAM_BOT_TOKEN: '',
      DB_PATH: ':memory:',
      RECEIPTS_DIR: path.join(os.tmpdir(), 'spendchat-test-receipts'),
      DEFAULT_CURRENCY: 'EUR',
    },
  },
});
