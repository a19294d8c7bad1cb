import { defineConfig } from 'vitest/config';
import { z } from 'zod';

// Tests run quiet unless asked otherwise: STREAM_OPS_LOG=DEBUG npm test
const envSchema = z.object({
  STREAM_OPS_LOG: z.enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'OFF']).default('OFF'),
});

const result = envSchema.safeParse(process.env);

if (!result.success) {
  console.error("❌ Environment validation failed:");
  result.error.issues.forEach((issue) => {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  });
  process.exit(1);
}

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ["./tests/file-setup.ts"],
    env: {
      STREAM_OPS_LOG: result.data.STREAM_OPS_LOG,
    },
  },
});
