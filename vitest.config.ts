import { defineConfig } from 'vitest/config';

// Recurrence and reminder times are asserted in UTC.
process.env.TZ = 'UTC';

export default defineConfig({
    test: {
        include: ['packages/**/src/**/*.test.ts'],
        environment: 'node',
        env: { TZ: 'UTC' },
    },
});
