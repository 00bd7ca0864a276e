import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts'],
        restoreMocks: true,
        // Quotas without a campaign time zone follow the host calendar day
        env: { TZ: 'UTC' },
    },
});
