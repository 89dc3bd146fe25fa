import { vi } from 'vitest';

// Keep test output quiet; individual tests assert on these spies.
vi.mock('@/utils/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        setLevel: vi.fn(),
        getLevel: vi.fn(() => 'info'),
    },
}));
