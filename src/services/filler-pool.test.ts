import { describe, expect, it } from 'vitest';
import { ConfigError } from '../utils/errors.js';
import { FillerPool } from './filler-pool.js';

describe('FillerPool', () => {
    it('normalizes and de-duplicates addresses', () => {
        const pool = new FillerPool([' Seed@Example.com', 'seed@example.com', 'other@example.org', ''], () => 0.9);

        expect(pool.size).toBe(2);
        expect(pool.next()).toBe('other@example.org');
    });

    it('refuses to hand out filler addresses when none are configured', () => {
        expect(() => new FillerPool([]).next()).toThrow(ConfigError);
    });
});
