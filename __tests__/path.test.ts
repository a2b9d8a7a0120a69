import { describe, it, expect } from 'vitest';
import { createPath, pathEquals, pathKey } from '@/models/path';

describe('Path', () => {
    const path = createPath('bridge', 'channel-0', 'uatom');

    it('is frozen', () => {
        expect(Object.isFrozen(path)).toBe(true);
    });

    it('is equal only when all three components match', () => {
        expect(pathEquals(path, createPath('bridge', 'channel-0', 'uatom'))).toBe(true);
        expect(pathEquals(path, createPath('relay', 'channel-0', 'uatom'))).toBe(false);
        expect(pathEquals(path, createPath('bridge', 'channel-1', 'uatom'))).toBe(false);
        expect(pathEquals(path, createPath('bridge', 'channel-0', 'uosmo'))).toBe(false);
        expect(pathEquals(path, createPath(' bridge', 'channel-0', 'uatom'))).toBe(false);
    });

    it('gives distinct keys to paths that differ only in where a separator falls', () => {
        const left = createPath('a:b', 'c', 'd');
        const right = createPath('a', 'b:c', 'd');

        expect(pathEquals(left, right)).toBe(false);
        expect(pathKey(left)).toBe('a%3Ab:c:d');
        expect(pathKey(right)).toBe('a:b%3Ac:d');
    });
});
