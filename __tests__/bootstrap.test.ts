import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { applyBootstrapPaths, parseBootstrapPaths } from '@/lib/bootstrap';
import { createPath } from '@/models/path';
import { PathService } from '@/services/path.service';
import { InMemoryPathRegistry } from '@/store/memory-path-registry';

const T0 = 1_700_000_000;

const config = [
    {
        owner: 'bridge',
        channel: 'channel-0',
        asset: 'uatom',
        quotas: [
            { name: 'daily', duration: 86400, maxSend: '1000', maxReceive: '1000' },
            { name: 'weekly', duration: 604800, maxSend: '5000', maxReceive: '5000' }
        ]
    },
    { owner: 'bridge', channel: 'channel-1', asset: 'uosmo', quotas: [] }
];

describe('parseBootstrapPaths', () => {
    it('turns the JSON list into path registrations', () => {
        const registrations = parseBootstrapPaths(JSON.stringify(config), 'inline');

        expect(registrations).toEqual([
            {
                path: createPath('bridge', 'channel-0', 'uatom'),
                quotas: [
                    { name: 'daily', duration: 86400, maxSend: 1000n, maxReceive: 1000n },
                    { name: 'weekly', duration: 604800, maxSend: 5000n, maxReceive: 5000n }
                ]
            },
            { path: createPath('bridge', 'channel-1', 'uosmo'), quotas: [] }
        ]);
    });

    it('rejects malformed JSON', () => {
        expect(() => parseBootstrapPaths('{', 'inline')).toThrow(/^Bootstrap paths in inline are not valid JSON/);
    });

    it('names the offending field', () => {
        const broken = [{ ...config[0], quotas: [{ name: 'daily', duration: -1, maxSend: '1', maxReceive: '1' }] }];
        expect(() => parseBootstrapPaths(JSON.stringify(broken), 'inline')).toThrow(
            'Invalid bootstrap paths in inline: 0.quotas.0.duration: duration must not be negative'
        );
    });
});

describe('applyBootstrapPaths', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'bootstrap-paths-'));
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('registers every path from the file', async () => {
        const file = path.join(dir, 'paths.json');
        await writeFile(file, JSON.stringify(config));
        const registry = new InMemoryPathRegistry();
        const paths = new PathService(registry);

        const count = await applyBootstrapPaths(file, paths, T0);

        expect(count).toBe(2);
        expect(registry.size).toBe(2);
        const limits = await paths.getQuotas(createPath('bridge', 'channel-0', 'uatom'));
        expect(limits.map((limit) => [limit.quota.name, limit.flow.periodEnd])).toEqual([
            ['daily', T0 + 86400],
            ['weekly', T0 + 604800]
        ]);
    });
});
