// tests/compose.test.ts — Tests for the docker-compose port-range patcher
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'yaml';
import { formatPortRange, patchComposePorts } from '../src/lib/compose.js';

const COMPOSE = `# proxy stack
services:
  v2ray:
    image: v2fly/v2fly-core
    ports:
      - "10001-10003:10001-10003"
      - "8080:8080"
    restart: always
  web:
    image: nginx
`;

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ss2v2ray-compose-'));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

function writeCompose(content: string): string {
    const path = join(dir, 'docker-compose.yaml');
    writeFileSync(path, content);
    return path;
}

// ─── formatPortRange ────────────────────────────────────────────────

describe('formatPortRange', () => {
    it('spans min to max on both sides', () => {
        expect(formatPortRange([10003, 10001, 10002], 1)).toBe('10001-10003:10001-10003');
    });

    it('uses the fallback port for an empty list', () => {
        expect(formatPortRange([], 10001)).toBe('10001-10001:10001-10001');
    });
});

// ─── patchComposePorts ──────────────────────────────────────────────

describe('patchComposePorts', () => {
    const options = { service: 'v2ray', fallbackPort: 10001 };

    it('replaces the first port mapping of the service', () => {
        const path = writeCompose(COMPOSE);
        const result = patchComposePorts(path, [10001, 10002, 10003, 10004, 10005], options);

        expect(result).toEqual({
            status: 'patched',
            mapping: '10001-10005:10001-10005',
            previous: '10001-10003:10001-10003',
        });

        const text = readFileSync(path, 'utf8');
        expect(parse(text)).toEqual({
            services: {
                v2ray: {
                    image: 'v2fly/v2fly-core',
                    ports: ['10001-10005:10001-10005', '8080:8080'],
                    restart: 'always',
                },
                web: { image: 'nginx' },
            },
        });
        expect(text.startsWith('# proxy stack\n')).toBe(true);
    });

    it('skips a missing file', () => {
        const path = join(dir, 'absent.yaml');
        expect(patchComposePorts(path, [10001], options)).toEqual({
            status: 'skipped',
            reason: `Docker Compose file '${path}' not found, port mappings will not be updated`,
        });
    });

    it('skips a service without ports and leaves the file alone', () => {
        const path = writeCompose(COMPOSE);
        const result = patchComposePorts(path, [10001], { ...options, service: 'web' });

        expect(result.status).toBe('skipped');
        expect(readFileSync(path, 'utf8')).toBe(COMPOSE);
    });

    it('skips an unknown service', () => {
        const path = writeCompose(COMPOSE);
        expect(patchComposePorts(path, [10001], { ...options, service: 'xray' }).status).toBe('skipped');
    });

    it('throws on malformed YAML', () => {
        const path = writeCompose('services: [unclosed\n');
        expect(() => patchComposePorts(path, [10001], options)).toThrow();
    });
});
