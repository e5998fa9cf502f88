// ss2v2ray/src/lib/compose.ts
// Rewrite the port-range mapping of a docker-compose service.

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { isSeq, parseDocument } from 'yaml';

export type PatchResult =
    | { status: 'patched'; mapping: string; previous: unknown }
    | { status: 'skipped'; reason: string };

/**
 * `"{min}-{max}:{min}-{max}"` over `ports`, or over `fallbackPort` alone
 * when `ports` is empty.
 */
export function formatPortRange(ports: readonly number[], fallbackPort: number): string {
    const min = ports.length > 0 ? Math.min(...ports) : fallbackPort;
    const max = ports.length > 0 ? Math.max(...ports) : fallbackPort;
    return `${min}-${max}:${min}-${max}`;
}

export interface PatchOptions {
    service: string;
    fallbackPort: number;
}

/**
 * Replace `services.<service>.ports[0]` with the range spanning `ports`.
 *
 * Edits go through the YAML document model, so comments and the rest of
 * the file are kept. A missing file, service or ports list is reported as
 * `skipped`; read, parse and write failures throw.
 */
export function patchComposePorts(
    path: string,
    ports: readonly number[],
    options: PatchOptions,
): PatchResult {
    if (!existsSync(path)) {
        return {
            status: 'skipped',
            reason: `Docker Compose file '${path}' not found, port mappings will not be updated`,
        };
    }

    const doc = parseDocument(readFileSync(path, 'utf8'));
    if (doc.errors.length > 0) throw doc.errors[0];

    const portsPath = ['services', options.service, 'ports'];
    const portsNode = doc.getIn(portsPath, true);
    if (!isSeq(portsNode) || portsNode.items.length === 0) {
        return {
            status: 'skipped',
            reason: `Service '${options.service}' has no ports in '${path}', port mappings will not be updated`,
        };
    }

    const mapping = formatPortRange(ports, options.fallbackPort);
    const previous = doc.getIn([...portsPath, 0]);
    doc.setIn([...portsPath, 0], mapping);
    writeFileSync(path, doc.toString(), 'utf8');

    return { status: 'patched', mapping, previous };
}
