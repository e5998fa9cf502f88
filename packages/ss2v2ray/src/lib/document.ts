// ss2v2ray/src/lib/document.ts
// Load-or-create, assemble and persist the V2Ray output document.

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import type { ServerRecord } from 'libregion';
import { describeCause, OutputWriteError } from './errors.js';
import type { RunLogger } from './logger.js';
import {
    createNodeEntries, directOutbound, emptyDocument, v2rayDocumentSchema,
    DIRECT_TAG,
} from './v2ray.js';
import type { Inbound, Outbound, RoutingRule, V2RayDocument } from './v2ray.js';

// ─── Ports ──────────────────────────────────────────────────────────

/**
 * Ports named by an inbound `port`: a number, `"10001"`, or both bounds of
 * `"10002-10005"`. Anything else (`"env:PORT"`, no port) yields nothing.
 */
export function parsePortSpec(port: number | string | undefined): number[] {
    if (port === undefined) return [];
    if (typeof port === 'number') return [port];
    const text = port.trim();
    if (/^\d+$/.test(text)) return [Number(text)];
    const range = /^(\d+)-(\d+)$/.exec(text);
    if (!range) return [];
    return [Number(range[1]), Number(range[2])];
}

/** Inbound ports of a document in document order; a range gives both bounds. */
export function usedPorts(document: V2RayDocument): number[] {
    return document.inbounds.flatMap(inbound => parsePortSpec(inbound.port));
}

/**
 * Bump `startPort` past the highest port in use. Gaps below the maximum
 * are never reused.
 */
export function nextStartPort(document: V2RayDocument, startPort: number): number {
    const ports = usedPorts(document);
    if (ports.length === 0) return startPort;
    const max = Math.max(...ports);
    return startPort <= max ? max + 1 : startPort;
}

// ─── Load ───────────────────────────────────────────────────────────

export interface LoadOptions {
    append: boolean;
    startPort: number;
}

export interface LoadedDocument {
    document: V2RayDocument;
    startPort: number;
    /** `existing` when a previous output became the base. */
    source: 'existing' | 'template';
}

/**
 * Base document for this run.
 *
 * Outside append mode, or when the previous output is missing or not a
 * usable V2Ray document, a fresh template is returned.
 */
export function loadOrCreateDocument(
    path: string,
    options: LoadOptions,
    logger?: RunLogger,
): LoadedDocument {
    const template: LoadedDocument = {
        document: emptyDocument(),
        startPort: options.startPort,
        source: 'template',
    };
    if (!options.append || !existsSync(path)) return template;

    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
        logger?.warn(`Error loading existing config file for appending: ${describeCause(error)}`);
        logger?.warn('Creating new configuration instead');
        return template;
    }

    const result = v2rayDocumentSchema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        logger?.warn(
            `Existing config file is not a V2Ray document (${issue.path.join('.') || '<root>'}: ${issue.message})`,
        );
        logger?.warn('Creating new configuration instead');
        return template;
    }

    const document: V2RayDocument = result.data;
    logger?.info(`Loaded existing configuration from ${path} for appending`);

    const startPort = nextStartPort(document, options.startPort);
    if (startPort !== options.startPort) {
        logger?.info(`Adjusted start port to ${startPort} to avoid conflicts`);
    }
    return { document, startPort, source: 'existing' };
}

// ─── Assemble ───────────────────────────────────────────────────────

export interface AssembledDocument {
    document: V2RayDocument;
    /** Ports allocated to the selected nodes, in output order. */
    ports: number[];
}

/**
 * Append one inbound/outbound/rule triple per record on consecutive ports,
 * then the catch-all `direct` outbound.
 *
 * `base` is not modified. Its entries stay in front; a `direct` outbound
 * it already carries is dropped so the catch-all stays last and unique.
 */
export function assembleDocument(
    base: V2RayDocument,
    records: readonly ServerRecord[],
    startPort: number,
): AssembledDocument {
    const inbounds: Inbound[] = [];
    const outbounds: Outbound[] = [];
    const rules: RoutingRule[] = [];
    const ports: number[] = [];

    records.forEach((record, index) => {
        const port = startPort + index;
        const { inbound, outbound, rule } = createNodeEntries(record, port);
        inbounds.push(inbound);
        outbounds.push(outbound);
        rules.push(rule);
        ports.push(port);
    });

    const carried = base.outbounds.filter(outbound => outbound.tag !== DIRECT_TAG);

    return {
        document: {
            ...base,
            inbounds: [...base.inbounds, ...inbounds],
            outbounds: [...carried, ...outbounds, directOutbound()],
            routing: {
                ...base.routing,
                rules: [...base.routing.rules, ...rules],
            },
        },
        ports,
    };
}

// ─── Persist ────────────────────────────────────────────────────────

export function serializeDocument(document: V2RayDocument): string {
    return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Write through a sibling temp file and rename, so `path` holds either the
 * previous content or the complete new document.
 */
export function writeDocument(path: string, document: V2RayDocument): void {
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
        writeFileSync(tmpPath, serializeDocument(document), 'utf8');
        renameSync(tmpPath, path);
    } catch (error) {
        rmSync(tmpPath, { force: true });
        throw new OutputWriteError(path, { cause: error });
    }
}
