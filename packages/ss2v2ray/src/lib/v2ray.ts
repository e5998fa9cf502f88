// ss2v2ray/src/lib/v2ray.ts
// V2Ray-specific shapes and entry builders.
// Contains: document types + schema, inbound/outbound/rule builders.

import { z } from 'zod';
import type { ServerRecord } from 'libregion';

// ─── Document ───────────────────────────────────────────────────────

export const DEFAULT_DOMAIN_STRATEGY = 'IPIfNonMatch';

export const DIRECT_TAG = 'direct';

export interface Inbound {
    port?: number | string;
    protocol?: string;
    tag?: string;
    [key: string]: unknown;
}

export interface Outbound {
    protocol: string;
    tag?: string;
    [key: string]: unknown;
}

export interface RoutingRule {
    type?: string;
    inboundTag?: string[];
    outboundTag?: string;
    [key: string]: unknown;
}

export interface V2RayDocument {
    inbounds: Inbound[];
    outbounds: Outbound[];
    routing: {
        rules: RoutingRule[];
        domainStrategy: string;
        [key: string]: unknown;
    };
    [key: string]: unknown;
}

/**
 * Shape accepted when reading back a previous output. Unknown keys are
 * kept; missing lists default to empty.
 */
export const v2rayDocumentSchema = z.object({
    inbounds: z.array(z.object({
        port: z.union([z.number().int(), z.string()]).optional(),
        protocol: z.string().optional(),
        tag: z.string().optional(),
    }).passthrough()).default([]),
    outbounds: z.array(z.object({
        protocol: z.string(),
        tag: z.string().optional(),
    }).passthrough()).default([]),
    routing: z.object({
        rules: z.array(z.object({
            type: z.string().optional(),
            inboundTag: z.array(z.string()).optional(),
            outboundTag: z.string().optional(),
        }).passthrough()).default([]),
        domainStrategy: z.string().default(DEFAULT_DOMAIN_STRATEGY),
    }).passthrough().default({}),
}).passthrough();

export function emptyDocument(): V2RayDocument {
    return {
        inbounds: [],
        outbounds: [],
        routing: {
            rules: [],
            domainStrategy: DEFAULT_DOMAIN_STRATEGY,
        },
    };
}

// ─── Entry Builders ─────────────────────────────────────────────────

export const inboundTag = (port: number, remarks: string): string => `in-${port}-${remarks}`;

export const outboundTag = (port: number, remarks: string): string => `out-${port}-${remarks}`;

export const SOCKS_COMMON = {
    protocol: 'socks',
    settings: {
        auth: 'noauth',
        udp: true,
        userLevel: 1,
    },
    sniffing: {
        enabled: true,
        destOverride: ['http', 'tls'],
    },
} as const;

/**
 * Local SOCKS5 listener for one node.
 */
export function socksInbound(port: number, tag: string): Inbound {
    return {
        port,
        protocol: SOCKS_COMMON.protocol,
        settings: { ...SOCKS_COMMON.settings },
        tag,
        sniffing: {
            ...SOCKS_COMMON.sniffing,
            destOverride: [...SOCKS_COMMON.sniffing.destOverride],
        },
    };
}

/**
 * Shadowsocks outbound carrying the record's credentials verbatim.
 */
export function shadowsocksOutbound(record: ServerRecord, tag: string): Outbound {
    return {
        protocol: 'shadowsocks',
        settings: {
            servers: [{
                address: record.server,
                port: record.server_port,
                method: record.method,
                password: record.password,
                level: 1,
            }],
        },
        tag,
    };
}

export function fieldRule(inTag: string, outTag: string): RoutingRule {
    return {
        type: 'field',
        inboundTag: [inTag],
        outboundTag: outTag,
    };
}

/** Catch-all outbound; always the last outbound of a document. */
export function directOutbound(): Outbound {
    return { protocol: 'freedom', tag: DIRECT_TAG };
}

export interface NodeEntries {
    inbound: Inbound;
    outbound: Outbound;
    rule: RoutingRule;
}

/**
 * Inbound, outbound and routing rule for one selected node, sharing the
 * `{port}-{remarks}` tag suffix.
 */
export function createNodeEntries(record: ServerRecord, port: number): NodeEntries {
    const inTag = inboundTag(port, record.remarks);
    const outTag = outboundTag(port, record.remarks);
    return {
        inbound: socksInbound(port, inTag),
        outbound: shadowsocksOutbound(record, outTag),
        rule: fieldRule(inTag, outTag),
    };
}
