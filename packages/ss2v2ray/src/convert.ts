// ss2v2ray/src/convert.ts
// One conversion run:
//   load input → select nodes → load-or-create output → assemble → write → patch compose
//
// Writing the output is the only commit point. Everything before it either
// succeeds or throws a ConvertError with nothing written; the compose patch
// after it can only warn.

import { selectNodes } from 'libregion';
import { patchComposePorts } from './lib/compose.js';
import type { PatchResult } from './lib/compose.js';
import { assembleDocument, loadOrCreateDocument, usedPorts, writeDocument } from './lib/document.js';
import { ConfigError, describeCause } from './lib/errors.js';
import { MAX_PORT } from './lib/helpers.js';
import type { ConvertOptions } from './lib/helpers.js';
import { loadServerRecords } from './lib/loader.js';
import type { RunLogger } from './lib/logger.js';

export interface ConvertContext {
    logger: RunLogger;
}

export interface ConversionResult {
    nodeCount: number;
    /** Buckets used, `Other` included. */
    regionCount: number;
    /** Ports allocated in this run. */
    ports: number[];
    startPort: number;
    compose: PatchResult | { status: 'failed'; reason: string } | undefined;
}

export function convert(options: ConvertOptions, ctx: ConvertContext): ConversionResult {
    const { logger } = ctx;

    const { records } = loadServerRecords(options.input, logger);
    const { selected, buckets } = selectNodes(records, { logger });

    const base = loadOrCreateDocument(
        options.output,
        { append: options.append, startPort: options.startPort },
        logger,
    );
    const lastPort = base.startPort + selected.length - 1;
    if (lastPort > MAX_PORT) {
        throw new ConfigError(
            `Ports ${base.startPort}-${lastPort} for ${selected.length} nodes exceed ${MAX_PORT}`,
        );
    }
    const { document, ports } = assembleDocument(base.document, selected, base.startPort);

    writeDocument(options.output, document);
    logger.info(`Successfully wrote configuration to ${options.output}`);

    const compose = options.composeFile
        ? updateComposeFile(options.composeFile, usedPorts(document), {
            service: options.service,
            fallbackPort: base.startPort,
        }, logger)
        : undefined;

    return {
        nodeCount: selected.length,
        regionCount: buckets.size,
        ports,
        startPort: base.startPort,
        compose,
    };
}

function updateComposeFile(
    path: string,
    ports: number[],
    options: { service: string; fallbackPort: number },
    logger: RunLogger,
): ConversionResult['compose'] {
    try {
        const result = patchComposePorts(path, ports, options);
        if (result.status === 'patched') {
            logger.info(`Updated Docker Compose port mappings to ${result.mapping}`);
        } else {
            logger.warn(result.reason);
        }
        return result;
    } catch (error) {
        const reason = describeCause(error);
        logger.error(`Error updating Docker Compose file: ${reason}`);
        return { status: 'failed', reason };
    }
}
