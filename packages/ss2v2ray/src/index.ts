// ss2v2ray/src/index.ts — Shadowsocks → V2Ray converter entry
//
// Picks one or two representative nodes per inferred region (libregion)
// and emits a SOCKS inbound + Shadowsocks outbound + routing rule per node.

import { convert } from './convert.js';
import { ConfigError, ConvertError } from './lib/errors.js';
import { parseArgs, USAGE } from './lib/helpers.js';
import type { CliArgs } from './lib/helpers.js';
import { createLogger } from './lib/logger.js';
import type { RunLogger } from './lib/logger.js';

export { convert } from './convert.js';
export type { ConvertContext, ConversionResult } from './convert.js';
export { parseArgs, USAGE, DEFAULT_START_PORT } from './lib/helpers.js';
export type { ConvertOptions, CliArgs } from './lib/helpers.js';
export { loadServerRecords } from './lib/loader.js';
export { assembleDocument, loadOrCreateDocument, writeDocument } from './lib/document.js';
export { patchComposePorts, formatPortRange } from './lib/compose.js';
export { ConvertError, ConfigError, InputError, OutputWriteError } from './lib/errors.js';
export { createLogger } from './lib/logger.js';
export type { RunLogger } from './lib/logger.js';

export interface MainIo {
    logger?: RunLogger;
    stdout?: (text: string) => void;
}

function tryParseArgs(argv: readonly string[]): CliArgs | ConfigError {
    try {
        return parseArgs(argv);
    } catch (error) {
        if (error instanceof ConfigError) return error;
        throw error;
    }
}

/**
 * Run the CLI with `argv` (no node/script entries). Returns the exit code:
 * 0 on success, 1 when the conversion failed, 2 on bad flags.
 */
function main(argv: readonly string[], io: MainIo = {}): number {
    const stdout = io.stdout ?? ((text: string) => process.stdout.write(text));

    const args = tryParseArgs(argv);
    if (args instanceof ConfigError) {
        (io.logger ?? createLogger()).error(args.message);
        stdout(USAGE);
        return 2;
    }
    if (args.help) {
        stdout(USAGE);
        return 0;
    }

    const logger = io.logger ?? createLogger({ level: args.logLevel });
    try {
        const { nodeCount, regionCount } = convert(args, { logger });
        const mode = args.append ? 'appended to' : 'generated';
        logger.info(`Config ${mode}: ${args.output} with ${nodeCount} nodes from ${regionCount} regions`);
        return 0;
    } catch (error) {
        if (!(error instanceof ConvertError)) throw error;
        logger.error(error.message);
        logger.info('Config not written: 0 nodes from 0 regions');
        return 1;
    }
}

export default main;
