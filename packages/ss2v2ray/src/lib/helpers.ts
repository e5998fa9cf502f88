// ss2v2ray/src/lib/helpers.ts
// Command-line argument parsing — no V2Ray domain knowledge.

import minimist from 'minimist';
import { ConfigError } from './errors.js';

// ─── Value Parsing ──────────────────────────────────────────────────

export function parseBool(value: unknown, defaultValue = false): boolean {
    if (value === null || typeof value === 'undefined') return defaultValue;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
        if (value.toLowerCase() === 'true' || value === '1') return true;
        if (value.toLowerCase() === 'false' || value === '0') return false;
    }
    throw new ConfigError(`Invalid boolean value: ${String(value)}`);
}

export function parseNumber(value: unknown, defaultValue = 0): number {
    if (value === null || typeof value === 'undefined') return defaultValue;
    const num = parseInt(String(value), 10);
    return isNaN(num) ? defaultValue : num;
}

export function parseString(defaultValue: string): (value: unknown) => string {
    return (value: unknown): string => {
        if (value === null || typeof value === 'undefined' || value === '') return defaultValue;
        return String(value);
    };
}

export const MAX_PORT = 65535;

export function parsePort(value: unknown, defaultValue: number): number {
    if (value === null || typeof value === 'undefined' || value === '') return defaultValue;
    const text = String(value).trim();
    const port = /^\d+$/.test(text) ? parseNumber(text, NaN) : NaN;
    if (!Number.isInteger(port) || port < 1 || port > MAX_PORT) {
        throw new ConfigError(`Invalid port: ${text}`);
    }
    return port;
}

// ─── CLI Options ────────────────────────────────────────────────────

export const DEFAULT_START_PORT = 10001;

export const LOG_LEVELS: readonly string[] = ['error', 'warn', 'info', 'debug'];

export interface ConvertOptions {
    /** Shadowsocks JSON export. `-i, --input`, default `shadowsocks.json`. */
    input: string;
    /** V2Ray config to write. `-o, --output`, default `config.json`. */
    output: string;
    /** First inbound port. `-p, --port`, default 10001. */
    startPort: number;
    /**
     * Merge into an existing output file instead of replacing it.
     * `-a, --append`. New inbounds continue after the highest port in use.
     */
    append: boolean;
    /**
     * docker-compose file whose port range is rewritten after a successful
     * write. `-d, --docker`, default `docker-compose.yaml`; skipped with a
     * warning when the file is absent.
     */
    composeFile: string;
    /** Service in the compose file. `-s, --service`, default `v2ray`. */
    service: string;
}

export interface CliArgs extends ConvertOptions {
    logLevel: string | undefined;
    help: boolean;
}

/**
 * Parse raw argv (without the node and script entries).
 *
 * Unknown flags are ignored.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const raw = minimist([...argv], {
        string: ['input', 'output', 'port', 'docker', 'service', 'log-level'],
        boolean: ['append', 'help'],
        alias: { i: 'input', o: 'output', p: 'port', a: 'append', d: 'docker', s: 'service', h: 'help' },
    });
    const logLevel = parseString('')(raw['log-level']);
    if (logLevel && !LOG_LEVELS.includes(logLevel)) {
        throw new ConfigError(`Invalid log level: ${logLevel}`);
    }

    return {
        input: parseString('shadowsocks.json')(raw.input),
        output: parseString('config.json')(raw.output),
        startPort: parsePort(raw.port, DEFAULT_START_PORT),
        append: parseBool(raw.append),
        composeFile: parseString('docker-compose.yaml')(raw.docker),
        service: parseString('v2ray')(raw.service),
        logLevel: logLevel || undefined,
        help: parseBool(raw.help),
    };
}

export const USAGE = `Usage: ss2v2ray [options]

Convert a Shadowsocks JSON export into a V2Ray config with one or two
representative nodes per region.

Options:
  -i, --input <file>     Input Shadowsocks JSON file (default: shadowsocks.json)
  -o, --output <file>    Output V2Ray config file (default: config.json)
  -p, --port <port>      Starting port number (default: ${DEFAULT_START_PORT})
  -a, --append           Append to existing config file instead of creating a new one
  -d, --docker <file>    Docker Compose file to update with port mappings
                         (default: docker-compose.yaml)
  -s, --service <name>   Compose service whose ports are rewritten (default: v2ray)
      --log-level <lvl>  error | warn | info | debug (default: $LOG_LEVEL or info)
  -h, --help             Show this help
`;
