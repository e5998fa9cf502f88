// tests/helpers.test.ts — Tests for argument parsing helpers
import { describe, it, expect } from 'vitest';
import {
    parseBool, parseNumber, parseString, parsePort, parseArgs,
    DEFAULT_START_PORT,
} from '../src/lib/helpers.js';
import { ConfigError } from '../src/lib/errors.js';

// ─── parseBool ──────────────────────────────────────────────────────

describe('parseBool', () => {
    it('returns default for null/undefined', () => {
        expect(parseBool(null)).toBe(false);
        expect(parseBool(undefined, true)).toBe(true);
    });

    it('parses string variants (case insensitive)', () => {
        expect(parseBool('TRUE')).toBe(true);
        expect(parseBool('False')).toBe(false);
        expect(parseBool('1')).toBe(true);
        expect(parseBool('0')).toBe(false);
    });

    it('throws a ConfigError on invalid values', () => {
        expect(() => parseBool('yes')).toThrow(ConfigError);
        expect(() => parseBool(42)).toThrow(/Invalid boolean value: 42/);
    });
});

// ─── parseNumber / parseString ──────────────────────────────────────

describe('parseNumber', () => {
    it('parses integers and falls back on NaN', () => {
        expect(parseNumber('42')).toBe(42);
        expect(parseNumber('abc', 5)).toBe(5);
        expect(parseNumber(undefined, 99)).toBe(99);
    });
});

describe('parseString', () => {
    it('returns default for null/undefined/empty', () => {
        const parse = parseString('config.json');
        expect(parse(undefined)).toBe('config.json');
        expect(parse('')).toBe('config.json');
        expect(parse('out.json')).toBe('out.json');
    });
});

// ─── parsePort ──────────────────────────────────────────────────────

describe('parsePort', () => {
    it('accepts ports in range', () => {
        expect(parsePort('1', 10001)).toBe(1);
        expect(parsePort(' 20000 ', 10001)).toBe(20000);
        expect(parsePort(65535, 10001)).toBe(65535);
    });

    it('uses the default when unset', () => {
        expect(parsePort(undefined, 10001)).toBe(10001);
        expect(parsePort('', 10001)).toBe(10001);
    });

    it('rejects out-of-range and non-numeric values', () => {
        expect(() => parsePort('0', 10001)).toThrow('Invalid port: 0');
        expect(() => parsePort('65536', 10001)).toThrow('Invalid port: 65536');
        expect(() => parsePort('12.5', 10001)).toThrow('Invalid port: 12.5');
        expect(() => parsePort('abc', 10001)).toThrow(ConfigError);
    });
});

// ─── parseArgs ──────────────────────────────────────────────────────

describe('parseArgs', () => {
    it('applies defaults', () => {
        expect(parseArgs([])).toEqual({
            input: 'shadowsocks.json',
            output: 'config.json',
            startPort: DEFAULT_START_PORT,
            append: false,
            composeFile: 'docker-compose.yaml',
            service: 'v2ray',
            logLevel: undefined,
            help: false,
        });
    });

    it('reads short flags', () => {
        const args = parseArgs(['-i', 'in.json', '-o', 'out.json', '-p', '20000', '-a', '-d', 'compose.yml', '-s', 'proxy']);
        expect(args).toMatchObject({
            input: 'in.json',
            output: 'out.json',
            startPort: 20000,
            append: true,
            composeFile: 'compose.yml',
            service: 'proxy',
        });
    });

    it('reads long flags', () => {
        const args = parseArgs(['--input=in.json', '--append', '--port', '10100', '--log-level', 'debug']);
        expect(args.input).toBe('in.json');
        expect(args.append).toBe(true);
        expect(args.startPort).toBe(10100);
        expect(args.logLevel).toBe('debug');
    });

    it('rejects a bad port or log level', () => {
        expect(() => parseArgs(['--port', 'abc'])).toThrow(ConfigError);
        expect(() => parseArgs(['--log-level', 'verbose'])).toThrow('Invalid log level: verbose');
    });
});
