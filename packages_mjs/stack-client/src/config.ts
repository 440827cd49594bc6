/**
 * Connection configuration models and resolution for the stack client.
 */
import { z } from 'zod';
import { type EnvSource, resolve } from '@watson/env-resolve';
import {
    DEFAULT_SCHEME,
    ENV_WATSON_ADDRESS,
    ENV_WATSON_SCHEME,
    ENV_WATSON_STACK,
    STACK_HEADER,
    VALID_SCHEMES,
} from './constants.js';
import { InvalidSchemeError } from './errors.js';

export const SchemeSchema = z.enum(VALID_SCHEMES);

export type Scheme = z.infer<typeof SchemeSchema>;

export const ConnectionOptionsSchema = z.object({
    address: z.string().optional(),
    scheme: z.string().optional(),
    stack: z.string().optional(),
});

export type ConnectionOptions = z.infer<typeof ConnectionOptionsSchema>;

export interface ConnectionDescriptor {
    readonly host: string;
    readonly scheme: Scheme;
    readonly stackDefault: string;
    readonly headers: Readonly<Record<string, string>>;
}

const SCHEME_SEPARATOR = '://';

function splitAddress(address: string): { scheme?: string; host: string } {
    const index = address.indexOf(SCHEME_SEPARATOR);
    if (index === -1) {
        return { host: address };
    }
    return {
        scheme: address.slice(0, index),
        host: address.slice(index + SCHEME_SEPARATOR.length),
    };
}

function parseScheme(scheme: string): Scheme {
    const parsed = SchemeSchema.safeParse(scheme);
    if (!parsed.success) {
        throw new InvalidSchemeError(scheme);
    }
    return parsed.data;
}

/**
 * Resolve the effective connection from explicit options layered over the
 * environment. A scheme embedded in the address (`http://host`) wins over
 * both the explicit and the environment scheme.
 *
 * @throws InvalidSchemeError when the embedded or configured scheme is not http/https
 */
export function resolveConnection(
    options: ConnectionOptions = {},
    env: EnvSource = process.env
): ConnectionDescriptor {
    const validated = ConnectionOptionsSchema.parse(options);

    const address = resolve(validated.address, ENV_WATSON_ADDRESS, null, null, '', env);
    const stackDefault = resolve(validated.stack, ENV_WATSON_STACK, null, null, '', env);
    let scheme = resolve(validated.scheme, ENV_WATSON_SCHEME, null, null, DEFAULT_SCHEME, env);

    const embedded = splitAddress(address);
    if (embedded.scheme !== undefined) {
        scheme = embedded.scheme;
    }

    const headers: Record<string, string> = {};
    if (stackDefault) {
        headers[STACK_HEADER] = stackDefault;
    }

    return Object.freeze({
        host: embedded.host,
        scheme: parseScheme(scheme),
        stackDefault,
        headers: Object.freeze(headers),
    });
}

export function connectionOrigin(connection: ConnectionDescriptor): string {
    return `${connection.scheme}://${connection.host}`;
}

export interface ConfigurationIssue {
    field: 'address' | 'stack';
    summary: string;
    detail: string;
}

/**
 * Report the required fields a resolved connection is missing. Hosts call
 * this before building a client; resolution itself accepts empty values.
 */
export function checkConnection(connection: ConnectionDescriptor): ConfigurationIssue[] {
    const issues: ConfigurationIssue[] = [];

    if (!connection.host) {
        issues.push({
            field: 'address',
            summary: 'Missing watson API Address',
            detail:
                'The watson API client cannot be created as there is a missing or empty value for the watson API address. ' +
                `Set the address value in the configuration or use the ${ENV_WATSON_ADDRESS} environment variable.`,
        });
    }
    if (!connection.stackDefault) {
        issues.push({
            field: 'stack',
            summary: 'Missing watson API stack',
            detail:
                'The watson API client cannot be created as there is a missing or empty value for the watson API stack. ' +
                `Set the stack value in the configuration or use the ${ENV_WATSON_STACK} environment variable.`,
        });
    }

    return issues;
}
