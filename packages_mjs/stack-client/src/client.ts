/**
 * Read-only client for the stack service.
 */
import { z } from 'zod';
import { BaseClient, type BaseClientOptions } from './core/base-client.js';
import type { EnvSource } from '@watson/env-resolve';
import { type ConnectionDescriptor, type ConnectionOptions, resolveConnection } from './config.js';
import { DecodeError } from './errors.js';
import { outputPath, outputsPath, stackPath } from './stack-name.js';
import { type Output, OutputSchema, type Outputs, OutputsSchema, type Stack, StackSchema } from './types.js';

export interface StackClientConfig extends ConnectionOptions, BaseClientOptions {
    /** Environment source for unset options, `process.env` unless given. */
    env?: EnvSource;
}

function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string) {
    return (data: unknown): T => {
        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            throw new DecodeError(parsed.error.message, path, parsed.error);
        }
        return parsed.data;
    };
}

/**
 * Every method validates its arguments before touching the network and
 * returns null when the service answers 404.
 */
export class StackClient extends BaseClient {
    static create(config: StackClientConfig = {}): StackClient {
        const { env, dispatcher, ...options } = config;
        return new StackClient(resolveConnection(options, env), { dispatcher });
    }

    constructor(connection: ConnectionDescriptor, options: BaseClientOptions = {}) {
        super(connection, options);
    }

    getConnection(): ConnectionDescriptor {
        return this.connection;
    }

    async getOutputs(stack: string): Promise<Outputs | null> {
        const path = outputsPath(stack);
        return this.getJson(path, decodeWith(OutputsSchema, path));
    }

    async getOutput(stack: string, key: string): Promise<Output | null> {
        const path = outputPath(stack, key);
        return this.getJson(path, decodeWith(OutputSchema, path));
    }

    async getStack(stack: string): Promise<Stack | null> {
        const path = stackPath(stack);
        return this.getJson(path, decodeWith(StackSchema, path));
    }
}
