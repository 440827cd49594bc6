/**
 * Command definitions for the watson CLI.
 */
import { Command } from 'commander';
import { z } from 'zod';
import type { Dispatcher } from 'undici';
import type { EnvSource } from '@watson/env-resolve';
import {
    StackClient,
    VERSION,
    checkConnection,
    connectionOrigin,
    resolveConnection,
    toStringOutputs,
} from '@watson/stack-client';
import { ConfigurationError, NotFoundError } from './errors.js';
import { configureLogging, loadEnv } from './env.js';
import { getLogger } from './logger.js';
import { renderOutputValue, renderOutputs, renderStack } from './render.js';

const logger = getLogger();

export interface ProgramDeps {
    env?: EnvSource;
    cwd?: string;
    dispatcher?: Dispatcher;
    write?: (text: string) => void;
    /** Throw instead of exiting on usage errors. */
    exitOverride?: boolean;
}

const GlobalOptionsSchema = z.object({
    address: z.string().optional(),
    scheme: z.string().optional(),
    stack: z.string().optional(),
    envFile: z.string().optional(),
    showSensitive: z.boolean().default(false),
});

type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

function openClient(options: GlobalOptions, deps: ProgramDeps): StackClient {
    const env = loadEnv(options.envFile, deps.env ?? process.env, deps.cwd ?? process.cwd());
    configureLogging(env);

    const connection = resolveConnection(
        { address: options.address, scheme: options.scheme, stack: options.stack },
        env
    );
    const issues = checkConnection(connection);
    if (issues.length > 0) {
        throw new ConfigurationError(issues);
    }

    logger.debug(`using ${connectionOrigin(connection)} as ${connection.stackDefault}`);
    return new StackClient(connection, { dispatcher: deps.dispatcher });
}

async function withClient<T>(
    command: Command,
    deps: ProgramDeps,
    run: (client: StackClient, options: GlobalOptions) => Promise<T>
): Promise<T> {
    const options = GlobalOptionsSchema.parse(command.optsWithGlobals());
    const client = openClient(options, deps);
    try {
        return await run(client, options);
    } finally {
        await client.close();
    }
}

export function createProgram(deps: ProgramDeps = {}): Command {
    const write = deps.write ?? ((text: string) => process.stdout.write(text));
    const program = new Command();

    if (deps.exitOverride) {
        program.exitOverride();
    }

    program
        .name('watson')
        .description('Read stack outputs from the watson service')
        .version(VERSION)
        .option('--address <address>', 'Service address, optionally prefixed with http:// or https://')
        .option('--scheme <scheme>', 'Scheme used when the address has none (http/https)')
        .option('--stack <stack>', 'Stack making the requests, sent as x-watson-stack')
        .option('--env-file <file>', 'Dotenv file with watson_* variables', '.env');

    program
        .command('outputs')
        .description('Print the string outputs of a stack as JSON')
        .argument('<stack>', 'Stack to read, as namespace/name')
        .option('--show-sensitive', 'Print sensitive values instead of masking them')
        .action(async (stack: string, _options: unknown, command: Command) => {
            await withClient(command, deps, async (client, options) => {
                logger.debug(`GET outputs of ${stack}`);
                const outputs = await client.getOutputs(stack);
                if (outputs === null) {
                    throw new NotFoundError(`No stack named ${JSON.stringify(stack)} could be found`);
                }

                const view = toStringOutputs(outputs);
                for (const notice of view.notices) {
                    logger.warn(`${notice.summary}: ${notice.detail}`);
                }
                write(`${JSON.stringify(renderOutputs(view.outputs, options.showSensitive), null, 2)}\n`);
            });
        });

    program
        .command('output')
        .description('Print a single output value')
        .argument('<stack>', 'Stack to read, as namespace/name')
        .argument('<key>', 'Output name')
        .option('--show-sensitive', 'Print the value even when it is sensitive')
        .action(async (stack: string, key: string, _options: unknown, command: Command) => {
            await withClient(command, deps, async (client, options) => {
                logger.debug(`GET output ${key} of ${stack}`);
                const output = await client.getOutput(stack, key);
                if (output === null) {
                    throw new NotFoundError(
                        `No output named ${JSON.stringify(key)} could be found in stack ${JSON.stringify(stack)}`
                    );
                }

                if (output.deprecated) {
                    logger.warn(`Output ${key} is deprecated: ${output.deprecated}`);
                }
                if (output.warning) {
                    logger.warn(`The output ${key} has a warning: ${output.warning}`);
                }
                write(`${renderOutputValue(output, options.showSensitive)}\n`);
            });
        });

    program
        .command('stack')
        .description('Print stack metadata, including the stacks using it')
        .argument('<stack>', 'Stack to read, as namespace/name')
        .action(async (stack: string, _options: unknown, command: Command) => {
            await withClient(command, deps, async (client) => {
                logger.debug(`GET stack ${stack}`);
                const result = await client.getStack(stack);
                if (result === null) {
                    throw new NotFoundError(`No stack named ${JSON.stringify(stack)} could be found`);
                }
                write(`${JSON.stringify(renderStack(result), null, 2)}\n`);
            });
        });

    return program;
}
