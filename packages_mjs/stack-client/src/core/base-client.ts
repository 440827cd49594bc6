/**
 * Core HTTP plumbing based on undici.
 */
import { Dispatcher, Pool } from 'undici';
import { type ConnectionDescriptor, connectionOrigin } from '../config.js';
import { DecodeError, UnexpectedStatusError } from '../errors.js';

export interface BaseClientOptions {
    /**
     * Dispatcher to send requests through. When omitted the client creates a
     * Pool for the connection origin and owns it.
     */
    dispatcher?: Dispatcher;
}

export type ResponseData = Dispatcher.ResponseData;

export class BaseClient {
    protected readonly connection: ConnectionDescriptor;
    private readonly origin: string;
    private dispatcher?: Dispatcher;
    private ownDispatcher: boolean;

    constructor(connection: ConnectionDescriptor, options: BaseClientOptions = {}) {
        this.connection = connection;
        this.origin = connectionOrigin(connection);
        this.dispatcher = options.dispatcher;
        this.ownDispatcher = !options.dispatcher;
    }

    private ensureDispatcher(): Dispatcher {
        if (!this.dispatcher) {
            this.dispatcher = new Pool(this.origin);
            this.ownDispatcher = true;
        }
        return this.dispatcher;
    }

    async close(): Promise<void> {
        if (this.ownDispatcher && this.dispatcher) {
            await this.dispatcher.close();
            this.dispatcher = undefined;
        }
    }

    /**
     * Issue a GET and hand the response to `handle`. The body is drained on
     * every exit path so the connection goes back to the pool.
     */
    protected async withResponse<T>(
        path: string,
        handle: (response: ResponseData) => Promise<T>
    ): Promise<T> {
        const response = await this.ensureDispatcher().request({
            origin: this.origin,
            method: 'GET',
            path,
            headers: { ...this.connection.headers },
        });

        try {
            return await handle(response);
        } finally {
            if (!response.body.bodyUsed) {
                await response.body.dump();
            }
        }
    }

    /**
     * GET a JSON resource: 200 decodes through `decode`, 404 yields null,
     * anything else is an UnexpectedStatusError.
     */
    protected async getJson<T>(path: string, decode: (data: unknown) => T): Promise<T | null> {
        return this.withResponse(path, async (response) => {
            switch (response.statusCode) {
                case 200:
                    break;
                case 404:
                    return null;
                default:
                    throw new UnexpectedStatusError(response.statusCode, path);
            }

            const text = await response.body.text();
            let data: unknown;
            try {
                data = JSON.parse(text);
            } catch (e) {
                throw new DecodeError('body is not valid JSON', path, e);
            }
            return decode(data);
        });
    }
}
