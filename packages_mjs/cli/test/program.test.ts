/**
 * Tests for the watson CLI commands.
 */
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { MockAgent } from 'undici';
import { createProgram } from '../src/program.js';
import { ConfigurationError, NotFoundError } from '../src/errors.js';

const FIXTURES = path.join(__dirname, 'fixtures');
const ORIGIN = 'https://watson.test';

describe('watson CLI', () => {
    let mockAgent: MockAgent;
    let written: string[];

    const run = (args: string[]) =>
        createProgram({
            env: {},
            cwd: FIXTURES,
            dispatcher: mockAgent,
            write: (text) => {
                written.push(text);
            },
            exitOverride: true,
        }).parseAsync(['node', 'watson', '--address', ORIGIN, '--stack', 'frontend/dev', ...args]);

    beforeEach(() => {
        mockAgent = new MockAgent();
        mockAgent.disableNetConnect();
        written = [];
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await mockAgent.close();
    });

    describe('outputs', () => {
        it('prints string outputs and warns about ignored ones', async () => {
            mockAgent
                .get(ORIGIN)
                .intercept({ path: '/v1/projects/backend/load-balancers/outputs/', headers: { 'x-watson-stack': 'frontend/dev' } })
                .reply(200, {
                    hostname: { value: 'https://hello.example', sensitive: false },
                    count: { value: 3 },
                });

            await run(['outputs', 'backend/load-balancers']);

            expect(JSON.parse(written.join(''))).toEqual({
                hostname: { value: 'https://hello.example', sensitive: false, deprecated: '', warning: '' },
            });
            expect(console.warn).toHaveBeenCalledWith('[watson] ignored output: output "count" has type number and is ignored for now');
        });

        it('masks sensitive values unless asked', async () => {
            const pool = mockAgent.get(ORIGIN);
            const body = { password: { value: 'test-secret', sensitive: true } };
            pool.intercept({ path: '/v1/projects/backend/db/outputs/' }).reply(200, body);
            pool.intercept({ path: '/v1/projects/backend/db/outputs/' }).reply(200, body);

            await run(['outputs', 'backend/db']);
            expect(JSON.parse(written.join('')).password.value).toBe('[SENSITIVE]');

            written = [];
            await run(['outputs', 'backend/db', '--show-sensitive']);
            expect(JSON.parse(written.join('')).password.value).toBe('test-secret');
        });

        it('fails on an unknown stack', async () => {
            mockAgent.get(ORIGIN).intercept({ path: '/v1/projects/hello/world/outputs/' }).reply(404, {});

            const promise = run(['outputs', 'hello/world']);
            await expect(promise).rejects.toBeInstanceOf(NotFoundError);
            await expect(promise).rejects.toThrow('No stack named "hello/world" could be found');
            expect(written).toEqual([]);
        });

        it('fails on an invalid stack name', async () => {
            await expect(run(['outputs', 'hello'])).rejects.toThrow('"hello" is not a valid stack name');
        });
    });

    describe('output', () => {
        it('prints a string value raw', async () => {
            mockAgent
                .get(ORIGIN)
                .intercept({ path: '/v1/projects/backend/load-balancers/outputs/hostname/' })
                .reply(200, { value: 'https://hello.example', deprecated: null, warning: null });

            await run(['output', 'backend/load-balancers', 'hostname']);

            expect(written).toEqual(['https://hello.example\n']);
        });

        it('prints other values as JSON and reports the warning', async () => {
            mockAgent
                .get(ORIGIN)
                .intercept({ path: '/v1/projects/backend/load-balancers/outputs/zones/' })
                .reply(200, { value: ['a', 'b'], warning: 'zones are being renamed' });

            await run(['output', 'backend/load-balancers', 'zones']);

            expect(written).toEqual(['["a","b"]\n']);
            expect(console.warn).toHaveBeenCalledWith('[watson] The output zones has a warning: zones are being renamed');
        });

        it('fails on an unknown key', async () => {
            mockAgent.get(ORIGIN).intercept({ path: '/v1/projects/backend/load-balancers/outputs/nope/' }).reply(404, {});

            await expect(run(['output', 'backend/load-balancers', 'nope'])).rejects.toThrow(
                'No output named "nope" could be found in stack "backend/load-balancers"'
            );
        });
    });

    describe('stack', () => {
        it('prints the stack with its dependents', async () => {
            mockAgent
                .get(ORIGIN)
                .intercept({ path: '/v1/projects/backend/load-balancers/' })
                .reply(200, {
                    id: 'backend/load-balancers',
                    name: 'load-balancers',
                    url: 'https://watson.test/v1/projects/backend/load-balancers/',
                    used_by: [
                        { id: 'frontend/dev', url: 'https://watson.test/v1/projects/frontend/dev/', last_used_at: '2026-03-02T10:15:30Z' },
                    ],
                });

            await run(['stack', 'backend/load-balancers']);

            expect(JSON.parse(written.join(''))).toEqual({
                id: 'backend/load-balancers',
                name: 'load-balancers',
                url: 'https://watson.test/v1/projects/backend/load-balancers/',
                used_by: [
                    { id: 'frontend/dev', url: 'https://watson.test/v1/projects/frontend/dev/', last_used_at: '2026-03-02T10:15:30.000Z' },
                ],
            });
        });

        it('surfaces unexpected statuses', async () => {
            mockAgent.get(ORIGIN).intercept({ path: '/v1/projects/backend/load-balancers/' }).reply(500, 'boom');

            await expect(run(['stack', 'backend/load-balancers'])).rejects.toThrow('unexpected status code: 500');
        });
    });

    describe('configuration', () => {
        it('requires an address and a stack', async () => {
            const program = createProgram({ env: {}, cwd: FIXTURES, dispatcher: mockAgent, exitOverride: true });

            const promise = program.parseAsync(['node', 'watson', 'outputs', 'backend/load-balancers']);
            await expect(promise).rejects.toBeInstanceOf(ConfigurationError);
            await expect(promise).rejects.toMatchObject({
                issues: [expect.objectContaining({ field: 'address' }), expect.objectContaining({ field: 'stack' })],
            });
        });

        it('reads the connection from the env file', async () => {
            mockAgent
                .get('http://file-host:8000')
                .intercept({ path: '/v1/projects/backend/db/outputs/', headers: { 'x-watson-stack': 'frontend/dev' } })
                .reply(200, { url: { value: 'postgres://db' } });

            const program = createProgram({
                env: {},
                cwd: FIXTURES,
                dispatcher: mockAgent,
                write: (text) => {
                    written.push(text);
                },
                exitOverride: true,
            });
            await program.parseAsync(['node', 'watson', '--env-file', 'watson.env', 'outputs', 'backend/db']);

            expect(JSON.parse(written.join('')).url.value).toBe('postgres://db');
        });

        it('rejects an unknown scheme in the address', async () => {
            const program = createProgram({ env: {}, cwd: FIXTURES, dispatcher: mockAgent, exitOverride: true });

            await expect(
                program.parseAsync(['node', 'watson', '--address', 'ftp://x', '--stack', 'a/b', 'stack', 'a/b'])
            ).rejects.toThrow('unknown protocol scheme: ftp');
        });
    });
});
