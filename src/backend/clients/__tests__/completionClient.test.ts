/**
 * Completion Client Tests
 *
 * global.fetch is replaced per test, so no request leaves the process.
 */

import {
    CompletionClient,
    CompletionError,
    CompletionErrorCode,
    createCompletionClient,
} from '../completionClient';
import { CompletionMessage } from '../../../shared/types';

const messages: CompletionMessage[] = [
    { role: 'system', content: 'Be kind.' },
    { role: 'user', content: 'I am struggling with sleep.' },
];

function jsonResponse(body: unknown, status: number = 200, statusText: string = 'OK'): Response {
    return new Response(JSON.stringify(body), {
        status,
        statusText,
        headers: { 'Content-Type': 'application/json' },
    });
}

function completionBody(content: string): unknown {
    return { choices: [{ index: 0, message: { role: 'assistant', content } }] };
}

async function captureError(promise: Promise<unknown>): Promise<CompletionError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof CompletionError) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected the call to fail');
}

describe('CompletionClient', () => {
    let fetchSpy: jest.SpiedFunction<typeof fetch>;
    let client: CompletionClient;

    beforeEach(() => {
        fetchSpy = jest.spyOn(global, 'fetch');
        client = createCompletionClient({
            baseUrl: 'https://api.example.test/v1',
            apiKey: 'test-key',
        });
    });

    afterEach(() => {
        fetchSpy.mockRestore();
    });

    describe('successful calls', () => {
        it('should return the trimmed text of the first choice', async () => {
            fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('  Rest is important.  ')));

            await expect(client.generateChatCompletion(messages)).resolves.toBe('Rest is important.');
        });

        it('should POST the messages with bearer auth and the default parameters', async () => {
            fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('ok')));

            await client.generateChatCompletion(messages);

            expect(fetchSpy).toHaveBeenCalledTimes(1);
            const [url, init] = fetchSpy.mock.calls[0];
            expect(url).toBe('https://api.example.test/v1/chat/completions');
            expect(init?.method).toBe('POST');
            expect(init?.headers).toEqual({
                Authorization: 'Bearer test-key',
                'Content-Type': 'application/json',
            });
            expect(JSON.parse(String(init?.body))).toEqual({
                model: 'grok-3',
                messages,
                temperature: 0.7,
                max_tokens: 150,
            });
        });

        it('should apply per-call overrides', async () => {
            fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('ok')));

            await client.generateChatCompletion(messages, { model: 'grok-mini', temperature: 0.2, maxTokens: 64 });

            const init = fetchSpy.mock.calls[0][1];
            expect(JSON.parse(String(init?.body))).toMatchObject({
                model: 'grok-mini',
                temperature: 0.2,
                max_tokens: 64,
            });
        });

        it('should not double the slash when the base URL ends with one', async () => {
            const slashed = new CompletionClient({ baseUrl: 'https://api.example.test/v1/', apiKey: 'test-key' });
            fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('ok')));

            await slashed.generateChatCompletion(messages);

            expect(fetchSpy.mock.calls[0][0]).toBe('https://api.example.test/v1/chat/completions');
        });
    });

    describe('error responses', () => {
        it('should report rejected credentials as UNAUTHORIZED', async () => {
            fetchSpy.mockResolvedValueOnce(jsonResponse({ error: 'Incorrect API key' }, 401, 'Unauthorized'));

            const error = await captureError(client.generateChatCompletion(messages));

            expect(error.code).toBe(CompletionErrorCode.UNAUTHORIZED);
            expect(error.status).toBe(401);
            expect(error.message).toBe('Completion API rejected the credentials: Incorrect API key');
        });

        it('should use the error message from the body', async () => {
            fetchSpy.mockResolvedValueOnce(
                jsonResponse({ error: { message: 'Model is overloaded' } }, 503, 'Service Unavailable')
            );

            const error = await captureError(client.generateChatCompletion(messages));

            expect(error.code).toBe(CompletionErrorCode.API_ERROR);
            expect(error.status).toBe(503);
            expect(error.message).toBe('Completion API error: Model is overloaded');
        });

        it('should fall back to the status line when the body is not JSON', async () => {
            fetchSpy.mockResolvedValueOnce(
                new Response('upstream exploded', { status: 500, statusText: 'Internal Server Error' })
            );

            const error = await captureError(client.generateChatCompletion(messages));

            expect(error.code).toBe(CompletionErrorCode.API_ERROR);
            expect(error.message).toBe('Completion API error: HTTP 500: Internal Server Error');
        });
    });

    describe('malformed responses', () => {
        it('should reject a body without choices', async () => {
            fetchSpy.mockResolvedValueOnce(jsonResponse({ choices: [] }));

            const error = await captureError(client.generateChatCompletion(messages));
            expect(error.code).toBe(CompletionErrorCode.MALFORMED_RESPONSE);
        });

        it('should reject a body that is not JSON', async () => {
            fetchSpy.mockResolvedValueOnce(new Response('<html>oops</html>', { status: 200 }));

            const error = await captureError(client.generateChatCompletion(messages));
            expect(error.code).toBe(CompletionErrorCode.MALFORMED_RESPONSE);
        });

        it('should reject whitespace-only generated text', async () => {
            fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('   ')));

            const error = await captureError(client.generateChatCompletion(messages));
            expect(error.code).toBe(CompletionErrorCode.MALFORMED_RESPONSE);
        });
    });

    describe('transport failures', () => {
        it('should report network failures as CONNECTION_FAILED', async () => {
            fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

            const error = await captureError(client.generateChatCompletion(messages));

            expect(error.code).toBe(CompletionErrorCode.CONNECTION_FAILED);
            expect(error.cause).toBeInstanceOf(TypeError);
        });

        it('should abort and report TIMEOUT once timeoutMs has passed', async () => {
            const impatient = new CompletionClient({ apiKey: 'test-key', timeoutMs: 10 });
            fetchSpy.mockImplementationOnce(
                (_input, init) =>
                    new Promise<Response>((_resolve, reject) => {
                        init?.signal?.addEventListener('abort', () => {
                            const abortError = new Error('This operation was aborted');
                            abortError.name = 'AbortError';
                            reject(abortError);
                        });
                    })
            );

            const error = await captureError(impatient.generateChatCompletion(messages));

            expect(error.code).toBe(CompletionErrorCode.TIMEOUT);
            expect(error.message).toBe('Request timed out after 10ms');
        });

        it('should report TIMEOUT when the body stalls after the headers arrive', async () => {
            const impatient = new CompletionClient({ apiKey: 'test-key', timeoutMs: 10 });
            fetchSpy.mockImplementationOnce(async (_input, init) => {
                const stalledBody = new ReadableStream<Uint8Array>({
                    start(streamController) {
                        init?.signal?.addEventListener('abort', () => {
                            const abortError = new Error('This operation was aborted');
                            abortError.name = 'AbortError';
                            streamController.error(abortError);
                        });
                    },
                });
                return new Response(stalledBody, {
                    status: 200,
                    headers: { 'Content-Type': 'application/json' },
                });
            });

            const error = await captureError(impatient.generateChatCompletion(messages));

            expect(error.code).toBe(CompletionErrorCode.TIMEOUT);
            expect(error.message).toBe('Request timed out after 10ms');
        });

        it('should wrap anything else as UNKNOWN', async () => {
            fetchSpy.mockRejectedValueOnce(new Error('boom'));

            const error = await captureError(client.generateChatCompletion(messages));

            expect(error.code).toBe(CompletionErrorCode.UNKNOWN);
            expect(error.message).toBe('Failed to generate completion: boom');
        });
    });
});
