import assert from 'node:assert/strict';
import { afterEach, describe, it, mock } from 'node:test';
import { NoSuchKey } from '@aws-sdk/client-s3';
import {
    CONFIG_INPUT_SERIALIZATION,
    computeRetryDelayMs,
    isMissingKeyError,
    ObjectKeyNotFoundError,
    S3SelectObjectFetcher,
    SelectStreamError,
} from './object-fetcher';
import {
    createMockSelectClient,
    createRecordingSleep,
    endEvent,
    recordsEvent,
} from './test-helpers';

function missingKeyError(): NoSuchKey {
    return new NoSuchKey({
        $metadata: {
            httpStatusCode: 404,
        },
        message: 'The specified key does not exist.',
    });
}

function accessDeniedError(): Error {
    const error = new Error('Access Denied');
    error.name = 'AccessDenied';

    return error;
}

const LOCATION = {
    bucket: 'config-bucket',
    inputSerialization: CONFIG_INPUT_SERIALIZATION,
    key: 'stream/config.json',
};

describe('S3SelectObjectFetcher.fetchObjectText', () => {
    it('concatenates record payloads until the end event', async () => {
        const store = createMockSelectClient([{
            events: [
                recordsEvent('{"_1":'),
                {
                    Stats: {
                        Details: {
                            BytesProcessed: 10,
                            BytesReturned: 10,
                            BytesScanned: 10,
                        },
                    },
                },
                recordsEvent('[]}\n'),
                endEvent(),
            ],
        }]);
        const fetcher = new S3SelectObjectFetcher(store.client);

        const text = await fetcher.fetchObjectText(LOCATION);

        assert.equal(text, '{"_1":[]}\n');
    });

    it('sends a select-all query with JSON output', async () => {
        const store = createMockSelectClient([{
            events: [recordsEvent('{}'), endEvent()],
        }]);
        const fetcher = new S3SelectObjectFetcher(store.client);

        await fetcher.fetchObjectText(LOCATION);

        assert.equal(store.calls.length, 1);
        assert.deepEqual(store.calls[0], {
            Bucket: 'config-bucket',
            Expression: 'select * from s3object',
            ExpressionType: 'SQL',
            InputSerialization: {
                CompressionType: 'NONE',
                JSON: {
                    Type: 'DOCUMENT',
                },
            },
            Key: 'stream/config.json',
            OutputSerialization: {
                JSON: {},
            },
        });
    });

    it('ignores events after the end event', async () => {
        const store = createMockSelectClient([{
            events: [
                recordsEvent('first'),
                endEvent(),
                recordsEvent('second'),
            ],
        }]);
        const fetcher = new S3SelectObjectFetcher(store.client);

        assert.equal(await fetcher.fetchObjectText(LOCATION), 'first');
    });

    it('retries a missing key twice and then returns the payload', async () => {
        const store = createMockSelectClient([
            { error: missingKeyError() },
            { error: missingKeyError() },
            { events: [recordsEvent('{"_2":[]}'), endEvent()] },
        ]);
        const recording = createRecordingSleep();
        const fetcher = new S3SelectObjectFetcher(store.client, {
            retryBaseMs: 200,
            sleep: recording.sleep,
        });

        const text = await fetcher.fetchObjectText(LOCATION);

        assert.equal(text, '{"_2":[]}');
        assert.equal(store.calls.length, 3);
        assert.deepEqual(recording.delays, [200, 400]);
    });

    it('propagates other store errors without retrying', async () => {
        const denied = accessDeniedError();
        const store = createMockSelectClient([
            { error: denied },
            { events: [recordsEvent('{}'), endEvent()] },
        ]);
        const recording = createRecordingSleep();
        const fetcher = new S3SelectObjectFetcher(store.client, {
            sleep: recording.sleep,
        });

        await assert.rejects(
            fetcher.fetchObjectText(LOCATION),
            (error: unknown) => error === denied,
        );
        assert.equal(store.calls.length, 1);
        assert.deepEqual(recording.delays, []);
    });

    it('gives up after maxAttempts missing-key failures', async () => {
        const store = createMockSelectClient([
            { error: missingKeyError() },
            { error: missingKeyError() },
            { error: missingKeyError() },
        ]);
        const recording = createRecordingSleep();
        const fetcher = new S3SelectObjectFetcher(store.client, {
            maxAttempts: 3,
            retryBaseMs: 50,
            sleep: recording.sleep,
        });

        await assert.rejects(
            fetcher.fetchObjectText(LOCATION),
            (error: unknown) => {
                assert.ok(error instanceof ObjectKeyNotFoundError);
                assert.equal(error.attempts, 3);
                assert.deepEqual(error.location, {
                    bucket: 'config-bucket',
                    key: 'stream/config.json',
                });
                assert.ok(error.cause instanceof NoSuchKey);

                return true;
            },
        );
        assert.equal(store.calls.length, 3);
        assert.deepEqual(recording.delays, [50, 100]);
    });

    it('re-sends the query when the stream closes before the end event', async () => {
        const store = createMockSelectClient([
            { events: [recordsEvent('{"_1":')] },
            { events: [recordsEvent('{"_1":[]}'), endEvent()] },
        ]);
        const recording = createRecordingSleep();
        const fetcher = new S3SelectObjectFetcher(store.client, {
            retryBaseMs: 100,
            sleep: recording.sleep,
        });

        const text = await fetcher.fetchObjectText(LOCATION);

        assert.equal(text, '{"_1":[]}');
        assert.equal(store.calls.length, 2);
        assert.deepEqual(recording.delays, [100]);
    });

    it('fails when every stream closes before the end event', async () => {
        const store = createMockSelectClient([
            { events: [recordsEvent('{"_1":')] },
            { events: [] },
        ]);
        const recording = createRecordingSleep();
        const fetcher = new S3SelectObjectFetcher(store.client, {
            maxAttempts: 2,
            sleep: recording.sleep,
        });

        await assert.rejects(
            fetcher.fetchObjectText(LOCATION),
            (error: unknown) => {
                assert.ok(error instanceof SelectStreamError);
                assert.equal(
                    error.message,
                    'select stream for key stream/config.json closed before '
                    + 'the end event after 2 attempt(s)',
                );

                return true;
            },
        );
        assert.equal(store.calls.length, 2);
        assert.deepEqual(recording.delays, [200]);
    });

    it('fails when the response has no payload stream', async () => {
        const store = createMockSelectClient([{ payload: null }]);
        const fetcher = new S3SelectObjectFetcher(store.client);

        await assert.rejects(
            fetcher.fetchObjectText(LOCATION),
            /missing select payload for key stream\/config.json/,
        );
    });

    it('retries without waiting when the retry base is zero', async () => {
        const store = createMockSelectClient([
            { error: missingKeyError() },
            { events: [recordsEvent('{}'), endEvent()] },
        ]);
        const recording = createRecordingSleep();
        const fetcher = new S3SelectObjectFetcher(store.client, {
            retryBaseMs: 0,
            sleep: recording.sleep,
        });

        assert.equal(await fetcher.fetchObjectText(LOCATION), '{}');
        assert.deepEqual(recording.delays, [0]);
    });

    it('makes a single attempt when maxAttempts is below one', async () => {
        for (const maxAttempts of [0, -1]) {
            const store = createMockSelectClient([
                { error: missingKeyError() },
                { events: [recordsEvent('{}'), endEvent()] },
            ]);
            const recording = createRecordingSleep();
            const fetcher = new S3SelectObjectFetcher(store.client, {
                maxAttempts,
                sleep: recording.sleep,
            });

            await assert.rejects(
                fetcher.fetchObjectText(LOCATION),
                ObjectKeyNotFoundError,
            );
            assert.equal(store.calls.length, 1);
            assert.deepEqual(recording.delays, []);
        }
    });

    it('rejects an empty bucket or key before calling the store', async () => {
        const store = createMockSelectClient([]);
        const fetcher = new S3SelectObjectFetcher(store.client);

        await assert.rejects(
            fetcher.fetchObjectText({ ...LOCATION, bucket: '  ' }),
            /bucket must not be empty/,
        );
        await assert.rejects(
            fetcher.fetchObjectText({ ...LOCATION, key: '' }),
            /key must not be empty/,
        );
        assert.equal(store.calls.length, 0);
    });
});

describe('S3SelectObjectFetcher logging', () => {
    afterEach(() => {
        mock.restoreAll();
    });

    it('logs code, message and key for each missing-key failure', async () => {
        const errorLog = mock.method(console, 'error', () => undefined);
        const select = createMockSelectClient([
            { error: missingKeyError() },
            { error: missingKeyError() },
            { events: [recordsEvent('{}'), endEvent()] },
        ]);
        const fetcher = new S3SelectObjectFetcher(select.client, {
            sleep: createRecordingSleep().sleep,
        });

        await fetcher.fetchObjectText(LOCATION);

        assert.deepEqual(
            errorLog.mock.calls.map((call) => call.arguments),
            [1, 2].map((attempt) => [
                'object-store select key not found',
                {
                    attempt,
                    code: 'NoSuchKey',
                    key: 'stream/config.json',
                    message: 'The specified key does not exist.',
                },
            ]),
        );
    });

    it('does not log errors it rethrows', async () => {
        const errorLog = mock.method(console, 'error', () => undefined);
        const select = createMockSelectClient([{ error: accessDeniedError() }]);
        const fetcher = new S3SelectObjectFetcher(select.client);

        await assert.rejects(fetcher.fetchObjectText(LOCATION), /Access Denied/);
        assert.equal(errorLog.mock.callCount(), 0);
    });
});

describe('isMissingKeyError', () => {
    it('matches the SDK NoSuchKey exception', () => {
        assert.equal(isMissingKeyError(missingKeyError()), true);
    });

    it('matches a raw error code', () => {
        assert.equal(isMissingKeyError({ Code: 'NoSuchKey' }), true);
    });

    it('does not match other errors', () => {
        assert.equal(isMissingKeyError(accessDeniedError()), false);
        assert.equal(isMissingKeyError(new Error('boom')), false);
        assert.equal(isMissingKeyError(undefined), false);
    });
});

describe('computeRetryDelayMs', () => {
    it('doubles per attempt', () => {
        assert.equal(computeRetryDelayMs(1, 100), 100);
        assert.equal(computeRetryDelayMs(3, 100), 400);
    });

    it('caps growth at the eighth attempt', () => {
        assert.equal(computeRetryDelayMs(8, 100), 12800);
        assert.equal(computeRetryDelayMs(20, 100), 12800);
    });
});
