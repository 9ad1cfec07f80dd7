import {
    S3Client,
    SelectObjectContentCommand,
    type InputSerialization,
    type S3ClientConfig,
    type SelectObjectContentCommandOutput,
} from '@aws-sdk/client-s3';

const SELECT_ALL_EXPRESSION = 'select * from s3object';
const MISSING_KEY_ERROR_CODE = 'NoSuchKey';
const DEFAULT_MAX_ATTEMPTS = 10;
const DEFAULT_RETRY_BASE_MS = 200;

export const CONFIG_INPUT_SERIALIZATION: InputSerialization = {
    CompressionType: 'NONE',
    JSON: {
        Type: 'DOCUMENT',
    },
};

export type ObjectLocation = {
    bucket: string;
    key: string;
};

export type FetchObjectTextInput = ObjectLocation & {
    inputSerialization: InputSerialization;
};

export interface ObjectTextFetcher {
    fetchObjectText(input: FetchObjectTextInput): Promise<string>;
}

export type SelectObjectFetcherOptions = {
    maxAttempts?: number;
    retryBaseMs?: number;
    sleep?: (ms: number) => Promise<void>;
};

export type S3SelectObjectFetcherConfig = SelectObjectFetcherOptions & {
    accessKeyId?: string;
    endpoint?: string;
    forcePathStyle?: boolean;
    region: string;
    secretAccessKey?: string;
    sessionToken?: string;
};

export class ObjectKeyNotFoundError extends Error {
    constructor(
        readonly location: ObjectLocation,
        readonly attempts: number,
        options?: { cause?: unknown },
    ) {
        super(
            `object ${location.key} not found in bucket ${location.bucket} `
            + `after ${attempts} attempt(s)`,
            options,
        );
        this.name = 'ObjectKeyNotFoundError';
    }
}

export class SelectStreamError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SelectStreamError';
    }
}

function sleepMs(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

export function computeRetryDelayMs(
    attempt: number,
    retryBaseMs: number,
): number {
    const cappedAttempt = Math.min(Math.max(attempt, 1), 8);

    return retryBaseMs * (2 ** (cappedAttempt - 1));
}

function readErrorCode(error: unknown): string {
    if (!error || typeof error !== 'object') {
        return '';
    }

    const code = ('Code' in error && error.Code)
        || ('code' in error && error.code)
        || ('name' in error && error.name);

    return code ? String(code) : '';
}

function readErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }

    return String(error);
}

export function isMissingKeyError(error: unknown): boolean {
    return readErrorCode(error) === MISSING_KEY_ERROR_CODE;
}

/** Resolves to `null` when the stream closes before the end event. */
async function readSelectPayload(
    payload: SelectObjectContentCommandOutput['Payload'],
    key: string,
): Promise<string | null> {
    if (!payload) {
        throw new SelectStreamError(`missing select payload for key ${key}`);
    }

    const chunks: Buffer[] = [];
    let ended = false;

    for await (const event of payload) {
        if (event.Records?.Payload) {
            chunks.push(Buffer.from(event.Records.Payload));
        }

        if (event.End) {
            ended = true;
            break;
        }
    }

    if (!ended) {
        return null;
    }

    return Buffer.concat(chunks).toString('utf8');
}

/**
 * Reads a whole object through S3 Select. A missing key, or a stream that
 * closes before its end event, is retried with backoff; every other failure
 * propagates as thrown by the client.
 */
export class S3SelectObjectFetcher implements ObjectTextFetcher {
    private readonly maxAttempts: number;

    private readonly retryBaseMs: number;

    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private readonly client: S3Client,
        options: SelectObjectFetcherOptions = {},
    ) {
        const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;

        this.maxAttempts = Number.isFinite(maxAttempts)
            ? Math.max(1, Math.floor(maxAttempts))
            : DEFAULT_MAX_ATTEMPTS;
        this.retryBaseMs = Math.max(
            0,
            options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS,
        );
        this.sleep = options.sleep || sleepMs;
    }

    async fetchObjectText(input: FetchObjectTextInput): Promise<string> {
        const bucket = String(input.bucket || '').trim();
        const key = String(input.key || '').trim();

        if (!bucket) {
            throw new Error('object-store select bucket must not be empty');
        }

        if (!key) {
            throw new Error('object-store select key must not be empty');
        }

        for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
            let response: SelectObjectContentCommandOutput;

            try {
                response = await this.client.send(
                    new SelectObjectContentCommand({
                        Bucket: bucket,
                        Expression: SELECT_ALL_EXPRESSION,
                        ExpressionType: 'SQL',
                        InputSerialization: input.inputSerialization,
                        Key: key,
                        OutputSerialization: {
                            JSON: {},
                        },
                    }),
                );
            } catch (error: unknown) {
                if (!isMissingKeyError(error)) {
                    throw error;
                }

                console.error('object-store select key not found', {
                    attempt,
                    code: readErrorCode(error),
                    key,
                    message: readErrorMessage(error),
                });

                if (attempt >= this.maxAttempts) {
                    throw new ObjectKeyNotFoundError(
                        { bucket, key },
                        attempt,
                        { cause: error },
                    );
                }

                await this.sleep(computeRetryDelayMs(attempt, this.retryBaseMs));
                continue;
            }

            const text = await readSelectPayload(response.Payload, key);

            if (text !== null) {
                return text;
            }

            console.error('object-store select stream closed before end event', {
                attempt,
                key,
            });

            if (attempt >= this.maxAttempts) {
                throw new SelectStreamError(
                    `select stream for key ${key} closed before the end event `
                    + `after ${attempt} attempt(s)`,
                );
            }

            await this.sleep(computeRetryDelayMs(attempt, this.retryBaseMs));
        }

        throw new Error('unreachable retry state');
    }
}

export function createS3SelectObjectFetcher(
    config: S3SelectObjectFetcherConfig,
): ObjectTextFetcher {
    const clientConfig: S3ClientConfig = {
        forcePathStyle: Boolean(config.forcePathStyle),
        region: config.region,
    };

    if (config.endpoint) {
        clientConfig.endpoint = config.endpoint;
    }

    if (config.accessKeyId && config.secretAccessKey) {
        clientConfig.credentials = {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey,
            sessionToken: config.sessionToken,
        };
    }

    const client = new S3Client(clientConfig);

    return new S3SelectObjectFetcher(client, {
        maxAttempts: config.maxAttempts,
        retryBaseMs: config.retryBaseMs,
        sleep: config.sleep,
    });
}
