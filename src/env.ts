export type StreamConfigSourceEnv = {
    accessKeyId?: string;
    bucket: string;
    endpoint?: string;
    forcePathStyle: boolean;
    key: string;
    maxAttempts: number;
    region: string;
    retryBaseMs: number;
    secretAccessKey?: string;
    sessionToken?: string;
};

export type StreamConfigEnv = {
    outputPath?: string;
    source: StreamConfigSourceEnv;
};

/** Falls back when the value is unset, not an integer, or below `minimum`. */
function parseIntAtLeast(
    value: string | undefined,
    minimum: number,
    fallback: number,
): number {
    const trimmed = value?.trim();

    if (!trimmed || !/^-?\d+$/.test(trimmed)) {
        return fallback;
    }

    const parsed = Number.parseInt(trimmed, 10);

    return parsed >= minimum ? parsed : fallback;
}

function readOptionalString(
    value: string | undefined,
): string | undefined {
    if (value === undefined) {
        return undefined;
    }

    const trimmed = String(value).trim();

    return trimmed || undefined;
}

function readRequiredString(
    env: NodeJS.ProcessEnv,
    key: string,
): string {
    const value = readOptionalString(env[key]);

    if (!value) {
        throw new Error(`${key} is required`);
    }

    return value;
}

function parseBoolean(
    value: string | undefined,
    fallback: boolean,
    key: string,
): boolean {
    const normalized = readOptionalString(value)?.toLowerCase();

    if (!normalized) {
        return fallback;
    }

    if (
        normalized === '1'
        || normalized === 'true'
        || normalized === 'yes'
        || normalized === 'on'
    ) {
        return true;
    }

    if (
        normalized === '0'
        || normalized === 'false'
        || normalized === 'no'
        || normalized === 'off'
    ) {
        return false;
    }

    throw new Error(`${key} must be true or false when provided`);
}

export function parseStreamConfigEnv(
    env: NodeJS.ProcessEnv,
): StreamConfigEnv {
    const accessKeyId = readOptionalString(
        env.STREAM_CONFIG_ACCESS_KEY_ID,
    );
    const secretAccessKey = readOptionalString(
        env.STREAM_CONFIG_SECRET_ACCESS_KEY,
    );

    if (
        (accessKeyId && !secretAccessKey)
        || (!accessKeyId && secretAccessKey)
    ) {
        throw new Error(
            'STREAM_CONFIG_ACCESS_KEY_ID and '
            + 'STREAM_CONFIG_SECRET_ACCESS_KEY must be '
            + 'set together when provided',
        );
    }

    return {
        outputPath: readOptionalString(env.STREAM_CONFIG_OUTPUT_PATH),
        source: {
            accessKeyId,
            bucket: readRequiredString(env, 'STREAM_CONFIG_BUCKET'),
            endpoint: readOptionalString(env.STREAM_CONFIG_ENDPOINT),
            forcePathStyle: parseBoolean(
                env.STREAM_CONFIG_FORCE_PATH_STYLE,
                false,
                'STREAM_CONFIG_FORCE_PATH_STYLE',
            ),
            key: readRequiredString(env, 'STREAM_CONFIG_KEY'),
            maxAttempts: parseIntAtLeast(
                env.STREAM_CONFIG_MAX_ATTEMPTS,
                1,
                10,
            ),
            region: readRequiredString(env, 'STREAM_CONFIG_REGION'),
            retryBaseMs: parseIntAtLeast(
                env.STREAM_CONFIG_RETRY_BASE_MS,
                0,
                200,
            ),
            secretAccessKey,
            sessionToken: readOptionalString(
                env.STREAM_CONFIG_SESSION_TOKEN,
            ),
        },
    };
}
