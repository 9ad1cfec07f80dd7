export type StorageMode =
    | 'TEST_MODE'
    | 'S3_ES'
    | 'S3_ES_NO_UNMATCHED'
    | 'S3_ES_NO_RETWEETS';

export type ImageStorageMode =
    | 'ACTIVE'
    | 'INACTIVE';

export type ModelEndpoints = Readonly<Record<string, string>>;

export type ProjectConfig = Readonly<{
    imageStorageMode: ImageStorageMode;
    keywords: readonly string[];
    languages: readonly string[];
    locales: readonly string[];
    /** `null` when the project has no inference attached. */
    modelEndpoints: ModelEndpoints | null;
    slug: string;
    storageMode: StorageMode;
}>;

/** Stored (snake_case) shape of one project entry. */
export type ProjectConfigRecord = {
    keywords: string[];
    lang: string[];
    locales: string[];
    slug: string;
    storage_mode: StorageMode;
    image_storage_mode: ImageStorageMode;
    model_endpoints: Record<string, string> | null;
};

export type VersionedConfig = {
    configs: ProjectConfig[];
    label: string;
    version: bigint;
};

export class MalformedConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MalformedConfigError';
    }
}

export class VersionSelectionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'VersionSelectionError';
    }
}

const STORAGE_MODES: Readonly<Record<StorageMode, true>> = {
    S3_ES: true,
    S3_ES_NO_RETWEETS: true,
    S3_ES_NO_UNMATCHED: true,
    TEST_MODE: true,
};

const IMAGE_STORAGE_MODES: Readonly<Record<ImageStorageMode, true>> = {
    ACTIVE: true,
    INACTIVE: true,
};

const VERSION_LABEL_PATTERN = /^_(\d+)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
    return Boolean(value)
        && typeof value === 'object'
        && !Array.isArray(value);
}

function hasOwn(table: object, name: string): boolean {
    return Object.prototype.hasOwnProperty.call(table, name);
}

function isStorageMode(value: string): value is StorageMode {
    return hasOwn(STORAGE_MODES, value);
}

function isImageStorageMode(value: string): value is ImageStorageMode {
    return hasOwn(IMAGE_STORAGE_MODES, value);
}

function readString(
    value: unknown,
    fieldPath: string,
): string {
    if (typeof value !== 'string') {
        throw new MalformedConfigError(`${fieldPath} must be a string`);
    }

    return value;
}

function readStringList(
    value: unknown,
    fieldPath: string,
): string[] {
    if (!Array.isArray(value)) {
        throw new MalformedConfigError(`${fieldPath} must be an array of strings`);
    }

    return value.map((item: unknown, index: number) => {
        return readString(item, `${fieldPath}[${index}]`);
    });
}

function readStorageMode(
    value: unknown,
    fieldPath: string,
): StorageMode {
    const name = readString(value, fieldPath);

    if (!isStorageMode(name)) {
        throw new MalformedConfigError(
            `${fieldPath} must be one of `
            + `${Object.keys(STORAGE_MODES).join('|')}, got ${name}`,
        );
    }

    return name;
}

function readImageStorageMode(
    value: unknown,
    fieldPath: string,
): ImageStorageMode {
    const name = readString(value, fieldPath);

    if (!isImageStorageMode(name)) {
        throw new MalformedConfigError(
            `${fieldPath} must be one of `
            + `${Object.keys(IMAGE_STORAGE_MODES).join('|')}, got ${name}`,
        );
    }

    return name;
}

function readModelEndpoints(
    value: unknown,
    fieldPath: string,
): Record<string, string> | null {
    if (value === undefined || value === null) {
        return null;
    }

    if (!isRecord(value)) {
        throw new MalformedConfigError(
            `${fieldPath} must be an object of strings or null`,
        );
    }

    const endpoints: Record<string, string> = {};

    for (const [model, endpoint] of Object.entries(value)) {
        endpoints[model] = readString(endpoint, `${fieldPath}.${model}`);
    }

    return endpoints;
}

function freezeConfig(config: ProjectConfig): ProjectConfig {
    Object.freeze(config.keywords);
    Object.freeze(config.languages);
    Object.freeze(config.locales);

    if (config.modelEndpoints) {
        Object.freeze(config.modelEndpoints);
    }

    return Object.freeze(config);
}

export function decodeProjectConfig(
    value: unknown,
    fieldPath = 'config',
): ProjectConfig {
    if (!isRecord(value)) {
        throw new MalformedConfigError(`${fieldPath} must be an object`);
    }

    const slug = readString(value.slug, `${fieldPath}.slug`);

    if (!slug) {
        throw new MalformedConfigError(`${fieldPath}.slug must not be empty`);
    }

    return freezeConfig({
        imageStorageMode: readImageStorageMode(
            value.image_storage_mode,
            `${fieldPath}.image_storage_mode`,
        ),
        keywords: readStringList(value.keywords, `${fieldPath}.keywords`),
        languages: readStringList(value.lang, `${fieldPath}.lang`),
        locales: readStringList(value.locales, `${fieldPath}.locales`),
        modelEndpoints: readModelEndpoints(
            value.model_endpoints,
            `${fieldPath}.model_endpoints`,
        ),
        slug,
        storageMode: readStorageMode(
            value.storage_mode,
            `${fieldPath}.storage_mode`,
        ),
    });
}

export function encodeProjectConfig(
    config: ProjectConfig,
): ProjectConfigRecord {
    return {
        keywords: [...config.keywords],
        lang: [...config.languages],
        locales: [...config.locales],
        slug: config.slug,
        storage_mode: config.storageMode,
        image_storage_mode: config.imageStorageMode,
        model_endpoints: config.modelEndpoints
            ? { ...config.modelEndpoints }
            : null,
    };
}

/**
 * Picks the `_<N>` label with the largest N. Keys that are not version
 * labels are skipped; on equal N the first key wins.
 */
export function selectLatestVersion(
    document: Record<string, unknown>,
): { label: string; version: bigint } {
    let latest: { label: string; version: bigint } | null = null;

    for (const label of Object.keys(document)) {
        const match = VERSION_LABEL_PATTERN.exec(label);

        if (!match) {
            continue;
        }

        const version = BigInt(match[1]);

        if (!latest || version > latest.version) {
            latest = {
                label,
                version,
            };
        }
    }

    if (!latest) {
        throw new VersionSelectionError(
            'config document has no version label of the form _<integer>',
        );
    }

    return latest;
}

export function parseVersionedConfigDocument(
    text: string,
): VersionedConfig {
    let document: unknown;

    try {
        document = JSON.parse(text);
    } catch (error: unknown) {
        throw new MalformedConfigError('config document is not valid JSON', {
            cause: error,
        });
    }

    if (!isRecord(document)) {
        throw new MalformedConfigError('config document must be a JSON object');
    }

    const { label, version } = selectLatestVersion(document);
    const entries = document[label];

    if (!Array.isArray(entries)) {
        throw new MalformedConfigError(`${label} must be an array of configs`);
    }

    const configs = entries.map((entry: unknown, index: number) => {
        return decodeProjectConfig(entry, `${label}[${index}]`);
    });

    return {
        configs,
        label,
        version,
    };
}
