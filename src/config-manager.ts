import { writeFile } from 'node:fs/promises';
import {
    CONFIG_INPUT_SERIALIZATION,
    type ObjectLocation,
    type ObjectTextFetcher,
} from './object-fetcher';
import {
    encodeProjectConfig,
    parseVersionedConfigDocument,
    type ProjectConfig,
} from './project-config';

export type FilterConfig = {
    keywords: ReadonlySet<string>;
    languages: ReadonlySet<string>;
};

export type TrackingInfo = {
    keywords: readonly string[];
    languages: readonly string[];
    slug: string;
};

export class ConfigWriteError extends Error {
    constructor(
        readonly path: string,
        options?: { cause?: unknown },
    ) {
        super(`failed to write project configs to ${path}`, options);
        this.name = 'ConfigWriteError';
    }
}

/**
 * Unions every project's keywords and languages so that a single shared
 * stream can filter for all projects at once.
 */
export function poolFilterConfig(
    configs: readonly ProjectConfig[],
): FilterConfig {
    const keywords = new Set<string>();
    const languages = new Set<string>();

    for (const config of configs) {
        for (const keyword of config.keywords) {
            keywords.add(keyword);
        }

        for (const language of config.languages) {
            languages.add(language);
        }
    }

    return {
        keywords,
        languages,
    };
}

export class ProjectConfigManager {
    readonly pooledFilterConfig: FilterConfig;

    private constructor(
        readonly configs: readonly ProjectConfig[],
        readonly version: bigint,
    ) {
        this.pooledFilterConfig = poolFilterConfig(configs);
    }

    static async load(
        fetcher: ObjectTextFetcher,
        location: ObjectLocation,
    ): Promise<ProjectConfigManager> {
        const text = await fetcher.fetchObjectText({
            bucket: location.bucket,
            inputSerialization: CONFIG_INPUT_SERIALIZATION,
            key: location.key,
        });

        return ProjectConfigManager.fromDocument(text);
    }

    static fromDocument(text: string): ProjectConfigManager {
        const { configs, version } = parseVersionedConfigDocument(text);

        return new ProjectConfigManager(Object.freeze(configs), version);
    }

    getBySlug(slug: string): ProjectConfig | null {
        return this.configs.find((config) => config.slug === slug) || null;
    }

    getTrackingInfo(slug: string): TrackingInfo | null {
        const config = this.getBySlug(slug);

        if (!config) {
            return null;
        }

        return {
            keywords: config.keywords,
            languages: config.languages,
            slug: config.slug,
        };
    }

    slugs(): string[] {
        return this.configs.map((config) => config.slug);
    }

    async write(path: string): Promise<void> {
        const records = this.configs.map(encodeProjectConfig);

        try {
            await writeFile(
                path,
                `${JSON.stringify(records, null, 4)}\n`,
                'utf8',
            );
        } catch (error: unknown) {
            throw new ConfigWriteError(path, { cause: error });
        }
    }
}
