import { ProjectConfigManager } from './config-manager';
import {
    parseStreamConfigEnv,
    type StreamConfigEnv,
    type StreamConfigSourceEnv,
} from './env';
import {
    createS3SelectObjectFetcher,
    type ObjectLocation,
    type ObjectTextFetcher,
} from './object-fetcher';

export type RuntimeBootstrap = {
    config: StreamConfigEnv;
    fetcher: ObjectTextFetcher;
    location: ObjectLocation;
};

export type RuntimeDependencyOverrides = {
    createFetcher?: (
        source: StreamConfigSourceEnv,
    ) => ObjectTextFetcher;
};

export function createRuntime(
    env: NodeJS.ProcessEnv,
    dependencies: RuntimeDependencyOverrides = {},
): RuntimeBootstrap {
    const config = parseStreamConfigEnv(env);
    const createFetcher = dependencies.createFetcher
        || ((source: StreamConfigSourceEnv) => {
            return createS3SelectObjectFetcher({
                accessKeyId: source.accessKeyId,
                endpoint: source.endpoint,
                forcePathStyle: source.forcePathStyle,
                maxAttempts: source.maxAttempts,
                region: source.region,
                retryBaseMs: source.retryBaseMs,
                secretAccessKey: source.secretAccessKey,
                sessionToken: source.sessionToken,
            });
        });

    return {
        config,
        fetcher: createFetcher(config.source),
        location: {
            bucket: config.source.bucket,
            key: config.source.key,
        },
    };
}

export async function loadRuntimeConfigManager(
    runtime: RuntimeBootstrap,
): Promise<ProjectConfigManager> {
    const manager = await ProjectConfigManager.load(
        runtime.fetcher,
        runtime.location,
    );

    console.log('project configs loaded', {
        bucket: runtime.location.bucket,
        key: runtime.location.key,
        pooled_keyword_count: manager.pooledFilterConfig.keywords.size,
        pooled_language_count: manager.pooledFilterConfig.languages.size,
        slugs: manager.slugs(),
        version: manager.version.toString(),
    });

    return manager;
}
