import { createRuntime, loadRuntimeConfigManager } from './runtime';

export {
    ConfigWriteError,
    poolFilterConfig,
    ProjectConfigManager,
    type FilterConfig,
    type TrackingInfo,
} from './config-manager';
export {
    CONFIG_INPUT_SERIALIZATION,
    createS3SelectObjectFetcher,
    ObjectKeyNotFoundError,
    S3SelectObjectFetcher,
    SelectStreamError,
    type ObjectLocation,
    type ObjectTextFetcher,
} from './object-fetcher';
export {
    decodeProjectConfig,
    encodeProjectConfig,
    MalformedConfigError,
    parseVersionedConfigDocument,
    VersionSelectionError,
    type ImageStorageMode,
    type ProjectConfig,
    type ProjectConfigRecord,
    type StorageMode,
} from './project-config';
export { createRuntime, loadRuntimeConfigManager } from './runtime';

async function main(): Promise<void> {
    const runtime = createRuntime(process.env);
    const manager = await loadRuntimeConfigManager(runtime);
    const outputPath = runtime.config.outputPath;

    if (outputPath) {
        await manager.write(outputPath);
        console.log('project configs written', {
            output_path: outputPath,
            project_count: manager.configs.length,
        });
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('stream-filter-config failed', error);
        process.exitCode = 1;
    });
}
