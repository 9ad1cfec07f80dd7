import {
    SelectObjectContentCommand,
    type S3Client,
    type SelectObjectContentCommandInput,
    type SelectObjectContentEventStream,
} from '@aws-sdk/client-s3';
import type {
    FetchObjectTextInput,
    ObjectTextFetcher,
} from './object-fetcher';
import type { ProjectConfigRecord } from './project-config';

/** One scripted reply: an event list, a thrown error, or no payload at all. */
export type MockSelectReply =
    | { events: SelectObjectContentEventStream[] }
    | { error: unknown }
    | { payload: null };

export function recordsEvent(text: string): SelectObjectContentEventStream {
    return {
        Records: {
            Payload: Buffer.from(text, 'utf8'),
        },
    };
}

export function endEvent(): SelectObjectContentEventStream {
    return {
        End: {},
    };
}

async function* streamEvents(
    events: SelectObjectContentEventStream[],
): AsyncGenerator<SelectObjectContentEventStream> {
    for (const event of events) {
        yield event;
    }
}

export function createMockSelectClient(replies: MockSelectReply[]) {
    const calls: SelectObjectContentCommandInput[] = [];

    return {
        calls,
        client: {
            send: async (command: unknown) => {
                if (!(command instanceof SelectObjectContentCommand)) {
                    throw new Error('unknown command');
                }

                calls.push(command.input);
                const reply = replies[calls.length - 1];

                if (!reply) {
                    throw new Error(`unexpected select call ${calls.length}`);
                }

                if ('error' in reply) {
                    throw reply.error;
                }

                if ('payload' in reply) {
                    return {};
                }

                return {
                    Payload: streamEvents(reply.events),
                };
            },
        } as unknown as S3Client,
    };
}

export function createRecordingSleep() {
    const delays: number[] = [];

    return {
        delays,
        sleep: async (ms: number) => {
            delays.push(ms);
        },
    };
}

export class StaticObjectTextFetcher implements ObjectTextFetcher {
    public readonly calls: FetchObjectTextInput[] = [];

    constructor(private readonly text: string) {}

    async fetchObjectText(input: FetchObjectTextInput): Promise<string> {
        this.calls.push(input);

        return this.text;
    }
}

export function buildTestRecord(
    overrides: Partial<ProjectConfigRecord> = {},
): ProjectConfigRecord {
    return {
        keywords: ['flood', 'storm'],
        lang: ['en', 'de'],
        locales: ['en-US'],
        slug: 'weather',
        storage_mode: 'S3_ES',
        image_storage_mode: 'ACTIVE',
        model_endpoints: null,
        ...overrides,
    };
}

export function buildTestDocument(
    versions: Record<string, unknown[]>,
): string {
    return JSON.stringify(versions);
}
