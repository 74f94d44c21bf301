/**
 * Google Cloud Storage - Object Download
 */

import type { Storage } from '@google-cloud/storage';

export interface ObjectStorage {
    /** Fetches the whole object; no ranged or streamed reads. */
    download(bucket: string, path: string): Promise<Buffer>;
}

export function createObjectStorage(client: Pick<Storage, 'bucket'>): ObjectStorage {
    return {
        async download(bucket, path) {
            const [contents] = await client.bucket(bucket).file(path).download();
            return contents;
        },
    };
}
