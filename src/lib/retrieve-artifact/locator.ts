import { InvalidLocatorError } from '@/utils/errors.js';

export interface StorageLocation {
    bucket: string;
    path: string;
}

const STORAGE_SCHEME = 'gs:';

/**
 * Split a `gs://bucket/path/to/object` URI into bucket and object path.
 */
export function parseStorageLocator(locator: string): StorageLocation {
    let url: URL;
    try {
        url = new URL(locator);
    } catch (error) {
        throw new InvalidLocatorError(`Invalid storage locator: ${locator}`, { cause: error, context: { locator } });
    }

    if (url.protocol !== STORAGE_SCHEME) {
        throw new InvalidLocatorError(`Unexpected storage scheme "${url.protocol}" in ${locator}`, { context: { locator } });
    }

    const bucket = url.hostname;
    const path = decodeURIComponent(url.pathname.replace(/^\/+/, ''));

    if (!bucket || !path) {
        throw new InvalidLocatorError(`Storage locator must name a bucket and an object: ${locator}`, { context: { locator } });
    }

    return { bucket, path };
}
