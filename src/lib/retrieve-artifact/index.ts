import csv from 'csvtojson';
import { z } from 'zod';
import type { ObjectStorage } from '@/gcp/storage.js';
import { errorMessage, RetrievalError } from '@/utils/errors.js';
import { parseStorageLocator } from './locator.js';

export { parseStorageLocator, type StorageLocation } from './locator.js';

export type ReportRow = Record<string, string>;

const rowsSchema = z.array(z.record(z.string()));

/**
 * Drop the summary block reports append after the data. The block starts at
 * the first blank line.
 */
export function stripReportFooter(text: string): string {
    const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
    const blank = lines.findIndex(line => line.trim() === '' || /^,+$/.test(line.trim()));
    return (blank === -1 ? lines : lines.slice(0, blank)).join('\n');
}

export async function parseReportCsv(text: string): Promise<ReportRow[]> {
    const parsed: unknown = await csv({ flatKeys: true, checkType: false, trim: true }).fromString(stripReportFooter(text));
    return rowsSchema.parse(parsed);
}

/**
 * Download a finished report from object storage and decode it into rows.
 * The artifact is fetched in full before parsing.
 */
export async function retrieveArtifact(storage: ObjectStorage, locator: string): Promise<ReportRow[]> {
    const { bucket, path } = parseStorageLocator(locator);

    let contents: Buffer;
    try {
        contents = await storage.download(bucket, path);
    } catch (error) {
        throw new RetrievalError(`Failed to download ${locator}: ${errorMessage(error)}`, { cause: error, context: { locator } });
    }

    try {
        return await parseReportCsv(contents.toString('utf8'));
    } catch (error) {
        throw new RetrievalError(`Failed to decode ${locator}: ${errorMessage(error)}`, { cause: error, context: { locator } });
    }
}
