import { describe, expect, it, vi } from 'vitest';
import { buildReportSpecification } from '@/lib/report-job/specification.js';
import { SubmissionError, VendorApiError } from '@/utils/errors.js';
import { silentLogger } from '@/utils/logger.js';
import { submitReportJob } from '@/lib/report-job/submit.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';
import { createAccessTokenProvider } from './auth.js';
import { createDv360ReportApi } from './client.js';
import type { Dv360Context } from './config.js';

const BASE = 'https://dbm.test/v2';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createContext(responses: Response[]) {
    const fetch = vi.fn<FetchLike>(async () => {
        const next = responses.shift();
        if (!next) {
            throw new Error('unexpected request');
        }
        return next;
    });
    const ctx: Dv360Context = { fetch, getAccessToken: async () => 'test-token', baseUrl: BASE, logger: silentLogger };
    return { ctx, fetch };
}

const spec = buildReportSpecification({
    title: 'dv360_report',
    advertiserIds: ['1'],
    metrics: ['METRIC_IMPRESSIONS'],
    dimensions: ['FILTER_DATE'],
    startDate: '2024-01-01',
    endDate: '2024-01-31',
});

describe('createDv360ReportApi', () => {
    it('posts the query payload to queries.create with a bearer token', async () => {
        const { ctx, fetch } = createContext([jsonResponse({ queryId: '1234567', metadata: { title: 'dv360_report' } })]);

        await expect(createDv360ReportApi(ctx).create(spec)).resolves.toBe('1234567');

        const [url, init] = fetch.mock.calls[0] ?? [];
        expect(url).toBe(`${BASE}/queries`);
        expect(init?.method).toBe('POST');
        expect(init?.headers).toEqual({ Authorization: 'Bearer test-token', 'Content-Type': 'application/json' });
        expect(JSON.parse(String(init?.body))).toMatchObject({
            metadata: { title: 'dv360_report', format: 'CSV', dataRange: { range: 'CUSTOM_DATES' } },
            params: { filters: [{ type: 'FILTER_ADVERTISER', value: '1' }] },
            schedule: { frequency: 'ONE_TIME' },
        });
    });

    it('runs the query asynchronously and returns the report key', async () => {
        const { ctx, fetch } = createContext([jsonResponse({ key: { queryId: 'Q1', reportId: 'R1' }, metadata: { status: { state: 'QUEUED' } } })]);

        await expect(createDv360ReportApi(ctx).run('Q1')).resolves.toEqual({ queryId: 'Q1', reportId: 'R1' });
        expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE}/queries/Q1:run?synchronous=false`);
    });

    it('maps the report status and storage path', async () => {
        const { ctx, fetch } = createContext([
            jsonResponse({ key: { queryId: 'Q1', reportId: 'R1' }, metadata: { status: { state: 'RUNNING' } } }),
            jsonResponse({
                key: { queryId: 'Q1', reportId: 'R1' },
                metadata: { status: { state: 'DONE', format: 'CSV' }, googleCloudStoragePath: 'gs://bucket/r1.csv' },
            }),
        ]);
        const api = createDv360ReportApi(ctx);

        await expect(api.getStatus('Q1', 'R1')).resolves.toEqual({ state: 'RUNNING', artifactLocator: null });
        await expect(api.getStatus('Q1', 'R1')).resolves.toEqual({ state: 'DONE', artifactLocator: 'gs://bucket/r1.csv' });
        expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE}/queries/Q1/reports/R1`);
        expect(fetch.mock.calls[0]?.[1]?.method).toBe('GET');
    });

    it('raises VendorApiError with the upstream status on a rejected call', async () => {
        const { ctx } = createContext([jsonResponse({ error: { message: 'quota' } }, 429)]);

        const error = await createDv360ReportApi(ctx)
            .getStatus('Q1', 'R1')
            .catch((err: unknown) => err);

        expect(error).toBeInstanceOf(VendorApiError);
        expect(error).toMatchObject({ upstreamStatus: 429, statusCode: 500 });
    });

    it('raises VendorApiError on an unexpected body', async () => {
        const { ctx } = createContext([jsonResponse({ key: { queryId: 'Q1' } })]);

        await expect(createDv360ReportApi(ctx).run('Q1')).rejects.toThrow(/unexpected response \(key\.reportId: /);
    });

    it('surfaces a rejected create through the submitter as SubmissionError', async () => {
        const { ctx, fetch } = createContext([jsonResponse({ error: { message: 'invalid metric' } }, 400)]);

        await expect(submitReportJob(createDv360ReportApi(ctx), spec, { logger: silentLogger })).rejects.toBeInstanceOf(SubmissionError);
        expect(fetch).toHaveBeenCalledTimes(1);
    });
});

describe('submitReportJob over DV360', () => {
    it('rejects a create response without a query id instead of running it', async () => {
        const { ctx, fetch } = createContext([jsonResponse({ metadata: { title: 'dv360_report' } }), jsonResponse({ key: { queryId: 'Q1' } })]);

        await expect(submitReportJob(createDv360ReportApi(ctx), spec, { logger: silentLogger })).rejects.toBeInstanceOf(SubmissionError);
        expect(fetch.mock.calls.map(([url]) => url)).toEqual([`${BASE}/queries`]);
    });

    it('rejects a run response without a report id', async () => {
        const { ctx, fetch } = createContext([jsonResponse({ key: { queryId: 'Q1', reportId: null } })]);

        await expect(submitReportJob(createDv360ReportApi(ctx), spec, { queryId: 'Q1', logger: silentLogger })).rejects.toBeInstanceOf(SubmissionError);
        expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('accepts numeric ids', async () => {
        const { ctx } = createContext([jsonResponse({ queryId: 1234567 }), jsonResponse({ key: { queryId: 1234567, reportId: 89 } })]);

        await expect(submitReportJob(createDv360ReportApi(ctx), spec, { logger: silentLogger })).resolves.toMatchObject({ queryId: '1234567', reportId: '89' });
    });
});

describe('createAccessTokenProvider', () => {
    it('returns the token and rejects empty ones', async () => {
        await expect(createAccessTokenProvider({ getAccessToken: async () => 'test-token' }, 'DV360')()).resolves.toBe('test-token');
        await expect(createAccessTokenProvider({ getAccessToken: async () => null }, 'DV360')()).rejects.toThrow(
            'Failed to fetch DV360 access token: empty token'
        );
    });
});
