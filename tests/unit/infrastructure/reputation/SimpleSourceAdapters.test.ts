import nock from 'nock';
import { createHttpClient } from '../../../../src/infrastructure/http/HttpClient';
import { TalosAdapter } from '../../../../src/infrastructure/reputation/TalosAdapter';
import { XForceAdapter } from '../../../../src/infrastructure/reputation/XForceAdapter';
import { FortiguardAdapter, parseFortiguardPage } from '../../../../src/infrastructure/reputation/FortiguardAdapter';
import { OpenDnsAdapter } from '../../../../src/infrastructure/reputation/OpenDnsAdapter';
import { failed, success, uncategorized, unknown } from '../../../../src/domain/entities/SourceQueryResult';

const http = createHttpClient({ userAgent: 'test-agent', timeoutMs: 5000 });
const DOMAIN = 'example.com';

describe('Simple source adapters', () => {
    beforeEach(() => {
        nock.cleanAll();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    describe('TalosAdapter', () => {
        const BASE_URL = 'https://talos.test';
        const adapter = new TalosAdapter({ http, timeoutMs: 2000, baseUrl: BASE_URL });

        it('should return the category description', async () => {
            nock(BASE_URL)
                .get('/sb_api/query_lookup')
                .query({ query: '/api/v2/details/domain/', query_entry: DOMAIN, offset: '0', order: 'ip asc' })
                .matchHeader('referer', `${BASE_URL}/reputation_center/lookup?search=example.com`)
                .reply(200, { category: { description: 'Computers and Internet' } });

            const result = await adapter.query(DOMAIN);

            expect(result).toEqual({ source: 'talos', domain: DOMAIN, outcome: success(['Computers and Internet']) });
        });

        it('should report a null category as uncategorized', async () => {
            nock(BASE_URL).get('/sb_api/query_lookup').query(true).reply(200, { category: null });

            expect((await adapter.query(DOMAIN)).outcome).toEqual(uncategorized());
        });

        it('should fail on a non-success status', async () => {
            nock(BASE_URL).get('/sb_api/query_lookup').query(true).reply(403, 'Forbidden');

            expect((await adapter.query(DOMAIN)).outcome).toEqual(failed('HTTP 403'));
        });
    });

    describe('XForceAdapter', () => {
        const BASE_URL = 'https://xforce-api.test';
        const EXCHANGE_URL = 'https://xforce.test';
        const adapter = new XForceAdapter({ http, timeoutMs: 2000, baseUrl: BASE_URL, exchangeUrl: EXCHANGE_URL });

        it('should return the keys of the category map', async () => {
            nock(BASE_URL)
                .get(`/url/${DOMAIN}`)
                .matchHeader('x-ui', 'XFE')
                .matchHeader('origin', `${EXCHANGE_URL}/url/${DOMAIN}`)
                .reply(200, { result: { cats: { 'Software / Hardware': true, Spam: true } } });

            expect((await adapter.query(DOMAIN)).outcome).toEqual(success(['Software / Hardware', 'Spam']));
        });

        it('should report an empty category map as uncategorized', async () => {
            nock(BASE_URL).get(`/url/${DOMAIN}`).reply(200, { result: { cats: {} } });

            expect((await adapter.query(DOMAIN)).outcome).toEqual(uncategorized());
        });

        it('should report 404 as unknown rather than failed', async () => {
            nock(BASE_URL).get(`/url/${DOMAIN}`).reply(404, { error: 'Not found.' });

            const result = await adapter.query(DOMAIN);

            expect(result.outcome).toEqual(unknown());
            expect(result.detail).toBe('Not found');
        });
    });

    describe('FortiguardAdapter', () => {
        const BASE_URL = 'https://fortiguard.test';
        const adapter = new FortiguardAdapter({ http, timeoutMs: 2000, baseUrl: BASE_URL });

        it('should extract the category from the page', async () => {
            nock(BASE_URL)
                .get('/webfilter')
                .query({ q: DOMAIN })
                .reply(200, '<html><meta property="description" content="Category: Information Technology" /></html>');

            expect((await adapter.query(DOMAIN)).outcome).toEqual(success(['Information Technology']));
        });

        it('should report a page without the pattern as uncategorized', () => {
            expect(parseFortiguardPage('<html><body>No result</body></html>').outcome).toEqual(uncategorized());
        });
    });

    describe('OpenDnsAdapter', () => {
        const BASE_URL = 'https://opendns.test';
        const adapter = new OpenDnsAdapter({ http, timeoutMs: 2000, baseUrl: BASE_URL });

        it('should split the tags on comma and space', async () => {
            nock(BASE_URL)
                .get(`/${DOMAIN}`)
                .reply(200, '<h3>Tagged: <span class="normal">Ecommerce/Shopping, Advertising</span></h3>');

            expect((await adapter.query(DOMAIN)).outcome).toEqual(success(['Ecommerce/Shopping', 'Advertising']));
        });

        it('should report a page without tags as uncategorized', async () => {
            nock(BASE_URL).get(`/${DOMAIN}`).reply(200, '<h3>This domain has not been tagged</h3>');

            expect(await adapter.query(DOMAIN)).toEqual({
                source: 'opendns',
                domain: DOMAIN,
                outcome: uncategorized(),
                detail: 'No Tags',
            });
        });
    });
});
