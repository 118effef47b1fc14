import fs from 'fs';
import os from 'os';
import path from 'path';
import nock from 'nock';
import { BluecoatBrowserAdapter } from '../../../../src/infrastructure/reputation/BluecoatBrowserAdapter';
import { BluecoatApiAdapter } from '../../../../src/infrastructure/reputation/BluecoatApiAdapter';
import { CaptchaSolver } from '../../../../src/infrastructure/captcha/CaptchaSolver';
import { createHttpClient } from '../../../../src/infrastructure/http/HttpClient';
import { IBrowserLauncher, IBrowserSession } from '../../../../src/domain/ports/IBrowserLauncher';
import { IOcrEngine } from '../../../../src/domain/ports/IOcrEngine';
import { failed, success, uncategorized } from '../../../../src/domain/entities/SourceQueryResult';

const BASE_URL = 'https://sitereview.test';
const DOMAIN = 'example.com';

function createFakeSession(): jest.Mocked<IBrowserSession> {
    return {
        goto: jest.fn().mockResolvedValue(undefined),
        fill: jest.fn().mockResolvedValue(undefined),
        click: jest.fn().mockResolvedValue(undefined),
        wait: jest.fn().mockResolvedValue(undefined),
        textOf: jest.fn().mockResolvedValue('Technology/Internet'),
        close: jest.fn().mockResolvedValue(undefined),
    };
}

describe('BluecoatBrowserAdapter', () => {
    let session: jest.Mocked<IBrowserSession>;
    let launcher: jest.Mocked<IBrowserLauncher>;

    const createAdapter = (timeoutMs = 2000) =>
        new BluecoatBrowserAdapter({
            launcher,
            timeoutMs,
            baseUrl: BASE_URL,
            userAgent: 'test-agent',
            submitDelayMs: 2000,
            settleDelayMs: 5000,
        });

    beforeEach(() => {
        session = createFakeSession();
        launcher = { launch: jest.fn().mockResolvedValue(session) };
    });

    it('should drive the lookup form and read the category', async () => {
        const result = await createAdapter().query(DOMAIN);

        expect(result).toEqual({ source: 'bluecoat', domain: DOMAIN, outcome: success(['Technology/Internet']) });
        expect(launcher.launch).toHaveBeenCalledWith({ userAgent: 'test-agent', timeoutMs: 2000 });
        expect(session.goto).toHaveBeenCalledWith(`${BASE_URL}/#/`);
        expect(session.fill).toHaveBeenCalledWith('#txtSearch', DOMAIN);
        expect(session.click).toHaveBeenCalledTimes(2);
        expect(session.wait.mock.calls).toEqual([[2000], [5000]]);
        expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('should report empty category text as uncategorized', async () => {
        session.textOf.mockResolvedValue('   ');

        expect((await createAdapter().query(DOMAIN)).outcome).toEqual(uncategorized());
    });

    it('should close the session when a page step throws', async () => {
        session.click.mockRejectedValue(new Error('element not found: #btnLookupSubmit'));

        const result = await createAdapter().query(DOMAIN);

        expect(result.outcome).toEqual(failed('element not found: #btnLookupSubmit'));
        expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('should close the session exactly once when the lookup times out', async () => {
        session.wait.mockImplementation(() => new Promise<void>(() => undefined));

        const result = await createAdapter(50).query(DOMAIN);

        expect(result.outcome).toEqual(failed('timeout'));
        expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('should fail without throwing when the browser cannot start', async () => {
        launcher.launch.mockRejectedValue(new Error('Executable does not exist'));

        const result = await createAdapter().query(DOMAIN);

        expect(result.outcome).toEqual(failed('Executable does not exist'));
        expect(session.close).not.toHaveBeenCalled();
    });
});

describe('BluecoatApiAdapter', () => {
    const http = createHttpClient({ userAgent: 'test-agent', timeoutMs: 5000 });
    let tempDir: string;
    let ocr: jest.Mocked<IOcrEngine>;

    const createAdapter = () =>
        new BluecoatApiAdapter({
            http,
            timeoutMs: 2000,
            baseUrl: BASE_URL,
            captchaSolver: new CaptchaSolver(http, ocr, tempDir),
        });

    beforeEach(() => {
        nock.cleanAll();
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bluecoat-test-'));
        ocr = { recognize: jest.fn().mockResolvedValue(' Ab[C\n') };
    });

    afterEach(() => {
        nock.cleanAll();
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should return categories when no CAPTCHA is requested', async () => {
        nock(BASE_URL)
            .post('/resource/lookup', { url: DOMAIN, captcha: '' })
            .reply(200, { categorization: [{ name: 'Technology/Internet' }, { name: 'Web Ads/Analytics' }] });

        const result = await createAdapter().query(DOMAIN);

        expect(result.outcome).toEqual(success(['Technology/Internet', 'Web Ads/Analytics']));
        expect(ocr.recognize).not.toHaveBeenCalled();
    });

    it('should solve the CAPTCHA on the same session and resubmit', async () => {
        const scope = nock(BASE_URL)
            .post('/resource/lookup', { url: DOMAIN, captcha: '' })
            .reply(200, { errorType: 'captcha' }, { 'Set-Cookie': 'JSESSIONID=site-review-1; Path=/' })
            .get('/resource/captcha.jpg')
            .query(true)
            .matchHeader('cookie', 'JSESSIONID=site-review-1')
            .reply(200, Buffer.from('fake-jpeg'))
            .post('/resource/lookup', { url: DOMAIN, captcha: 'AblC' })
            .matchHeader('cookie', 'JSESSIONID=site-review-1')
            .reply(200, { categorization: [{ name: 'Malicious Sources/Malnets' }] });

        const result = await createAdapter().query(DOMAIN);

        expect(result.outcome).toEqual(success(['Malicious Sources/Malnets']));
        expect(scope.isDone()).toBe(true);
        expect(fs.readdirSync(tempDir)).toEqual([]);
    });

    it('should fail when the solved CAPTCHA is rejected', async () => {
        nock(BASE_URL)
            .post('/resource/lookup')
            .reply(200, { errorType: 'captcha' })
            .get('/resource/captcha.jpg')
            .query(true)
            .reply(200, Buffer.from('fake-jpeg'))
            .post('/resource/lookup')
            .reply(200, { errorType: 'captcha' });

        expect((await createAdapter().query(DOMAIN)).outcome).toEqual(failed('captcha: answer rejected'));
    });

    it('should fail with the solver reason when OCR reads nothing', async () => {
        ocr.recognize.mockResolvedValue(' \n');
        nock(BASE_URL)
            .post('/resource/lookup')
            .reply(200, { errorType: 'captcha' })
            .get('/resource/captcha.jpg')
            .query(true)
            .reply(200, Buffer.from('fake-jpeg'));

        expect((await createAdapter().query(DOMAIN)).outcome).toEqual(failed('captcha: OCR returned no text'));
    });

    it('should report an unrated domain as uncategorized', async () => {
        nock(BASE_URL).post('/resource/lookup').reply(200, { unrated: true });

        expect((await createAdapter().query(DOMAIN)).outcome).toEqual(uncategorized());
    });
});
