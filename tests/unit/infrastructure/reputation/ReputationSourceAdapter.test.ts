import { AxiosError, AxiosHeaders } from 'axios';
import { HttpSourceAdapter, LookupOutcome } from '../../../../src/infrastructure/reputation/ReputationSourceAdapter';
import { createHttpClient } from '../../../../src/infrastructure/http/HttpClient';
import { failed, success } from '../../../../src/domain/entities/SourceQueryResult';
import { AntiBotChallengeError, UnexpectedPageStructureError } from '../../../../src/domain/errors/ReviewErrors';

class ScriptedAdapter extends HttpSourceAdapter {
    readonly source = 'fortiguard' as const;
    protected readonly label = 'Scripted';

    constructor(private readonly script: (signal: AbortSignal) => Promise<LookupOutcome>, timeoutMs = 1000) {
        super({ http: createHttpClient({ userAgent: 'test-agent', timeoutMs }), timeoutMs, baseUrl: 'https://scripted.test/' });
    }

    protected lookupOutcome(_domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        return this.script(signal);
    }
}

describe('ReputationSourceAdapter', () => {
    const DOMAIN = 'example.com';

    it('should stamp the outcome with source, domain and detail', async () => {
        const adapter = new ScriptedAdapter(async () => ({ outcome: success(['News']), detail: 'cached' }));

        await expect(adapter.query(DOMAIN)).resolves.toEqual({
            source: 'fortiguard',
            domain: DOMAIN,
            outcome: success(['News']),
            detail: 'cached',
        });
    });

    it('should turn a hanging lookup into a timeout within the bound', async () => {
        let lookupSignal: AbortSignal | undefined;
        const adapter = new ScriptedAdapter((signal) => {
            lookupSignal = signal;
            return new Promise<LookupOutcome>(() => undefined);
        }, 50);

        const started = Date.now();
        const result = await adapter.query(DOMAIN);

        expect(result.outcome).toEqual(failed('timeout'));
        expect(Date.now() - started).toBeLessThan(1000);
        expect(lookupSignal?.aborted).toBe(true);
    });

    it('should report a lookup cancelled by the caller', async () => {
        const controller = new AbortController();
        controller.abort();
        const adapter = new ScriptedAdapter(async () => ({ outcome: success(['News']) }));

        expect((await adapter.query(DOMAIN, controller.signal)).outcome).toEqual(failed('cancelled'));
    });

    it('should map errors to short reasons and keep the message as detail', async () => {
        const config = { headers: new AxiosHeaders() };
        const httpError = new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, undefined, {
            status: 503,
            statusText: 'Service Unavailable',
            headers: {},
            config,
            data: null,
        });

        const cases: Array<[Error, string]> = [
            [httpError, 'HTTP 503'],
            [new UnexpectedPageStructureError('#results'), 'unexpected page structure'],
            [new AntiBotChallengeError('cloudflare'), 'anti-bot challenge: cloudflare'],
            [new Error('unexpected response schema'), 'unexpected response schema'],
        ];

        for (const [error, reason] of cases) {
            const result = await new ScriptedAdapter(async () => {
                throw error;
            }).query(DOMAIN);

            expect(result.outcome).toEqual(failed(reason));
            expect(result.detail).toBe(error.message === reason ? undefined : error.message);
        }
    });
});
