import { serializeOutcome, serializeReport } from '../../src/index';
import { DomainReport } from '../../src/domain/entities/DomainReport';
import { failed, success } from '../../src/domain/entities/SourceQueryResult';

const REPORT: DomainReport = {
    domain: 'shop.example',
    verdict: {
        burned: true,
        explanations: ['Tagged with a bad category'],
        dnsHealth: { status: 'FlaggedDNS', addresses: [{ address: '1.2.3.4', lastSeen: '2020-01-01' }] },
    },
    categories: ['Shopping'],
    badCategories: ['Shopping'],
    categoryBreakdown: { talos: ['Shopping'] },
    sources: [
        { source: 'virustotal', domain: 'shop.example', outcome: failed('rate limited') },
        { source: 'talos', domain: 'shop.example', outcome: success(['Shopping']), detail: 'from cache' },
    ],
    uncheckedAddresses: ['5.6.7.8'],
    evaluatedAt: new Date('2024-05-01T12:00:00.000Z'),
};

describe('CLI output', () => {
    it('should render a report as plain JSON values', () => {
        expect(serializeReport(REPORT)).toEqual({
            domain: 'shop.example',
            burned: true,
            explanations: ['Tagged with a bad category'],
            dnsHealth: 'Flagged DNS (1.2.3.4/2020-01-01)',
            uncheckedAddresses: ['5.6.7.8'],
            categories: ['Shopping'],
            badCategories: ['Shopping'],
            categoryBreakdown: { talos: ['Shopping'] },
            sources: [
                { source: 'virustotal', status: 'Failed (rate limited)' },
                { source: 'talos', status: 'Shopping', detail: 'from cache' },
            ],
            evaluatedAt: '2024-05-01T12:00:00.000Z',
        });
    });

    it('should turn the report map into an object keyed by domain', () => {
        const serialized = serializeOutcome({
            reports: new Map([['shop.example', REPORT]]),
            skipped: ['cdn.example'],
            cancelled: false,
        });

        expect(Object.keys(serialized)).toEqual(['cancelled', 'skipped', 'reports']);
        expect(serialized.skipped).toEqual(['cdn.example']);
        expect(JSON.parse(JSON.stringify(serialized.reports))).toEqual({
            'shop.example': JSON.parse(JSON.stringify(serializeReport(REPORT))),
        });
    });
});
