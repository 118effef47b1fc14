#!/usr/bin/env node
import { createReviewOrchestrator } from './application/ReviewFactory';
import { ReviewPassOutcome } from './application/ReviewOrchestrator';
import { loadConfig, validateConfig } from './config';
import { DomainReport, describeDnsHealth } from './domain/entities/DomainReport';
import { describeOutcome } from './domain/entities/SourceQueryResult';
import { JsonFileDomainInventory } from './infrastructure/inventory/JsonFileDomainInventory';

/**
 * JSON-friendly view of one report.
 */
export function serializeReport(report: DomainReport): Record<string, unknown> {
    return {
        domain: report.domain,
        burned: report.verdict.burned,
        explanations: report.verdict.explanations,
        dnsHealth: describeDnsHealth(report.verdict.dnsHealth),
        uncheckedAddresses: report.uncheckedAddresses,
        categories: report.categories,
        badCategories: report.badCategories,
        categoryBreakdown: report.categoryBreakdown,
        sources: report.sources.map((result) => ({
            source: result.source,
            status: describeOutcome(result.outcome),
            ...(result.detail === undefined ? {} : { detail: result.detail }),
        })),
        evaluatedAt: report.evaluatedAt.toISOString(),
    };
}

export function serializeOutcome(outcome: ReviewPassOutcome): Record<string, unknown> {
    return {
        cancelled: outcome.cancelled,
        skipped: outcome.skipped,
        reports: Object.fromEntries(
            [...outcome.reports.entries()].map(([name, report]) => [name, serializeReport(report)])
        ),
    };
}

async function main(): Promise<void> {
    console.log('🔎 Domain Reputation Review');

    console.log('📋 Loading configuration...');
    const config = loadConfig();

    console.log('🔍 Validating configuration...');
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exitCode = 1;
        return;
    }

    const inventory = new JsonFileDomainInventory(config.domainInventoryPath);
    const orchestrator = createReviewOrchestrator(config, inventory);

    // First Ctrl+C stops after the current domain; a second one exits the default way
    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.warn('⚠️  Cancelling review after the current lookups...');
        controller.abort();
    });

    const outcome = await orchestrator.run({ signal: controller.signal });
    console.log(JSON.stringify(serializeOutcome(outcome), null, 2));

    if (outcome.cancelled) {
        console.warn('⚠️  Review was cancelled; some domains were not evaluated');
    }
}

if (require.main === module) {
    main().catch((error) => {
        console.error('💥 Fatal error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
    });
}
