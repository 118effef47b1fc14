import { AxiosInstance } from 'axios';
import { Config } from '../config';
import { SourceId } from '../domain/entities/SourceQueryResult';
import { IBrowserLauncher } from '../domain/ports/IBrowserLauncher';
import { IDomainInventory } from '../domain/ports/IDomainInventory';
import { IOcrEngine } from '../domain/ports/IOcrEngine';
import { ISourceAdapter } from '../domain/ports/ISourceAdapter';
import { BlacklistPolicy } from '../domain/services/BlacklistPolicy';
import { BurnDecisionEngine } from '../domain/services/BurnDecisionEngine';
import { PlaywrightBrowserLauncher } from '../infrastructure/browser/PlaywrightBrowserLauncher';
import { CaptchaSolver } from '../infrastructure/captcha/CaptchaSolver';
import { TesseractOcrEngine } from '../infrastructure/captcha/TesseractOcrEngine';
import { createHttpClient } from '../infrastructure/http/HttpClient';
import { BluecoatApiAdapter } from '../infrastructure/reputation/BluecoatApiAdapter';
import { BluecoatBrowserAdapter } from '../infrastructure/reputation/BluecoatBrowserAdapter';
import { CymonIpReputationClient } from '../infrastructure/reputation/CymonIpReputationClient';
import { FortiguardAdapter } from '../infrastructure/reputation/FortiguardAdapter';
import { MalwareDomainFeedClient } from '../infrastructure/reputation/MalwareDomainFeedClient';
import { MxToolboxAdapter } from '../infrastructure/reputation/MxToolboxAdapter';
import { OpenDnsAdapter } from '../infrastructure/reputation/OpenDnsAdapter';
import { TalosAdapter } from '../infrastructure/reputation/TalosAdapter';
import { TrendMicroAdapter } from '../infrastructure/reputation/TrendMicroAdapter';
import { VirusTotalAdapter } from '../infrastructure/reputation/VirusTotalAdapter';
import { WebsenseAdapter } from '../infrastructure/reputation/WebsenseAdapter';
import { XForceAdapter } from '../infrastructure/reputation/XForceAdapter';
import { RateLimiter, fixedDelay } from './RateLimiter';
import { ReviewDependencies, ReviewOrchestrator } from './ReviewOrchestrator';

/**
 * Collaborators a caller may swap out, mostly for tests.
 */
export interface ReviewFactoryOverrides {
    http?: AxiosInstance;
    browserLauncher?: IBrowserLauncher;
    ocrEngine?: IOcrEngine;
    rateLimiter?: RateLimiter;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createReviewDependencies(
    config: Config,
    inventory: IDomainInventory,
    overrides: ReviewFactoryOverrides = {}
): ReviewDependencies {
    const http = overrides.http ?? createHttpClient({ userAgent: config.userAgent, timeoutMs: config.adapterTimeoutMs });
    const { endpoints, adapterTimeoutMs: timeoutMs } = config;

    const primarySource = new VirusTotalAdapter({
        http,
        timeoutMs,
        baseUrl: endpoints.virustotal,
        apiKey: config.virustotalApiKey,
    });

    const sources = config.enabledSources
        .filter((source) => source !== 'virustotal')
        .map((source) => createSourceAdapter(source, config, http, overrides));
    console.log(`📡 Sources enabled: ${['virustotal', ...sources.map((adapter) => adapter.source)].join(', ')}`);

    const ipReputation = new CymonIpReputationClient(http, endpoints.ipReputation, timeoutMs);
    const policy = new BlacklistPolicy(config.extraBlacklistedCategories);
    if (config.extraBlacklistedCategories.length > 0) {
        console.log(`🚫 Extra blacklisted categories: ${config.extraBlacklistedCategories.join(', ')}`);
    }

    return {
        inventory,
        primarySource,
        sources,
        malwareFeed: new MalwareDomainFeedClient(http, endpoints.malwareDomains),
        decisionEngine: new BurnDecisionEngine(policy, ipReputation),
        rateLimiter: overrides.rateLimiter ?? new RateLimiter(fixedDelay(config.sleepTimeSeconds * 1000)),
    };
}

export function createReviewOrchestrator(
    config: Config,
    inventory: IDomainInventory,
    overrides: ReviewFactoryOverrides = {}
): ReviewOrchestrator {
    return new ReviewOrchestrator(createReviewDependencies(config, inventory, overrides));
}

// --- Helper Functions ---

function createSourceAdapter(
    source: SourceId,
    config: Config,
    http: AxiosInstance,
    overrides: ReviewFactoryOverrides
): ISourceAdapter {
    const { endpoints, adapterTimeoutMs: timeoutMs } = config;

    switch (source) {
        case 'talos':
            return new TalosAdapter({ http, timeoutMs, baseUrl: endpoints.talos });
        case 'xforce':
            return new XForceAdapter({
                http,
                timeoutMs,
                baseUrl: endpoints.xforceApi,
                exchangeUrl: endpoints.xforceExchange,
            });
        case 'fortiguard':
            return new FortiguardAdapter({ http, timeoutMs, baseUrl: endpoints.fortiguard });
        case 'opendns':
            return new OpenDnsAdapter({ http, timeoutMs, baseUrl: endpoints.opendns });
        case 'trendmicro':
            return new TrendMicroAdapter({ http, timeoutMs, baseUrl: endpoints.trendmicro });
        case 'mxtoolbox':
            return new MxToolboxAdapter({ http, timeoutMs, baseUrl: endpoints.mxtoolbox });
        case 'bluecoat':
            return createBluecoatAdapter(config, http, overrides);
        case 'websense':
            return new WebsenseAdapter({ http, timeoutMs, baseUrl: endpoints.websense });
        case 'virustotal':
            throw new Error('virustotal is the primary source and cannot be registered as a secondary one');
    }
}

function createBluecoatAdapter(config: Config, http: AxiosInstance, overrides: ReviewFactoryOverrides): ISourceAdapter {
    if (config.bluecoatStrategy === 'api') {
        console.log('🔤 Bluecoat via Site Review API (OCR CAPTCHA solving)');
        const ocr = overrides.ocrEngine ?? new TesseractOcrEngine(config.tesseractPath);
        return new BluecoatApiAdapter({
            http,
            timeoutMs: config.adapterTimeoutMs,
            baseUrl: config.endpoints.bluecoat,
            captchaSolver: new CaptchaSolver(http, ocr),
        });
    }

    console.log('🕷️ Bluecoat via headless browser');
    return new BluecoatBrowserAdapter({
        launcher: overrides.browserLauncher ?? new PlaywrightBrowserLauncher(config.browserExecutablePath),
        timeoutMs: config.adapterTimeoutMs,
        baseUrl: config.endpoints.bluecoat,
        userAgent: config.userAgent,
        submitDelayMs: config.browserSubmitDelayMs,
        settleDelayMs: config.browserSettleMs,
    });
}
