import dotenv from 'dotenv';
import { SECONDARY_SOURCES, SourceId } from '../domain/entities/SourceQueryResult';

// Load environment variables
dotenv.config();

export type BluecoatStrategy = 'browser' | 'api';

/**
 * Endpoints of the external services. Overridable so tests and mirrors can point elsewhere.
 */
export interface SourceEndpoints {
    virustotal: string;
    talos: string;
    xforceApi: string;
    xforceExchange: string;
    fortiguard: string;
    opendns: string;
    trendmicro: string;
    mxtoolbox: string;
    bluecoat: string;
    websense: string;
    malwareDomains: string;
    ipReputation: string;
}

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    environment: string;

    // Primary source
    virustotalApiKey: string;

    // Pacing
    sleepTimeSeconds: number;
    adapterTimeoutMs: number;

    // HTTP
    userAgent: string;
    endpoints: SourceEndpoints;

    // Sources
    enabledSources: SourceId[];
    extraBlacklistedCategories: string[];

    // Symantec Site Review
    bluecoatStrategy: BluecoatStrategy;
    browserSubmitDelayMs: number;
    browserSettleMs: number;
    /** Chromium binary for the browser strategy; playwright-core bundles none */
    browserExecutablePath?: string;

    // OCR
    tesseractPath: string;

    // Inventory used by the CLI entry point
    domainInventoryPath: string;
}

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_14_0) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/70.0.3538.77 Safari/537.36';

export const DEFAULT_SLEEP_TIME_SECONDS = 20;

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string): string[] {
    return getEnvVar(key, '')
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

function parseBluecoatStrategy(value: string): BluecoatStrategy {
    if (value === 'browser' || value === 'api') {
        return value;
    }
    throw new Error(`BLUECOAT_STRATEGY must be "browser" or "api", got: ${value}`);
}

function parseEnabledSources(values: string[]): SourceId[] {
    if (values.length === 0) {
        return [...SECONDARY_SOURCES];
    }
    return values.map((value) => {
        const source = SECONDARY_SOURCES.find((candidate) => candidate === value.toLowerCase());
        if (!source) {
            throw new Error(`Unknown source in ENABLED_SOURCES: ${value}`);
        }
        return source;
    });
}

/**
 * Loads configuration from environment variables.
 * A missing VirusTotal key loads as an empty string; the pass refuses to start on it.
 */
export function loadConfig(): Config {
    return {
        environment: getEnvVar('NODE_ENV', 'development'),

        virustotalApiKey: getEnvVar('VIRUSTOTAL_API_KEY', ''),

        sleepTimeSeconds: getEnvVarNumber('SLEEP_TIME', DEFAULT_SLEEP_TIME_SECONDS),
        adapterTimeoutMs: getEnvVarNumber('ADAPTER_TIMEOUT_MS', 30000),

        userAgent: getEnvVar('USER_AGENT', DEFAULT_USER_AGENT),
        endpoints: {
            virustotal: getEnvVar('VIRUSTOTAL_BASE_URL', 'https://www.virustotal.com'),
            talos: getEnvVar('TALOS_BASE_URL', 'https://talosintelligence.com'),
            xforceApi: getEnvVar('XFORCE_API_BASE_URL', 'https://api.xforce.ibmcloud.com'),
            xforceExchange: getEnvVar('XFORCE_EXCHANGE_BASE_URL', 'https://exchange.xforce.ibmcloud.com'),
            fortiguard: getEnvVar('FORTIGUARD_BASE_URL', 'https://fortiguard.com'),
            opendns: getEnvVar('OPENDNS_BASE_URL', 'https://domain.opendns.com'),
            trendmicro: getEnvVar('TRENDMICRO_BASE_URL', 'https://global.sitesafety.trendmicro.com'),
            mxtoolbox: getEnvVar('MXTOOLBOX_BASE_URL', 'https://mxtoolbox.com'),
            bluecoat: getEnvVar('BLUECOAT_BASE_URL', 'https://sitereview.bluecoat.com'),
            websense: getEnvVar('WEBSENSE_BASE_URL', 'http://csi.websense.com'),
            malwareDomains: getEnvVar('MALWARE_DOMAINS_URL', 'http://mirror1.malwaredomains.com/files/justdomains'),
            ipReputation: getEnvVar('IP_REPUTATION_BASE_URL', 'https://cymon.io'),
        },

        enabledSources: parseEnabledSources(getEnvVarList('ENABLED_SOURCES')),
        extraBlacklistedCategories: getEnvVarList('EXTRA_BLACKLISTED_CATEGORIES'),

        bluecoatStrategy: parseBluecoatStrategy(getEnvVar('BLUECOAT_STRATEGY', 'browser')),
        browserSubmitDelayMs: getEnvVarNumber('BROWSER_SUBMIT_DELAY_MS', 2000),
        browserSettleMs: getEnvVarNumber('BROWSER_SETTLE_MS', 5000),
        browserExecutablePath: getEnvVar('BROWSER_EXECUTABLE_PATH', '') || undefined,

        tesseractPath: getEnvVar('TESSERACT_PATH', 'tesseract'),

        domainInventoryPath: getEnvVar('DOMAIN_INVENTORY_PATH', './data/domains.json'),
    };
}

/**
 * Lists configuration problems. An empty list means the config is usable.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.virustotalApiKey) {
        errors.push('VIRUSTOTAL_API_KEY is required; VirusTotal is the primary detection source');
    }
    if (config.sleepTimeSeconds < 0) {
        errors.push('SLEEP_TIME must not be negative');
    }
    if (config.adapterTimeoutMs <= 0) {
        errors.push('ADAPTER_TIMEOUT_MS must be positive');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
