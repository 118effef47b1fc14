import fs from 'fs/promises';
import path from 'path';
import { DomainRecord, isHealthStatus } from '../../domain/entities/Domain';
import { ConfigurationError } from '../../domain/errors/ReviewErrors';
import { IDomainInventory } from '../../domain/ports/IDomainInventory';

/**
 * Inventory read from a JSON file holding an array of `{ name, healthStatus }` records.
 * The file is read on every call, so edits between passes are picked up.
 */
export class JsonFileDomainInventory implements IDomainInventory {
    private readonly inventoryPath: string;

    constructor(inventoryPath: string) {
        this.inventoryPath = path.isAbsolute(inventoryPath)
            ? inventoryPath
            : path.resolve(process.cwd(), inventoryPath);
    }

    async listDomains(): Promise<DomainRecord[]> {
        let content: string;
        try {
            content = await fs.readFile(this.inventoryPath, 'utf-8');
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Cannot read domain inventory ${this.inventoryPath}: ${message}`);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Domain inventory ${this.inventoryPath} is not valid JSON: ${message}`);
        }

        if (!Array.isArray(raw)) {
            throw new ConfigurationError(`Domain inventory ${this.inventoryPath} must contain an array`);
        }
        return raw.map((entry, index) => parseDomainRecord(entry, index));
    }
}

/**
 * Validates one inventory entry.
 * @throws ConfigurationError naming the entry's position
 */
export function parseDomainRecord(entry: unknown, index: number): DomainRecord {
    if (typeof entry !== 'object' || entry === null) {
        throw new ConfigurationError(`Inventory entry ${index} is not an object`);
    }
    const name = 'name' in entry ? entry.name : undefined;
    const healthStatus = 'healthStatus' in entry ? entry.healthStatus : undefined;

    if (typeof name !== 'string' || !name.trim()) {
        throw new ConfigurationError(`Inventory entry ${index} has no name`);
    }
    if (!isHealthStatus(healthStatus)) {
        throw new ConfigurationError(`Inventory entry ${index} (${name}) has an invalid healthStatus: ${String(healthStatus)}`);
    }

    const record: DomainRecord = { name: name.trim(), healthStatus };
    const flagged = 'flaggedAddresses' in entry ? entry.flaggedAddresses : undefined;
    if (Array.isArray(flagged)) {
        record.flaggedAddresses = flagged.filter((address): address is string => typeof address === 'string');
    }
    return record;
}
