import { DomainRecord } from '../../domain/entities/Domain';
import { IDomainInventory } from '../../domain/ports/IDomainInventory';

/**
 * Inventory backed by a fixed list. Used by tests and by callers that already hold the records.
 */
export class InMemoryDomainInventory implements IDomainInventory {
    private readonly domains: DomainRecord[];

    constructor(domains: DomainRecord[]) {
        this.domains = domains.map((domain) => ({ ...domain }));
    }

    async listDomains(): Promise<DomainRecord[]> {
        return this.domains.map((domain) => ({ ...domain }));
    }
}
