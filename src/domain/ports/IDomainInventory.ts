import { DomainRecord } from '../entities/Domain';

/**
 * Port for the domain inventory that owns the domain records.
 */
export interface IDomainInventory {
    /**
     * @returns Domains in the order they should be reviewed
     */
    listDomains(): Promise<DomainRecord[]>;
}
