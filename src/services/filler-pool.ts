import { normalizeRecipientKey } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { pick } from './composer.js';

/**
 * Seed mailboxes that receive filler (reputation) traffic. Independent of the
 * recipient pool; addresses repeat freely.
 */
export class FillerPool {
    private readonly addresses: string[];

    constructor(
        addresses: readonly string[],
        private readonly random: () => number = Math.random,
    ) {
        this.addresses = [...new Set(addresses.map(normalizeRecipientKey))].filter((address) => address !== '');
    }

    get size(): number {
        return this.addresses.length;
    }

    next(): string {
        if (this.addresses.length === 0) {
            throw new ConfigError('Filler traffic requested but no filler addresses are configured');
        }
        return pick(this.addresses, this.random);
    }
}
