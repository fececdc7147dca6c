/**
 * Identity Resolver
 *
 * Finds the OHID already associated with a contact, or mints a new one.
 * Matching is disjunctive: a shared email OR a shared phone is enough.
 * Identities are never merged; two leads with no overlapping field get
 * distinct identities even if they are the same person.
 */

import logger from '../config/logger';
import { Identity, LeadRecord } from '../types/lead.types';
import { maskPhoneNumber } from '../utils/phoneNumber.util';
import { IdentityStore, mintIdentity } from './identityStore';

export class IdentityResolver {
  private log = logger.child({ service: 'identity-resolver' });

  constructor(
    private readonly store: IdentityStore,
    private readonly mint: () => Identity = mintIdentity
  ) {}

  /**
   * Return the stored identity for (email OR phone), or a freshly minted one.
   * Reads only; the caller persists the lead that establishes a new identity.
   */
  async resolveIdentity(email?: string | null, phone?: string | null): Promise<Identity> {
    const existing = await this.store.findIdentityByContact(email, phone);

    if (existing) {
      this.log.debug({ identity: existing, phone: maskPhoneNumber(phone) }, 'Existing identity matched');
      return existing;
    }

    const minted = this.mint();
    this.log.debug({ identity: minted, phone: maskPhoneNumber(phone) }, 'New identity minted');
    return minted;
  }

  /**
   * Resolve and persist in one store operation, so concurrent leads for the
   * same contact converge on a single identity.
   */
  async claim(ingestId: string, lead: LeadRecord): Promise<Identity> {
    return this.store.claimIdentity(ingestId, lead, this.mint);
  }

  /** Lookup only; never mints */
  async lookup(email?: string | null, phone?: string | null): Promise<Identity | null> {
    if (!email && !phone) return null;
    return this.store.findIdentityByContact(email, phone);
  }
}
