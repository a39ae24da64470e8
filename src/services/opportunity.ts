/**
 * Opportunity Service - lifecycle of generated opportunities
 */

import { Opportunity, OpportunityStatus } from '../types/opportunity';
import { OpportunityRepository } from '../repositories/opportunity';
import { ResourceNotFoundError } from '../db/access';
import { InvalidStateTransitionError } from '../utils/errors';

/**
 * Valid status transitions. Every state other than ACTIVE is terminal.
 */
export const VALID_STATUS_TRANSITIONS: Record<OpportunityStatus, OpportunityStatus[]> = {
  'ACTIVE': ['EXECUTED', 'EXPIRED', 'CANCELLED'],
  'EXECUTED': [],
  'EXPIRED': [],
  'CANCELLED': []
};

export const OpportunityService = {
  /**
   * @throws ResourceNotFoundError if the opportunity does not exist
   */
  async getOpportunity(opportunityId: string): Promise<Opportunity> {
    const opportunity = await OpportunityRepository.getOpportunity(opportunityId);
    if (!opportunity) {
      throw new ResourceNotFoundError('Opportunity', opportunityId);
    }
    return opportunity;
  },

  /**
   * Move an opportunity to a new status
   *
   * @throws InvalidStateTransitionError if the transition is not allowed, including
   * when another writer changed the status first
   */
  async transitionStatus(
    opportunityId: string,
    status: OpportunityStatus,
    now: Date = new Date()
  ): Promise<Opportunity> {
    const current = await this.getOpportunity(opportunityId);

    if (!VALID_STATUS_TRANSITIONS[current.status].includes(status)) {
      throw new InvalidStateTransitionError(current.status, status, 'opportunity status');
    }

    const updated = await OpportunityRepository.updateStatus(opportunityId, current.status, status, now.toISOString());
    if (!updated) {
      const latest = await this.getOpportunity(opportunityId);
      throw new InvalidStateTransitionError(latest.status, status, 'opportunity status');
    }

    console.log('Opportunity status changed:', { opportunityId, from: current.status, to: status });
    return updated;
  },

  /**
   * Expire ACTIVE opportunities whose expiry has passed
   *
   * @returns Number of opportunities expired
   */
  async expireStale(now: Date = new Date()): Promise<number> {
    const active = await OpportunityRepository.listByStatus('ACTIVE');
    let expired = 0;

    for (const opportunity of active) {
      if (Date.parse(opportunity.expiresAt) > now.getTime()) {
        continue;
      }
      const updated = await OpportunityRepository.updateStatus(
        opportunity.opportunityId, 'ACTIVE', 'EXPIRED', now.toISOString()
      );
      if (updated) {
        expired++;
      }
    }

    return expired;
  }
};
