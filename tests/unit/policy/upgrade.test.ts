/**
 * Upgrade Guidance Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { buildUpgradeGuidance } from '@/policy/upgrade.js';

import { TEST_NOW, createTestAccount } from '../../fixtures/index.js';

describe('buildUpgradeGuidance', () => {
  it('should offer the first-upgrade discount inside the first 30 days', () => {
    const guidance = buildUpgradeGuidance(createTestAccount(), 'QR_UNLIMITED', TEST_NOW);

    expect(guidance).toEqual({
      recommended_plan: 'PRO',
      benefits: ['Unlimited QR scans', 'Unlimited QR scam reports'],
      discount_eligibility: {
        eligible: true,
        window_days: 30,
        expires_at: '2025-03-31T00:00:00.000Z',
        days_remaining: 18,
      },
    });
  });

  it('should close the discount window after 30 days', () => {
    const guidance = buildUpgradeGuidance(
      createTestAccount({ createdAt: new Date('2025-01-01T00:00:00.000Z') }),
      'OCR_SCAN',
      TEST_NOW
    );

    expect(guidance.discount_eligibility).toEqual({
      eligible: false,
      window_days: 30,
      expires_at: '2025-01-31T00:00:00.000Z',
      days_remaining: 0,
    });
  });

  it('should withhold the discount once an upgrade has happened', () => {
    const guidance = buildUpgradeGuidance(
      createTestAccount({ firstUpgradeUsed: true }),
      'OCR_SCAN',
      TEST_NOW
    );

    expect(guidance.discount_eligibility).toEqual({
      eligible: false,
      window_days: 30,
      reason: 'first_upgrade_already_used',
    });
  });

  it('should report when the account age is unknown', () => {
    const guidance = buildUpgradeGuidance(
      createTestAccount({ createdAt: null }),
      'OCR_SCAN',
      TEST_NOW
    );

    expect(guidance.discount_eligibility.reason).toBe('created_at_unavailable');
  });

  it('should fall back to a generic recommendation for an unmapped feature', () => {
    expect(buildUpgradeGuidance(createTestAccount(), null, TEST_NOW)).toMatchObject({
      recommended_plan: 'PRO',
      benefits: ['Higher limits and premium security features'],
    });
    expect(
      buildUpgradeGuidance(createTestAccount({ plan: 'PRO' }), 'SOMETHING_NEW', TEST_NOW)
        .recommended_plan
    ).toBe('ULTRA');
  });
});
