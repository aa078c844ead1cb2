// Tier rules and the pure access decision for subscription-gated articles.

import type { Article, ContentAccess, SubscriptionTier } from '../../types/index.js';

export interface AccessRules {
  dailyArticleLimit: number | null;
  monthlyArticleLimit: number | null;
  premiumContentAccess: boolean;
  enterpriseContentAccess: boolean;
}

export const ACCESS_RULES: Readonly<Record<SubscriptionTier, AccessRules>> = {
  free: {
    dailyArticleLimit: 10,
    monthlyArticleLimit: 200,
    premiumContentAccess: false,
    enterpriseContentAccess: false,
  },
  premium: {
    dailyArticleLimit: 50,
    monthlyArticleLimit: 1000,
    premiumContentAccess: true,
    enterpriseContentAccess: false,
  },
  enterprise: {
    dailyArticleLimit: null,
    monthlyArticleLimit: null,
    premiumContentAccess: true,
    enterpriseContentAccess: true,
  },
};

export type AccessType = 'full' | 'upgrade_required' | 'limit_exceeded' | 'denied';

export type AccessFlagSource = Pick<Article, 'contentAccess' | 'isPremiumContent' | 'isEnterpriseContent'>;

export interface TierDecision {
  canAccess: boolean;
  accessType: AccessType;
  reason?: string;
}

export function evaluateTierAccess(tier: SubscriptionTier, article: AccessFlagSource): TierDecision {
  if (article.isEnterpriseContent && tier !== 'enterprise') {
    return { canAccess: false, accessType: 'upgrade_required', reason: 'Enterprise subscription required' };
  }
  if (article.isPremiumContent && tier === 'free') {
    return { canAccess: false, accessType: 'upgrade_required', reason: 'Premium subscription required' };
  }
  return { canAccess: true, accessType: 'full' };
}

export interface UsageCounts {
  today: number;
  thisMonth: number;
}

export type UsageLimitCheck =
  | { withinLimits: true }
  | { withinLimits: false; reason: string; limitType: 'daily' | 'monthly' };

export function checkUsageAgainstRules(rules: AccessRules, usage: UsageCounts): UsageLimitCheck {
  if (rules.dailyArticleLimit !== null && usage.today >= rules.dailyArticleLimit) {
    return {
      withinLimits: false,
      reason: `Daily limit of ${rules.dailyArticleLimit} articles exceeded`,
      limitType: 'daily',
    };
  }
  if (rules.monthlyArticleLimit !== null && usage.thisMonth >= rules.monthlyArticleLimit) {
    return {
      withinLimits: false,
      reason: `Monthly limit of ${rules.monthlyArticleLimit} articles exceeded`,
      limitType: 'monthly',
    };
  }
  return { withinLimits: true };
}

export interface UpgradeOption {
  tier: SubscriptionTier;
  benefits: string[];
}

export interface UpgradeSuggestions {
  currentTier: SubscriptionTier;
  requiredForContent: ContentAccess;
  availableUpgrades: UpgradeOption[];
}

export function getUpgradeSuggestions(tier: SubscriptionTier, contentAccess: ContentAccess): UpgradeSuggestions {
  const availableUpgrades: UpgradeOption[] = [];

  if (tier === 'free') {
    availableUpgrades.push(
      {
        tier: 'premium',
        benefits: [
          'Access to premium content',
          '50 articles per day',
          '1000 articles per month',
          'No ads',
          'Priority support',
        ],
      },
      {
        tier: 'enterprise',
        benefits: [
          'Unlimited article access',
          'Enterprise exclusive content',
          'Advanced analytics',
          'Team collaboration features',
          'Custom integrations',
        ],
      },
    );
  } else if (tier === 'premium' && contentAccess === 'enterprise') {
    availableUpgrades.push({
      tier: 'enterprise',
      benefits: ['Enterprise exclusive content', 'Unlimited access', 'Advanced analytics', 'Team features'],
    });
  }

  return { currentTier: tier, requiredForContent: contentAccess, availableUpgrades };
}

/** Flags an article carries for a given access level. */
export function accessFlagsFor(access: ContentAccess): { isPremiumContent: boolean; isEnterpriseContent: boolean } {
  switch (access) {
    case 'enterprise':
      return { isPremiumContent: true, isEnterpriseContent: true };
    case 'premium':
      return { isPremiumContent: true, isEnterpriseContent: false };
    default:
      return { isPremiumContent: false, isEnterpriseContent: false };
  }
}
