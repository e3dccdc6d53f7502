import { InvalidSocialLinkError } from '../errors';
import type { SocialLinks, SocialPlatform } from '../types/analysis';

type PlatformRule =
  | { label: string; kind: 'domain'; domains: readonly string[] }
  | { label: string; kind: 'url-like'; indicators: readonly string[] };

const PLATFORM_RULES: Readonly<Record<SocialPlatform, PlatformRule>> = Object.freeze({
  linkedin: { label: 'LinkedIn', kind: 'domain', domains: ['linkedin.com'] },
  github: { label: 'GitHub', kind: 'domain', domains: ['github.com'] },
  kaggle: { label: 'Kaggle', kind: 'domain', domains: ['kaggle.com'] },
  portfolio: { label: 'Portfolio', kind: 'url-like', indicators: ['http', '.com', '.io', '.dev', '.net', '.org'] },
  stackoverflow: { label: 'Stack Overflow', kind: 'domain', domains: ['stackoverflow.com'] },
  medium: { label: 'Medium', kind: 'domain', domains: ['medium.com'] },
  twitter: { label: 'Twitter', kind: 'domain', domains: ['twitter.com', 'x.com'] },
});

export const SOCIAL_PLATFORMS: readonly SocialPlatform[] = [
  'linkedin',
  'github',
  'kaggle',
  'portfolio',
  'stackoverflow',
  'medium',
  'twitter',
];

export type SocialLinkInput = Partial<Record<SocialPlatform, unknown>>;

function hostOf(value: string): string | null {
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(value) ? value : `https://${value}`;
  try {
    return new URL(candidate).hostname.toLowerCase();
  } catch {
    return null;
  }
}

function matchesDomain(value: string, domains: readonly string[]): boolean {
  const host = hostOf(value);
  if (!host) return false;
  return domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

function expectation(rule: PlatformRule): string {
  if (rule.kind === 'url-like') return 'a valid URL';
  return rule.domains.map((domain) => `'${domain}'`).join(' or ');
}

export function isValidSocialLink(platform: SocialPlatform, value: string): boolean {
  const rule = PLATFORM_RULES[platform];
  if (rule.kind === 'domain') return matchesDomain(value, rule.domains);
  const lower = value.toLowerCase();
  return rule.indicators.some((indicator) => lower.includes(indicator));
}

/**
 * Checks the optional profile links a user typed in. Blank values are
 * skipped; accepted values are trimmed. Platforms with a known host must
 * point at that host or one of its subdomains.
 */
export function validateSocialLinks(input: SocialLinkInput): SocialLinks {
  const links: SocialLinks = {};

  for (const platform of SOCIAL_PLATFORMS) {
    const raw = input[platform];
    if (typeof raw !== 'string' || raw.trim() === '') continue;

    const value = raw.trim();
    if (!isValidSocialLink(platform, value)) {
      const rule = PLATFORM_RULES[platform];
      throw new InvalidSocialLinkError(rule.label, expectation(rule));
    }
    links[platform] = value;
  }

  return links;
}
