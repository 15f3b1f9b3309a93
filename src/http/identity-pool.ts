/**
 * Browser identities for endpoints that reject non-browser clients.
 *
 * `current()` rotates through the identities acquired so far;
 * `acquireFresh()` adds a newly randomized one, used when retrying.
 */

export interface BrowserProfile {
  name: string;
  userAgent: string;
  secChUa: string;
  platform: string;
}

export const BROWSER_PROFILES: readonly BrowserProfile[] = [
  {
    name: "chrome131-windows",
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
    secChUa: '"Google Chrome";v="131", "Chromium";v="131", "Not_A Brand";v="24"',
    platform: '"Windows"',
  },
  {
    name: "chrome133-macos",
    userAgent:
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36",
    secChUa: '"Not(A:Brand";v="99", "Google Chrome";v="133", "Chromium";v="133"',
    platform: '"macOS"',
  },
  {
    name: "chrome136-linux",
    userAgent:
      "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36",
    secChUa: '"Chromium";v="136", "Google Chrome";v="136", "Not.A/Brand";v="99"',
    platform: '"Linux"',
  },
  {
    name: "chrome142-windows",
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/142.0.0.0 Safari/537.36",
    secChUa: '"Chromium";v="142", "Google Chrome";v="142", "Not_A Brand";v="99"',
    platform: '"Windows"',
  },
];

const ACCEPT_LANGUAGES = ["en-US,en;q=0.9", "en-GB,en;q=0.9", "en-US,en;q=0.8"];

export interface Identity {
  profile: BrowserProfile;
  headers: Record<string, string>;
}

const buildIdentity = (profile: BrowserProfile, language: string): Identity => ({
  profile,
  headers: {
    "User-Agent": profile.userAgent,
    "sec-ch-ua": profile.secChUa,
    "sec-ch-ua-mobile": "?0",
    "sec-ch-ua-platform": profile.platform,
    "Accept-Language": language,
    Accept: "application/json, text/plain, */*",
  },
});

export class IdentityPool {
  private readonly identities: Identity[] = [];
  private index = 0;

  constructor(
    private readonly profiles: readonly BrowserProfile[] = BROWSER_PROFILES,
    private readonly random: () => number = Math.random,
  ) {
    if (profiles.length === 0) {
      throw new Error("IdentityPool needs at least one browser profile");
    }
  }

  /** Number of identities acquired so far. */
  get size(): number {
    return this.identities.length;
  }

  /**
   * Next identity in round-robin order, creating the first on demand.
   */
  current(): Identity {
    if (this.identities.length === 0) {
      return this.acquireFresh();
    }
    const identity = this.identities[this.index % this.identities.length];
    this.index++;
    return identity;
  }

  /**
   * Create a new identity from a random profile and add it to the pool.
   */
  acquireFresh(): Identity {
    const profile = this.pick(this.profiles);
    const identity = buildIdentity(profile, this.pick(ACCEPT_LANGUAGES));
    this.identities.push(identity);
    return identity;
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.random() * items.length) % items.length];
  }
}
