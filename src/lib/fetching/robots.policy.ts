/**
 * Robots Policy
 * Yes/no robots.txt gate, one robots.txt fetch per origin
 */

import robotsParser from 'robots-parser';
import { RateLimitManager } from '../rate-limit';
import { HttpTransport, TimeoutSettings } from './fetch.types';

type Robots = ReturnType<typeof robotsParser>;

export interface RobotsPolicy {
  isAllowed(url: string): Promise<boolean>;
}

/**
 * Admits everything
 */
export const allowAllRobotsPolicy: RobotsPolicy = {
  isAllowed: async () => true,
};

export class RobotsTxtPolicy implements RobotsPolicy {
  private cache: Map<string, Promise<Robots | null>> = new Map();

  constructor(
    private readonly transport: HttpTransport,
    private readonly userAgent: string,
    private readonly timeouts: TimeoutSettings,
    private readonly rateLimiter?: RateLimitManager // robots.txt requests count against the host's limits
  ) {}

  /**
   * Check if a URL may be crawled. A missing or unreadable robots.txt allows everything.
   */
  async isAllowed(url: string): Promise<boolean> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    const { origin } = parsed;
    let pending = this.cache.get(origin);
    if (!pending) {
      pending = this.load(origin, parsed.hostname.toLowerCase());
      this.cache.set(origin, pending);
    }

    const robots = await pending;
    if (!robots) {
      return true;
    }
    return robots.isAllowed(url, this.userAgent) !== false;
  }

  private async load(origin: string, host: string): Promise<Robots | null> {
    const robotsUrl = `${origin}/robots.txt`;
    const permit = this.rateLimiter ? await this.rateLimiter.admit(host) : null;
    try {
      const response = await this.transport.request({
        url: robotsUrl,
        headers: { 'User-Agent': this.userAgent },
        timeouts: this.timeouts,
      });
      if (response.status !== 200) {
        return null;
      }
      return robotsParser(robotsUrl, response.body.toString('utf8'));
    } catch (error: unknown) {
      console.warn(`⚠️  Could not read ${robotsUrl}, assuming crawling is allowed:`, error instanceof Error ? error.message : error);
      return null;
    } finally {
      permit?.release();
    }
  }
}
