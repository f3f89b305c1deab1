import robotsParser from "robots-parser";
import { FetchError, errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { Fetcher } from "./fetcher";

export interface RobotsRules {
  isAllowed(url: string): boolean;
}

const ALLOW_ALL: RobotsRules = { isAllowed: () => true };

/**
 * Fetches `/robots.txt` once per origin and answers whether our user agent may
 * fetch a page. A missing or unreachable robots.txt allows everything.
 */
export class RobotsPolicy {
  private readonly fetcher: Fetcher;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly rulesByOrigin = new Map<string, Promise<RobotsRules>>();

  constructor(fetcher: Fetcher, userAgent: string, logger: Logger) {
    this.fetcher = fetcher;
    this.userAgent = userAgent;
    this.logger = logger;
  }

  async isAllowed(url: string): Promise<boolean> {
    const origin = new URL(url).origin;
    let rules = this.rulesByOrigin.get(origin);
    if (!rules) {
      rules = this.loadRules(origin);
      this.rulesByOrigin.set(origin, rules);
    }
    return (await rules).isAllowed(url);
  }

  private async loadRules(origin: string): Promise<RobotsRules> {
    const robotsUrl = `${origin}/robots.txt`;
    let body: string;
    try {
      body = (await this.fetcher.fetchText(robotsUrl)).body;
    } catch (error) {
      if (error instanceof FetchError && error.statusCode !== undefined && error.statusCode < 500) {
        this.logger.debug("robots_not_found", { url: robotsUrl, status: error.statusCode });
      } else {
        this.logger.warn("robots_fetch_failed", { url: robotsUrl, error: errorMessage(error) });
      }
      return ALLOW_ALL;
    }

    const robots = robotsParser(robotsUrl, body);
    this.logger.debug("robots_loaded", { url: robotsUrl });
    return { isAllowed: (url) => robots.isAllowed(url, this.userAgent) !== false };
  }
}
