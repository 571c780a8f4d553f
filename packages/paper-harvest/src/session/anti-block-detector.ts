import type { Logger } from '../core/logger.js';
import type { FetchSession } from './fetch-session.js';

export interface BlockSignals {
  /** Structural markers of a verification page; any one present means blocked. */
  markers: string[];
  /** Lowercase fragments matched against the page title. */
  titleKeywords: string[];
}

export class AntiBlockDetector {
  constructor(
    private readonly signals: BlockSignals,
    private readonly probeTimeoutMs: number,
    private readonly logger: Logger
  ) {}

  /**
   * Observes the current page and records a block on the session when one is found. A session
   * already blocked short-circuits without touching the page.
   */
  async check(session: FetchSession): Promise<boolean> {
    if (session.blocked) {
      return true;
    }

    for (const marker of this.signals.markers) {
      if (await session.findElement(marker, this.probeTimeoutMs)) {
        session.recordBlock(`marker ${marker}`);
        return true;
      }
    }

    const title = (await session.title()).toLowerCase();
    const keyword = this.signals.titleKeywords.find((item) => title.includes(item));
    if (keyword) {
      session.recordBlock(`title keyword "${keyword}"`);
      return true;
    }

    this.logger.debug('No block signals on page', { url: session.currentUrl() });
    return false;
  }
}
