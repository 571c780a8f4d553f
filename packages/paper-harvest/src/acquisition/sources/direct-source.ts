import type { Pacer } from '../../core/pacing.js';
import { findPdfLink } from '../../crawl/page-parser.js';
import { isSiteLink, normalizeLink, type SiteProfile } from '../../crawl/site-profile.js';
import type { AntiBlockDetector } from '../../session/anti-block-detector.js';
import type { AcquisitionRequest, AcquisitionSource, AttemptContext, AttemptOutcome } from '../types.js';

export interface DirectSourceTiming {
  requestDelayMs: number;
  requestJitterMs: number;
}

/** Downloads from the originating site's own detail page, reusing the session's cookies. */
export class DirectSource implements AcquisitionSource {
  readonly name = 'direct_source' as const;

  constructor(
    private readonly profile: SiteProfile,
    private readonly detector: AntiBlockDetector,
    private readonly pacer: Pacer,
    private readonly timing: DirectSourceTiming
  ) {}

  isApplicable(request: AcquisitionRequest): boolean {
    return isSiteLink(request.link, this.profile);
  }

  async attempt({ request, target, session, fetcher }: AttemptContext): Promise<AttemptOutcome> {
    if (session.blocked) {
      return { ok: false, kind: 'blocked', stage: 'detail_page', message: 'session is blocked' };
    }

    const pageUrl = normalizeLink(request.link ?? '', this.profile.baseUrl);
    if (!(await session.navigate(pageUrl))) {
      return { ok: false, kind: 'transient_network', stage: 'detail_page', message: 'detail page did not load' };
    }

    await this.pacer.pause(this.timing.requestDelayMs, this.timing.requestJitterMs);

    if (await this.detector.check(session)) {
      return { ok: false, kind: 'blocked', stage: 'detail_page', message: 'detail page is a verification page' };
    }

    const pdfUrl = findPdfLink(await session.html(), this.profile, session.currentUrl() || pageUrl);
    if (!pdfUrl) {
      return {
        ok: false,
        kind: 'not_found',
        stage: 'pdf_link',
        message: 'no PDF link on the detail page (sign-in may be required)'
      };
    }

    const outcome = await fetcher.retrieve(pdfUrl, target, session, {
      referer: pageUrl,
      cookies: await session.listCookies()
    });

    return outcome.ok
      ? { ok: true, filepath: outcome.filepath, stage: 'download', candidateUrl: pdfUrl, message: outcome.message }
      : { ok: false, kind: outcome.kind, stage: 'download', candidateUrl: pdfUrl, message: outcome.message };
  }
}
