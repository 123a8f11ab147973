import { PromoKeywordsSchema, type PromoKeywordsDTO } from '../../../application/dto/PromoKeywordsDTO.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import type { PromoFilterPort } from '../../../application/ports/PromoFilterPort.js';
import { confidenceFromMatchCount } from '../../../domain/entities/Confidence.js';
import type { PromoVerdict } from '../../../domain/entities/PromoVerdict.js';
import { defineConfig, ReloadableConfig } from '../../config/ReloadableConfig.js';

interface CompiledKeyword {
  keyword: string;
  language: string;
  matches: (text: string) => boolean;
}

export interface PromoSnapshot {
  readonly keywords: readonly CompiledKeyword[];
  readonly languages: Readonly<Record<string, readonly string[]>>;
}

const REASON_KEYWORD_LIMIT = 3;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const compileKeyword = (keyword: string, language: string): CompiledKeyword => {
  // \b only understands ASCII word characters, so boundaries are spelled out with Unicode classes.
  const body = keyword.split(/\s+/u).map(escapeRegExp).join('\\s+');
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])${body}(?![\\p{L}\\p{N}_])`, 'iu');

  return { keyword, language, matches: (text) => pattern.test(text) };
};

const buildSnapshot = (dto: PromoKeywordsDTO): PromoSnapshot => {
  const seen = new Set<string>();
  const keywords: CompiledKeyword[] = [];
  const languages: Record<string, string[]> = {};

  for (const [language, entry] of Object.entries(dto.languages)) {
    languages[language] = [...entry.keywords];

    for (const keyword of entry.keywords) {
      const key = keyword.toLowerCase();
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      keywords.push(compileKeyword(keyword, language));
    }
  }

  return { keywords, languages };
};

export const promoKeywordsConfig = defineConfig({
  source: 'promoKeywords',
  schema: PromoKeywordsSchema,
  build: buildSnapshot,
  defaults: { languages: {} },
});

export class KeywordPromoFilter implements PromoFilterPort {
  constructor(
    private readonly config: ReloadableConfig<PromoSnapshot>,
    private readonly logger: LoggerPort = console,
  ) {}

  classify(text: string): PromoVerdict {
    if (!text || !text.trim()) {
      return { skip: false, reason: 'Invalid input', matchedKeywords: [], confidence: 'low' };
    }

    const snapshot = this.config.current;
    const matchedKeywords = snapshot.keywords.filter((entry) => entry.matches(text)).map((entry) => entry.keyword);

    if (matchedKeywords.length === 0) {
      return { skip: false, reason: 'No promotional keywords detected', matchedKeywords, confidence: 'high' };
    }

    const shown = matchedKeywords.slice(0, REASON_KEYWORD_LIMIT).join(', ');
    const remaining = matchedKeywords.length - REASON_KEYWORD_LIMIT;
    const suffix = remaining > 0 ? ` (and ${remaining} more)` : '';

    this.logger.debug(`🏷️ Promotional message filtered (${matchedKeywords.length} keyword(s))`);

    return {
      skip: true,
      reason: `Promotional message detected (keywords: ${shown}${suffix})`,
      matchedKeywords,
      confidence: confidenceFromMatchCount(matchedKeywords.length),
    };
  }

  classifyBatch(texts: readonly string[]): PromoVerdict[] {
    return texts.map((text) => this.classify(text));
  }

  isPromotional(text: string): boolean {
    return this.classify(text).skip;
  }

  keywords(): Readonly<Record<string, readonly string[]>> {
    return this.config.current.languages;
  }
}
