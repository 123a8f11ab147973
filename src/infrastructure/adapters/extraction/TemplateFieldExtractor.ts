import {
  ExtractionTemplatesSchema,
  type ExtractionTemplateDTO,
  type ExtractionTemplatesDTO,
} from '../../../application/dto/ExtractionTemplatesDTO.js';
import type { FieldExtractorPort } from '../../../application/ports/FieldExtractorPort.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import { UNKNOWN_BANK } from '../../../domain/entities/BankMatch.js';
import { compareConfidence, type ConfidenceLevel } from '../../../domain/entities/Confidence.js';
import {
  EXTRACTION_FIELDS,
  emptyExtraction,
  type BankSelection,
  type ExtractedFields,
  type ExtractionField,
  type ExtractionTemplate,
} from '../../../domain/entities/ExtractionTemplate.js';
import { ConfigurationError } from '../../../domain/errors/ConfigurationError.js';
import { CARD_SUFFIX_PATTERN } from '../../../domain/errors/InvariantViolationError.js';
import { defineConfig, ReloadableConfig } from '../../config/ReloadableConfig.js';

export interface ExtractionTemplatesSnapshot {
  // Declared bank order doubles as the tie-break order in auto mode.
  readonly banks: ReadonlyArray<{ bankId: string; templates: readonly ExtractionTemplate[] }>;
}

type FieldValues = Partial<Record<ExtractionField, string>>;

interface TemplateMatch {
  template: ExtractionTemplate;
  values: FieldValues;
  confidence: ConfidenceLevel;
}

const namedGroupAlias = /\(\?P</g;

const compileFieldPattern = (bankId: string, template: ExtractionTemplateDTO, field: ExtractionField, source: string): RegExp => {
  const pattern = source.replace(namedGroupAlias, '(?<');
  const where = `${bankId}/${template.name}/${field}`;

  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'iu');
  } catch (error) {
    throw new ConfigurationError('extractionTemplates', `Invalid pattern for ${where}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!pattern.includes(`(?<${field}>`)) {
    throw new ConfigurationError('extractionTemplates', `Pattern for ${where} must expose a (?<${field}>...) group`);
  }

  return regex;
};

const buildSnapshot = (dto: ExtractionTemplatesDTO): ExtractionTemplatesSnapshot => ({
  banks: dto.banks.map((bank) => ({
    bankId: bank.bankId,
    templates: bank.templates.map((template): ExtractionTemplate => {
      const fieldPatterns = new Map<ExtractionField, RegExp>();

      for (const field of EXTRACTION_FIELDS) {
        const source = template.patterns[field];
        if (source) {
          fieldPatterns.set(field, compileFieldPattern(bank.bankId, template, field, source));
        }
      }

      return {
        bankId: bank.bankId,
        name: template.name,
        fieldPatterns,
        requiredFields: new Set(template.requiredFields),
      };
    }),
  })),
});

export const extractionTemplatesConfig = defineConfig({
  source: 'extractionTemplates',
  schema: ExtractionTemplatesSchema,
  build: buildSnapshot,
  defaults: { banks: [] },
});

const captureField = (regex: RegExp, field: ExtractionField, text: string): string | null => {
  const match = regex.exec(text);
  if (!match) {
    return null;
  }

  const value = match.groups?.[field] ?? match.slice(1).find((group) => group !== undefined);
  const trimmed = value?.trim();

  return trimmed ? trimmed : null;
};

export const scoreTemplateConfidence = (
  template: ExtractionTemplate,
  values: FieldValues,
): ConfidenceLevel => {
  const requiredMatched = [...template.requiredFields].every((field) => values[field] !== undefined);
  if (!requiredMatched) {
    return 'low';
  }

  const matched = Object.keys(values).length;
  return matched * 2 >= template.fieldPatterns.size ? 'high' : 'medium';
};

export class TemplateFieldExtractor implements FieldExtractorPort {
  constructor(
    private readonly config: ReloadableConfig<ExtractionTemplatesSnapshot>,
    private readonly logger: LoggerPort = console,
  ) {}

  extract(text: string, selection: BankSelection): ExtractedFields {
    const snapshot = this.config.current;

    if (selection.kind === 'specified') {
      const bank = snapshot.banks.find((candidate) => candidate.bankId === selection.bankId);
      if (!bank) {
        this.logger.warn(`⚠️ No extraction templates configured for bank ${selection.bankId}`);
        return emptyExtraction(selection.bankId);
      }

      const match = this.selectTemplate(bank.templates, text);
      return match ? this.toExtractedFields(match) : emptyExtraction(selection.bankId);
    }

    let best: TemplateMatch | null = null;

    for (const bank of snapshot.banks) {
      const match = this.selectTemplate(bank.templates, text);

      // Strictly better only: earlier banks win ties.
      if (match && (best === null || compareConfidence(match.confidence, best.confidence) > 0)) {
        best = match;
      }
    }

    return best ? this.toExtractedFields(best) : emptyExtraction(UNKNOWN_BANK);
  }

  extractBatch(texts: readonly string[], selection: BankSelection): ExtractedFields[] {
    return texts.map((text) => this.extract(text, selection));
  }

  supportedBanks(): string[] {
    return this.config.current.banks.map((bank) => bank.bankId);
  }

  // First template in declared order whose required fields all match.
  private selectTemplate(templates: readonly ExtractionTemplate[], text: string): TemplateMatch | null {
    for (const template of templates) {
      const values: FieldValues = {};

      for (const [field, regex] of template.fieldPatterns) {
        const value = captureField(regex, field, text);
        if (value !== null) {
          values[field] = value;
        }
      }

      const confidence = scoreTemplateConfidence(template, values);
      if (confidence !== 'low') {
        return { template, values, confidence };
      }
    }

    return null;
  }

  private toExtractedFields(match: TemplateMatch): ExtractedFields {
    const { template, values, confidence } = match;
    let cardSuffix = values.cardSuffix ?? null;

    if (cardSuffix !== null && !CARD_SUFFIX_PATTERN.test(cardSuffix)) {
      this.logger.warn(`⚠️ Template ${template.bankId}/${template.name} captured invalid card suffix "${cardSuffix}"`);
      cardSuffix = null;
    }

    return {
      amount: values.amount ?? null,
      currency: values.currency ?? null,
      dateRaw: values.date ?? null,
      payee: values.payee ?? null,
      transactionType: values.transactionType ?? null,
      cardSuffix,
      confidence,
      matchedBank: template.bankId,
      matchedTemplate: template.name,
    };
  }
}
